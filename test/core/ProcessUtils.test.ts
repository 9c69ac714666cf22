import { ProcessUtils, TIMEOUT_EXIT_CODE } from '../../src/utils/ProcessUtils';

describe('ProcessUtils', () => {
  describe('execute', () => {
    it('should capture trimmed output and the exit code', async () => {
      const result = await ProcessUtils.execute('sh', ['-c', 'echo out; echo err >&2; exit 3']);

      expect(result).toEqual({ stdout: 'out', stderr: 'err', exitCode: 3, timedOut: false });
    });

    it('should pass extra environment variables through', async () => {
      const result = await ProcessUtils.execute('sh', ['-c', 'printf %s "$PHPSWITCH_TEST_VALUE"'], {
        env: { PHPSWITCH_TEST_VALUE: 'placeholder' },
      });

      expect(result.stdout).toBe('placeholder');
    });

    it('should kill a process that outlives its timeout', async () => {
      const started = Date.now();

      const result = await ProcessUtils.execute('sh', ['-c', 'sleep 20'], { timeout: 300 });

      expect(result.timedOut).toBe(true);
      expect(result.exitCode).toBe(TIMEOUT_EXIT_CODE);
      expect(Date.now() - started).toBeLessThan(5000);
    }, 10000);

    it('should reject when the command cannot be started', async () => {
      await expect(ProcessUtils.execute('phpswitch-no-such-command', ['--version'])).rejects.toThrow(
        'Process execution failed'
      );
    });
  });

  describe('describe', () => {
    it('should join a command and its arguments', () => {
      expect(ProcessUtils.describe('brew', ['services', 'stop', 'php@8.1'])).toBe('brew services stop php@8.1');
    });
  });
});
