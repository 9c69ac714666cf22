import kill from 'tree-kill';
import crossSpawn from 'cross-spawn';

export interface ProcessOptions {
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  /** Milliseconds before the process tree is killed; 0 or absent means no limit */
  timeout?: number;
}

export interface ProcessResult {
  stdout: string;
  stderr: string;
  exitCode: number;
  timedOut: boolean;
}

/**
 * Anything that can run an external command. `ProcessUtils` satisfies this
 * structurally; tests hand in an in-process fake.
 */
export interface CommandRunner {
  execute(command: string, args?: string[], options?: ProcessOptions): Promise<ProcessResult>;
}

export const TIMEOUT_EXIT_CODE = 124;

export class ProcessUtils {
  static async execute(
    command: string,
    args: string[] = [],
    options: ProcessOptions = {}
  ): Promise<ProcessResult> {
    return new Promise((resolve, reject) => {
      const child = crossSpawn(command, args, {
        cwd: options.cwd || process.cwd(),
        env: { ...process.env, ...options.env },
        stdio: 'pipe',
      });

      let stdout = '';
      let stderr = '';
      let timedOut = false;
      let timer: NodeJS.Timeout | undefined;

      if (options.timeout && options.timeout > 0) {
        timer = setTimeout(() => {
          timedOut = true;
          if (child.pid !== undefined) {
            kill(child.pid, 'SIGKILL');
          }
        }, options.timeout);
      }

      if (child.stdout) {
        child.stdout.on('data', (data: Buffer) => {
          stdout += data.toString();
        });
      }

      if (child.stderr) {
        child.stderr.on('data', (data: Buffer) => {
          stderr += data.toString();
        });
      }

      child.on('close', (code: number | null) => {
        clearTimeout(timer);
        resolve({
          stdout: stdout.trim(),
          stderr: stderr.trim(),
          exitCode: timedOut ? TIMEOUT_EXIT_CODE : (code ?? 1),
          timedOut,
        });
      });

      child.on('error', (error: Error) => {
        clearTimeout(timer);
        reject(new Error(`Process execution failed: ${error.message}`));
      });
    });
  }

  /**
   * Looks a command up on PATH without running it.
   */
  static async isCommandAvailable(command: string): Promise<boolean> {
    try {
      const which = process.platform === 'win32' ? 'where' : 'which';
      const result = await this.execute(which, [command], { timeout: 5000 });
      return result.exitCode === 0;
    } catch {
      return false;
    }
  }

  static describe(command: string, args: string[] = []): string {
    return [command, ...args].join(' ');
  }
}
