import * as fs from 'fs-extra';
import * as path from 'path';
import * as os from 'os';
import { ToolConfig } from '../src/types/Config';

// Global test configuration
jest.setTimeout(30000);

// Mock console to reduce noise in tests
const originalConsole = console;
beforeAll(() => {
  global.console = {
    ...console,
    log: jest.fn(),
    debug: jest.fn(),
    info: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
  };
});

afterAll(() => {
  global.console = originalConsole;
});

// Helper to create temporary test directories
export const createTempDir = async (): Promise<string> => {
  return fs.mkdtemp(path.join(os.tmpdir(), 'phpswitch-test-'));
};

// Helper to clean up test directories
export const cleanupTempDir = async (dir: string): Promise<void> => {
  try {
    await fs.remove(dir);
  } catch (error) {
    // Ignore cleanup errors
  }
};

export const createTestConfig = (tempDir: string, overrides: Partial<ToolConfig> = {}): ToolConfig => ({
  autoRestartService: true,
  backupEnabled: true,
  maxBackups: 5,
  defaultVersion: undefined,
  cacheDirectory: path.join(tempDir, 'cache'),
  autoSwitch: false,
  ...overrides,
});

/**
 * A clock tests can move forward by hand.
 */
export const createClock = (start = '2026-03-01T09:00:00.000Z') => {
  let current = new Date(start).getTime();
  return {
    now: () => new Date(current),
    advance: (ms: number) => {
      current += ms;
    },
  };
};
