import * as fs from 'fs';
import * as path from 'path';
import * as os from 'os';
import type { CommandOptions, CommandResult, CommandRunner } from './lib/command-runner';
import type { Fetcher } from './lib/fetcher';
import type { StepContext } from './installers/types';
import type { InstallationTarget } from './types';
import { getSetupPaths } from './config';
import { RESHADE_VERSION, WORKDIR_ENV } from './shared-constants';

// One directory per Jest worker so parallel test files never share state
export const TEST_TEMP_DIR = path.join(os.tmpdir(), `ffxiv-reshade-setup-tests-${process.env.JEST_WORKER_ID ?? '0'}`);
export const TEST_HOME_DIR = path.join(TEST_TEMP_DIR, 'home');
export const TEST_WORK_DIR = path.join(TEST_TEMP_DIR, 'work');

function removeTestDir(): void {
  let retries = 3;
  while (retries > 0 && fs.existsSync(TEST_TEMP_DIR)) {
    try {
      fs.rmSync(TEST_TEMP_DIR, { recursive: true, force: true });
      break;
    } catch (error) {
      retries--;
      if (retries === 0) {
        console.warn(`Failed to clean up test directory: ${error}`);
      }
    }
  }
}

beforeEach(() => {
  jest.clearAllMocks();
  jest.restoreAllMocks();

  removeTestDir();
  fs.mkdirSync(TEST_HOME_DIR, { recursive: true });
  fs.mkdirSync(TEST_WORK_DIR, { recursive: true });
});

afterAll(() => {
  removeTestDir();
});

/**
 * Write a file below the test directory, creating parents as needed
 */
export function writeTestFile(filePath: string, content: string | Buffer): string {
  fs.mkdirSync(path.dirname(filePath), { recursive: true });
  fs.writeFileSync(filePath, content);
  return filePath;
}

/**
 * Create a game directory and Wine prefix laid out like a real install
 */
export function createFakeGameInstall(root: string = path.join(TEST_TEMP_DIR, 'install')): { gamePath: string; prefixPath: string } {
  const gamePath = path.join(root, 'game');
  const prefixPath = path.join(root, 'pfx');
  fs.mkdirSync(gamePath, { recursive: true });
  fs.mkdirSync(path.join(prefixPath, 'drive_c', 'windows', 'system32'), { recursive: true });
  return { gamePath, prefixPath };
}

export interface RecordedCommand {
  command: string;
  args: string[];
  options?: CommandOptions;
}

export type CommandHandler = (command: string, args: string[], options?: CommandOptions) => CommandResult | Promise<CommandResult>;

export const SUCCESS: CommandResult = { exitCode: 0, stdout: '', stderr: '' };

/**
 * Records every command; the handler decides the result and may touch the filesystem
 */
export class FakeCommandRunner implements CommandRunner {
  readonly calls: RecordedCommand[] = [];

  constructor(private readonly handler: CommandHandler = () => SUCCESS) {}

  async run(command: string, args: string[], options?: CommandOptions): Promise<CommandResult> {
    this.calls.push({ command, args, options });
    return this.handler(command, args, options);
  }
}

type Populate = (url: string, destDir: string) => void;

/**
 * Creates destDir (a checkout gets a .git directory) and lets the test fill it
 * in place of a download
 */
export class FakeFetcher implements Fetcher {
  readonly repositories: string[] = [];
  readonly archives: string[] = [];

  constructor(private readonly populate: { repository?: Populate; archive?: Populate } = {}) {}

  async fetchRepository(url: string, destDir: string): Promise<string> {
    this.repositories.push(url);
    fs.mkdirSync(path.join(destDir, '.git'), { recursive: true });
    this.populate.repository?.(url, destDir);
    return destDir;
  }

  async fetchArchive(url: string, destDir: string): Promise<string> {
    this.archives.push(url);
    fs.mkdirSync(destDir, { recursive: true });
    this.populate.archive?.(url, destDir);
    return destDir;
  }
}

export function createStepContext(target: InstallationTarget, overrides: Partial<Omit<StepContext, 'target'>> = {}): StepContext {
  return {
    target,
    paths: getSetupPaths({ [WORKDIR_ENV]: TEST_WORK_DIR }, TEST_HOME_DIR),
    fetcher: new FakeFetcher(),
    runner: new FakeCommandRunner(),
    reshadeVersion: RESHADE_VERSION,
    refresh: false,
    env: {},
    homeDir: TEST_HOME_DIR,
    ...overrides,
  };
}
