import * as fs from 'fs';
import * as os from 'os';
import inquirer from 'inquirer';
import type { InstallationTarget } from '../types';
import { getSetupPaths } from '../config';
import { BackupManager } from '../installers/backup-manager';
import { StepPipeline } from '../installers/step-pipeline';
import { createDefaultSteps } from '../installers/steps';
import { ResolutionError, toError, type InstallStep } from '../installers/types';
import { ProcessCommandRunner, type CommandRunner } from '../lib/command-runner';
import { GitArchiveFetcher, type Fetcher } from '../lib/fetcher';
import { createDefaultStrategies, resolveInstallationTarget, type ResolverStrategy } from '../lib/environment-resolver';
import { checkPrerequisites } from '../lib/prerequisites';
import {
  FFXIV_PATH_ENV,
  FFXIV_STEAM_APP_ID,
  FFXIV_STEAM_INSTALL_DIR,
  RESHADE_VERSION,
  WINE_PREFIX_ENV,
} from '../shared-constants';
import { describeTarget, formatPostInstallInstructions, formatRunSummary } from './report';

export interface SetupOptions {
  yes?: boolean;
  restore?: boolean;
  reshadeVersion?: string;
  update?: boolean;
}

export interface SetupDependencies {
  env?: NodeJS.ProcessEnv;
  homeDir?: string;
  strategies?: ResolverStrategy[];
  runner?: CommandRunner;
  fetcher?: Fetcher;
  steps?: InstallStep[];
  confirm?: (target: InstallationTarget) => Promise<boolean>;
}

export async function promptForConfirmation(target: InstallationTarget): Promise<boolean> {
  const { proceed } = await inquirer.prompt<{ proceed: boolean }>([
    {
      type: 'confirm',
      name: 'proceed',
      message: `Install ReShade and GPosingway into ${target.gamePath}?`,
      default: true,
    },
  ]);
  return proceed;
}

function printLines(lines: string[]): void {
  for (const line of lines) {
    console.log(line);
  }
}

function printResolutionHelp(): void {
  console.error("❌ Couldn't auto-detect your FFXIV install.");
  console.error('Set environment variables and try again, e.g.:');
  console.error(`  export ${FFXIV_PATH_ENV}="/path/to/${FFXIV_STEAM_INSTALL_DIR}/game"`);
  console.error(`  export ${WINE_PREFIX_ENV}="/path/to/SteamLibrary/steamapps/compatdata/${FFXIV_STEAM_APP_ID}/pfx"`);
  console.error('...or install via XLCore or Steam so it can be detected automatically.');
}

/**
 * Put back every file the most recent run backed up
 */
export function restoreLatestRun(backupManager: BackupManager): number {
  const entries = backupManager.getLatestRun();
  if (entries.length === 0) {
    console.log('⚠️  No backups found to restore');
    return 1;
  }

  let failures = 0;
  for (const entry of entries) {
    try {
      backupManager.restore(entry);
    } catch (error) {
      failures++;
      console.error(`❌ ${toError(error).message}`);
    }
  }
  return failures === 0 ? 0 : 1;
}

/**
 * Whole command-line flow; resolves to the process exit code
 */
export async function runSetup(options: SetupOptions, deps: SetupDependencies = {}): Promise<number> {
  const env = deps.env ?? process.env;
  const homeDir = deps.homeDir ?? os.homedir();
  const paths = getSetupPaths(env, homeDir);
  const backupManager = new BackupManager(paths.backupDir);

  if (options.restore) {
    return restoreLatestRun(backupManager);
  }

  if (checkPrerequisites(env).length > 0) {
    return 1;
  }

  let target: InstallationTarget;
  try {
    target = resolveInstallationTarget(deps.strategies ?? createDefaultStrategies(env, homeDir));
  } catch (error) {
    if (error instanceof ResolutionError) {
      printResolutionHelp();
      return 1;
    }
    throw error;
  }

  fs.mkdirSync(paths.workDir, { recursive: true });
  console.log(`Using ${paths.workDir} as our working directory.`);
  console.log(`Backups will be saved to ${paths.backupDir}`);
  printLines(describeTarget(target));

  if (!options.yes) {
    const confirm = deps.confirm ?? promptForConfirmation;
    if (!(await confirm(target))) {
      console.log('Aborted, nothing was changed.');
      return 1;
    }
  }

  const runner = deps.runner ?? new ProcessCommandRunner();
  const pipeline = new StepPipeline({
    paths,
    fetcher: deps.fetcher ?? new GitArchiveFetcher(runner),
    runner,
    reshadeVersion: options.reshadeVersion ?? env.RESHADE_VERSION ?? RESHADE_VERSION,
    refresh: options.update ?? false,
    env,
    homeDir,
    backupManager,
  });

  const report = await pipeline.run(target, deps.steps ?? createDefaultSteps());
  printLines(formatRunSummary(report));

  if (report.halted) {
    return 1;
  }

  console.log('\n✅ All done!\n');
  printLines(formatPostInstallInstructions(target.launcher));
  return 0;
}
