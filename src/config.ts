/**
 * Working directory layout for ffxiv-reshade-setup
 *
 * Everything the installer owns lives under one working directory:
 * fetched repositories and archives in cache/, timestamped copies of
 * mutated config files in backups/, and ReShade's own data in reshade/.
 */

import * as os from 'os';
import * as path from 'path';
import { APP_DIR_NAME, WORKDIR_ENV } from './shared-constants';

export interface SetupPaths {
  workDir: string;
  cacheDir: string;
  backupDir: string;
  reshadeDataDir: string;
}

export const CACHE_DIR_NAMES = {
  RESHADE_INSTALLER: 'reshade-installer',
  GPOSINGWAY: 'gposingway',
} as const;

/**
 * XDG data home, falling back to ~/.local/share when unset or relative
 */
export function getDataHome(env: NodeJS.ProcessEnv = process.env, homeDir: string = os.homedir()): string {
  const xdg = env.XDG_DATA_HOME;
  if (xdg && path.isAbsolute(xdg)) {
    return xdg;
  }
  return path.join(homeDir, '.local', 'share');
}

export function getSetupPaths(env: NodeJS.ProcessEnv = process.env, homeDir: string = os.homedir()): SetupPaths {
  const override = env[WORKDIR_ENV];
  const workDir = override ? path.resolve(override) : path.join(getDataHome(env, homeDir), APP_DIR_NAME);

  return {
    workDir,
    cacheDir: path.join(workDir, 'cache'),
    backupDir: path.join(workDir, 'backups'),
    reshadeDataDir: path.join(workDir, 'reshade'),
  };
}
