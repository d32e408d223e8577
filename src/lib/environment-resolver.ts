import * as fs from 'fs';
import * as path from 'path';
import * as os from 'os';
import type { InstallationTarget, LauncherKind } from '../types';
import { ResolutionError, toError } from '../installers/types';
import { expandTilde, isDirectoryWritable } from '../installers/utils';
import { getValue, parseConfigDocument } from './config-document';
import { LauncherManifestStore, SteamLibraryStore, getSteamRoots } from './steam-library';
import {
  FFXIV_PATH_ENV,
  FFXIV_STEAM_APP_ID,
  FFXIV_STEAM_INSTALL_DIR,
  WINE_PREFIX_ENV,
} from '../shared-constants';

/**
 * One detection source. Returns null when the source has nothing to offer;
 * existence checks happen in resolveInstallationTarget.
 */
export interface ResolverStrategy {
  readonly launcher: LauncherKind;
  describe(): string;
  tryResolve(): InstallationTarget | null;
}

export class EnvironmentOverrideStrategy implements ResolverStrategy {
  readonly launcher = 'manual' as const;

  constructor(
    private readonly env: NodeJS.ProcessEnv = process.env,
    private readonly homeDir: string = os.homedir()
  ) {}

  describe(): string {
    return `environment (${FFXIV_PATH_ENV}, ${WINE_PREFIX_ENV})`;
  }

  tryResolve(): InstallationTarget | null {
    const gamePath = this.env[FFXIV_PATH_ENV];
    const prefixPath = this.env[WINE_PREFIX_ENV];
    if (!gamePath || !prefixPath) {
      return null;
    }
    return {
      launcher: this.launcher,
      gamePath: path.resolve(expandTilde(gamePath, this.homeDir)),
      prefixPath: path.resolve(expandTilde(prefixPath, this.homeDir)),
    };
  }
}

export class SteamStrategy implements ResolverStrategy {
  readonly launcher = 'steam' as const;

  constructor(
    private readonly store: LauncherManifestStore = new SteamLibraryStore(),
    private readonly appId: number = FFXIV_STEAM_APP_ID
  ) {}

  describe(): string {
    return 'Steam';
  }

  tryResolve(): InstallationTarget | null {
    const install = this.store.listKnownInstalls().find(candidate => candidate.id === this.appId);
    if (!install) {
      return null;
    }

    const steamapps = path.join(install.libraryPath, 'steamapps');
    return {
      launcher: this.launcher,
      gamePath: path.join(steamapps, 'common', install.installDir ?? FFXIV_STEAM_INSTALL_DIR, 'game'),
      prefixPath: path.join(steamapps, 'compatdata', String(this.appId), 'pfx'),
    };
  }
}

export class XLCoreStrategy implements ResolverStrategy {
  readonly launcher = 'xlcore' as const;
  private readonly xlcoreDir: string;

  constructor(homeDir: string = os.homedir()) {
    this.xlcoreDir = path.join(homeDir, '.xlcore');
  }

  describe(): string {
    return 'XLCore';
  }

  tryResolve(): InstallationTarget | null {
    const launcherIni = path.join(this.xlcoreDir, 'launcher.ini');
    if (!fs.existsSync(launcherIni)) {
      return null;
    }

    let gameBase: string | undefined;
    try {
      gameBase = getValue(parseConfigDocument(fs.readFileSync(launcherIni, 'utf-8'), launcherIni), null, 'GamePath');
    } catch (error) {
      console.warn(`⚠️  Could not read ${launcherIni}: ${toError(error).message}`);
      return null;
    }
    if (!gameBase) {
      return null;
    }

    // GamePath points at the install root; the executables live in game/
    return {
      launcher: this.launcher,
      gamePath: path.join(gameBase, 'game'),
      prefixPath: path.join(this.xlcoreDir, 'wineprefix'),
      protonPrefixPath: path.join(this.xlcoreDir, 'protonprefix'),
    };
  }
}

/**
 * Detection order: manual override, Steam, then XLCore
 */
export function createDefaultStrategies(
  env: NodeJS.ProcessEnv = process.env,
  homeDir: string = os.homedir()
): ResolverStrategy[] {
  return [
    new EnvironmentOverrideStrategy(env, homeDir),
    new SteamStrategy(new SteamLibraryStore(getSteamRoots(homeDir))),
    new XLCoreStrategy(homeDir),
  ];
}

/**
 * First strategy whose paths exist and are writable wins; nothing is merged
 * across strategies.
 */
export function resolveInstallationTarget(strategies: ResolverStrategy[]): InstallationTarget {
  for (const strategy of strategies) {
    let target: InstallationTarget | null;
    try {
      target = strategy.tryResolve();
    } catch (error) {
      console.warn(`⚠️  ${strategy.describe()} detection failed: ${toError(error).message}`);
      continue;
    }
    if (!target) {
      continue;
    }

    const unusable = [target.gamePath, target.prefixPath].filter(dir => !isDirectoryWritable(dir));
    if (unusable.length > 0) {
      console.warn(`⚠️  Ignoring ${strategy.describe()}: ${unusable.join(', ')} missing or not writable`);
      continue;
    }

    return Object.freeze({ ...target });
  }

  throw new ResolutionError();
}
