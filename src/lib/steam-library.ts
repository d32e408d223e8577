import * as fs from 'fs';
import * as path from 'path';
import * as os from 'os';
import { globSync } from 'glob';
import type { KnownInstall } from '../types';
import { parseVdf, getVdfObject, getVdfString } from './vdf-parser';
import { toError } from '../installers/types';

/**
 * Read-only view of a launcher's installed applications
 */
export interface LauncherManifestStore {
  listKnownInstalls(): KnownInstall[];
}

/**
 * Where Steam keeps its root on Linux: the legacy symlink, the XDG location
 * and the Flatpak sandbox
 */
export function getSteamRoots(homeDir: string = os.homedir()): string[] {
  return [
    path.join(homeDir, '.steam', 'steam'),
    path.join(homeDir, '.local', 'share', 'Steam'),
    path.join(homeDir, '.var', 'app', 'com.valvesoftware.Steam', '.local', 'share', 'Steam'),
  ];
}

function canonical(dirPath: string): string {
  try {
    return fs.realpathSync(dirPath);
  } catch {
    return path.resolve(dirPath);
  }
}

/**
 * Library folders listed in a Steam root's libraryfolders.vdf
 */
export function readLibraryFolders(steamRoot: string): string[] {
  const candidates = [
    path.join(steamRoot, 'config', 'libraryfolders.vdf'),
    path.join(steamRoot, 'steamapps', 'libraryfolders.vdf'),
  ];
  const vdfPath = candidates.find(candidate => fs.existsSync(candidate));
  if (!vdfPath) {
    return [];
  }

  try {
    const folders = getVdfObject(parseVdf(fs.readFileSync(vdfPath, 'utf-8')), 'libraryfolders');
    if (!folders) {
      return [];
    }
    return Object.values(folders).flatMap(entry => {
      const libraryPath = typeof entry === 'object' ? getVdfString(entry, 'path') : undefined;
      return libraryPath ? [libraryPath] : [];
    });
  } catch (error) {
    console.warn(`⚠️  Could not parse ${vdfPath}: ${toError(error).message}`);
    return [];
  }
}

function readInstallDir(manifestPath: string): string | undefined {
  try {
    const appState = getVdfObject(parseVdf(fs.readFileSync(manifestPath, 'utf-8')), 'AppState');
    return appState ? getVdfString(appState, 'installdir') : undefined;
  } catch {
    return undefined;
  }
}

export class SteamLibraryStore implements LauncherManifestStore {
  constructor(private readonly steamRoots: string[] = getSteamRoots()) {}

  listLibraries(): string[] {
    const seen = new Set<string>();
    const libraries: string[] = [];

    for (const root of this.steamRoots) {
      for (const library of readLibraryFolders(root)) {
        const key = canonical(library);
        if (seen.has(key) || !fs.existsSync(library) || !fs.statSync(library).isDirectory()) {
          continue;
        }
        seen.add(key);
        libraries.push(library);
      }
    }

    return libraries;
  }

  listKnownInstalls(): KnownInstall[] {
    return this.listLibraries().flatMap(libraryPath => {
      const manifests = globSync('appmanifest_*.acf', {
        cwd: path.join(libraryPath, 'steamapps'),
        absolute: true,
        nodir: true,
      }).sort();

      return manifests.flatMap(manifestPath => {
        const match = path.basename(manifestPath).match(/^appmanifest_(\d+)\.acf$/);
        if (!match) {
          return [];
        }
        const install: KnownInstall = { id: Number(match[1]), libraryPath };
        const installDir = readInstallDir(manifestPath);
        if (installDir) {
          install.installDir = installDir;
        }
        return [install];
      });
    });
  }
}
