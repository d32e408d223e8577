import * as fs from 'fs';
import * as path from 'path';
import { SteamLibraryStore, getSteamRoots, readLibraryFolders } from './steam-library';
import { TEST_HOME_DIR, TEST_TEMP_DIR, writeTestFile } from '../test-setup';

function libraryFoldersVdf(paths: string[]): string {
  const entries = paths
    .map((libraryPath, i) => `\t"${i}"\n\t{\n\t\t"path"\t\t"${libraryPath}"\n\t}\n`)
    .join('');
  return `"libraryfolders"\n{\n${entries}}\n`;
}

describe('steam-library', () => {
  let steamRoot: string;
  let secondLibrary: string;

  beforeEach(() => {
    jest.spyOn(console, 'warn').mockImplementation(() => {});
    steamRoot = path.join(TEST_HOME_DIR, '.local', 'share', 'Steam');
    secondLibrary = path.join(TEST_TEMP_DIR, 'mnt', 'SteamLibrary');
    fs.mkdirSync(path.join(steamRoot, 'steamapps'), { recursive: true });
    fs.mkdirSync(path.join(secondLibrary, 'steamapps'), { recursive: true });
  });

  describe('getSteamRoots', () => {
    it('should list the legacy, XDG and Flatpak roots', () => {
      expect(getSteamRoots('/home/tester')).toEqual([
        '/home/tester/.steam/steam',
        '/home/tester/.local/share/Steam',
        '/home/tester/.var/app/com.valvesoftware.Steam/.local/share/Steam',
      ]);
    });
  });

  describe('readLibraryFolders', () => {
    it('should read library paths from config/libraryfolders.vdf', () => {
      writeTestFile(path.join(steamRoot, 'config', 'libraryfolders.vdf'), libraryFoldersVdf([steamRoot, secondLibrary]));

      expect(readLibraryFolders(steamRoot)).toEqual([steamRoot, secondLibrary]);
    });

    it('should fall back to steamapps/libraryfolders.vdf', () => {
      writeTestFile(path.join(steamRoot, 'steamapps', 'libraryfolders.vdf'), libraryFoldersVdf([secondLibrary]));

      expect(readLibraryFolders(steamRoot)).toEqual([secondLibrary]);
    });

    it('should return nothing for a missing or broken file', () => {
      expect(readLibraryFolders(path.join(TEST_TEMP_DIR, 'no-steam'))).toEqual([]);

      writeTestFile(path.join(steamRoot, 'config', 'libraryfolders.vdf'), '"libraryfolders" {');
      expect(readLibraryFolders(steamRoot)).toEqual([]);
    });
  });

  describe('SteamLibraryStore', () => {
    it('should list installed apps with their install directory', () => {
      writeTestFile(path.join(steamRoot, 'config', 'libraryfolders.vdf'), libraryFoldersVdf([steamRoot, secondLibrary]));
      writeTestFile(path.join(steamRoot, 'steamapps', 'appmanifest_228980.acf'), '"AppState" { "appid" "228980" }');
      writeTestFile(
        path.join(secondLibrary, 'steamapps', 'appmanifest_39210.acf'),
        '"AppState"\n{\n\t"appid"\t"39210"\n\t"installdir"\t"FINAL FANTASY XIV Online"\n}\n'
      );

      const store = new SteamLibraryStore([steamRoot]);

      expect(store.listKnownInstalls()).toEqual([
        { id: 228980, libraryPath: steamRoot },
        { id: 39210, libraryPath: secondLibrary, installDir: 'FINAL FANTASY XIV Online' },
      ]);
    });

    it('should not list a library twice when roots alias each other', () => {
      writeTestFile(path.join(steamRoot, 'config', 'libraryfolders.vdf'), libraryFoldersVdf([steamRoot]));
      const legacyRoot = path.join(TEST_HOME_DIR, '.steam', 'steam');
      fs.mkdirSync(path.dirname(legacyRoot), { recursive: true });
      fs.symlinkSync(steamRoot, legacyRoot);

      const store = new SteamLibraryStore([legacyRoot, steamRoot]);

      expect(store.listLibraries()).toEqual([steamRoot]);
    });

    it('should skip libraries that no longer exist', () => {
      const gone = path.join(TEST_TEMP_DIR, 'unplugged-drive');
      writeTestFile(path.join(steamRoot, 'config', 'libraryfolders.vdf'), libraryFoldersVdf([gone, steamRoot]));

      expect(new SteamLibraryStore([steamRoot]).listLibraries()).toEqual([steamRoot]);
    });
  });
});
