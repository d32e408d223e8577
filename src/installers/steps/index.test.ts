import * as fs from 'fs';
import * as path from 'path';
import { createDefaultSteps } from './index';
import { StepPipeline } from '../step-pipeline';
import { BackupManager } from '../backup-manager';
import {
  FakeCommandRunner,
  FakeFetcher,
  SUCCESS,
  TEST_HOME_DIR,
  TEST_TEMP_DIR,
  TEST_WORK_DIR,
  createFakeGameInstall,
  createStepContext,
  writeTestFile,
} from '../../test-setup';
import { MIN_REAL_DLL_SIZE, REPOSITORIES } from '../../shared-constants';
import type { InstallationTarget } from '../../types';

/**
 * Relative path -> file content or link target, for everything under root
 */
function captureTree(root: string): Record<string, string> {
  const tree: Record<string, string> = {};
  const walk = (dir: string): void => {
    for (const name of fs.readdirSync(dir).sort()) {
      const full = path.join(dir, name);
      const key = path.relative(root, full);
      const stats = fs.lstatSync(full);
      if (stats.isSymbolicLink()) {
        tree[key] = `-> ${fs.readlinkSync(full)}`;
      } else if (stats.isDirectory()) {
        tree[key] = '<dir>';
        walk(full);
      } else {
        tree[key] = fs.readFileSync(full).toString('base64');
      }
    }
  };
  walk(root);
  return tree;
}

describe('createDefaultSteps', () => {
  let target: InstallationTarget;
  let fetcher: FakeFetcher;
  let runner: FakeCommandRunner;

  beforeEach(() => {
    jest.spyOn(console, 'log').mockImplementation(() => {});
    jest.spyOn(console, 'warn').mockImplementation(() => {});
    target = { launcher: 'steam', ...createFakeGameInstall(path.join(TEST_HOME_DIR, 'games', 'ffxiv')) };

    fetcher = new FakeFetcher({
      repository: (url, destDir) => {
        if (url === REPOSITORIES.GPOSINGWAY) {
          writeTestFile(path.join(destDir, 'ReShade.ini'), '[GENERAL]\nEffectSearchPaths=.\\reshade-shaders\\Shaders\\**\n\n[INPUT]\nKeyOverlay=36,0,0,0\n');
          writeTestFile(path.join(destDir, 'ReShadePreset.ini'), 'Techniques=Bloom@Bloom.fx\n');
          writeTestFile(path.join(destDir, 'reshade-presets', 'GPosingway', 'Portrait.ini'), 'Techniques=Bloom@Bloom.fx\n');
          writeTestFile(path.join(destDir, 'reshade-shaders', 'Shaders', 'Bloom.fx'), '// bloom');
        }
      },
      archive: (_url, destDir) => {
        writeTestFile(path.join(destDir, 'pkg-master', 'Shaders', `${path.basename(destDir)}.fx`), '// package');
      },
    });

    runner = new FakeCommandRunner(command => {
      if (command === './reshade-linux.sh') {
        writeTestFile(path.join(target.gamePath, 'dxgi.dll'), 'reshade');
        writeTestFile(path.join(target.gamePath, 'ReShade.ini'), '[GENERAL]\nPerformanceMode=0\n');
        writeTestFile(path.join(target.gamePath, 'ReShade_shaders', 'Shaders', 'Default.fx'), '// default');
      }
      if (command === 'winetricks') {
        writeTestFile(path.join(TEST_HOME_DIR, '.cache', 'winetricks', 'd3dcompiler_47', 'd3dcompiler_47.dll'), Buffer.alloc(MIN_REAL_DLL_SIZE + 1));
      }
      return SUCCESS;
    });
  });

  function createPipeline(): StepPipeline {
    const { target: _unused, ...services } = createStepContext(target, { fetcher, runner });
    return new StepPipeline({ ...services, backupManager: new BackupManager(services.paths.backupDir) });
  }

  it('should list the installation steps in order', () => {
    expect(createDefaultSteps().map(step => step.getName())).toEqual([
      'fetch-reshade-installer',
      'install-reshade',
      'install-d3dcompiler',
      'fetch-gposingway',
      'link-gposingway',
      'merge-gposingway-config',
      'install-shader-packages',
      'configure-reshade-for-wine',
    ]);
  });

  it('should install everything and do nothing on a second run', async () => {
    const pipeline = createPipeline();
    const first = await pipeline.run(target, createDefaultSteps());

    expect(first.halted).toBe(false);
    expect(first.outcomes.map(outcome => outcome.status)).toEqual(Array<string>(8).fill('completed'));
    expect(first.backups.map(record => [record.kind, path.basename(record.originalPath)])).toEqual([
      ['absent', 'ReShade.ini'],
      ['absent', 'd3dcompiler_47.dll'],
      ['absent', 'd3dcompiler_43.dll'],
      ['absent', 'ReShadePreset.ini'],
    ]);

    const installRoot = path.join(TEST_TEMP_DIR, 'home', 'games', 'ffxiv');
    const afterFirst = captureTree(installRoot);
    const cacheAfterFirst = captureTree(path.join(TEST_WORK_DIR, 'cache'));
    const commandCount = runner.calls.length;

    const second = await pipeline.run(target, createDefaultSteps());

    expect(second.outcomes.map(outcome => outcome.status)).toEqual(Array<string>(8).fill('skipped'));
    expect(second.backups).toEqual([]);
    expect(runner.calls).toHaveLength(commandCount);
    expect(fetcher.repositories).toHaveLength(2);
    expect(fetcher.archives).toHaveLength(2);
    expect(captureTree(installRoot)).toEqual(afterFirst);
    expect(captureTree(path.join(TEST_WORK_DIR, 'cache'))).toEqual(cacheAfterFirst);
  });

  it('should leave the game configured for Wine', async () => {
    await createPipeline().run(target, createDefaultSteps());

    expect(fs.readFileSync(path.join(target.gamePath, 'ReShade.ini'), 'utf-8')).toBe(
      [
        '[GENERAL]',
        'PerformanceMode=1',
        String.raw`EffectSearchPaths=X:\games\ffxiv\game\reshade-shaders\Shaders\**`,
        String.raw`TextureSearchPaths=X:\games\ffxiv\game\reshade-shaders\Textures\**`,
        String.raw`IntermediateCachePath=X:\games\ffxiv\game\reshade-cache`,
        'NoReloadOnInit=1',
        '',
        '[INPUT]',
        'KeyOverlay=113,0,1,0',
        '',
      ].join('\n')
    );
    expect(fs.existsSync(path.join(target.gamePath, 'ReShade_shaders'))).toBe(false);
    expect(fs.readFileSync(path.join(target.gamePath, 'reshade-shaders', 'Shaders', 'immerse.fx'), 'utf-8')).toBe('// package');
  });
});
