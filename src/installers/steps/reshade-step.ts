import * as fs from 'fs';
import * as path from 'path';
import { BaseStep } from '../base-step';
import type { StepContext } from '../types';
import { runChecked } from '../../lib/command-runner';
import { CACHE_DIR_NAMES } from '../../config';

export const RESHADE_INSTALL_SCRIPT = './reshade-linux.sh';

/**
 * Answers to reshade-linux.sh, in prompt order: install, game path,
 * confirm path, no Vulkan, 64-bit, dxgi override, confirm, then exit.
 */
export function buildInstallerAnswers(gamePath: string): string {
  return ['i', gamePath, 'y', 'n', '64', 'dxgi', 'y', ''].join('\n');
}

/**
 * Environment for the installer script. Variables the user already set win,
 * except the ReShade version, which the caller resolves from flag, env and default.
 */
export function buildInstallerEnv(ctx: StepContext): NodeJS.ProcessEnv {
  return {
    MAIN_PATH: ctx.paths.reshadeDataDir,
    SHADER_REPOS: '',
    RESHADE_ADDON_SUPPORT: '1',
    ...ctx.env,
    RESHADE_VERSION: ctx.reshadeVersion,
  };
}

export class ReshadeStep extends BaseStep {
  getName(): string {
    return 'install-reshade';
  }

  async checkSatisfied(ctx: StepContext): Promise<boolean> {
    return fs.existsSync(path.join(ctx.target.gamePath, 'dxgi.dll'));
  }

  mutatedFiles(ctx: StepContext): string[] {
    return [path.join(ctx.target.gamePath, 'ReShade.ini')];
  }

  async doRun(ctx: StepContext): Promise<void> {
    const installerDir = path.join(ctx.paths.cacheDir, CACHE_DIR_NAMES.RESHADE_INSTALLER);
    fs.mkdirSync(ctx.paths.reshadeDataDir, { recursive: true });

    console.log(`   ReShade ${ctx.reshadeVersion} with addon support -> ${ctx.target.gamePath}`);
    await runChecked(ctx.runner, RESHADE_INSTALL_SCRIPT, [], {
      cwd: installerDir,
      env: buildInstallerEnv(ctx),
      input: buildInstallerAnswers(ctx.target.gamePath),
    });
  }
}
