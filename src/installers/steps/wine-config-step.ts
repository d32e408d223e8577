import * as fs from 'fs';
import * as path from 'path';
import { BaseStep } from '../base-step';
import type { StepContext } from '../types';
import type { ConfigPatch } from '../../types';
import { needsPatch, patchConfigFile } from '../../lib/config-patcher';
import { toWinePath } from '../utils';
import { RESHADE_OVERLAY_KEY } from '../../shared-constants';

export const RESHADE_CACHE_DIR = 'reshade-cache';

/**
 * ReShade under Wine cannot follow the symlinked shader folders through
 * relative paths, so search and cache paths are pinned to absolute drive paths.
 */
export function buildWinePatches(gamePath: string, homeDir: string): ConfigPatch[] {
  const game = toWinePath(gamePath, homeDir);
  const general = (key: string, value: string): ConfigPatch => ({ mode: 'overwrite', section: 'GENERAL', key, value });

  return [
    general('EffectSearchPaths', `${game}\\reshade-shaders\\Shaders\\**`),
    general('TextureSearchPaths', `${game}\\reshade-shaders\\Textures\\**`),
    general('IntermediateCachePath', `${game}\\${RESHADE_CACHE_DIR}`),
    general('NoReloadOnInit', '1'),
    general('PerformanceMode', '1'),
    { mode: 'overwrite', section: 'INPUT', key: 'KeyOverlay', value: RESHADE_OVERLAY_KEY },
  ];
}

export class WineConfigStep extends BaseStep {
  getName(): string {
    return 'configure-reshade-for-wine';
  }

  private iniPath(ctx: StepContext): string {
    return path.join(ctx.target.gamePath, 'ReShade.ini');
  }

  async checkSatisfied(ctx: StepContext): Promise<boolean> {
    return (
      fs.existsSync(path.join(ctx.target.gamePath, RESHADE_CACHE_DIR)) &&
      !needsPatch(this.iniPath(ctx), buildWinePatches(ctx.target.gamePath, ctx.homeDir))
    );
  }

  mutatedFiles(ctx: StepContext): string[] {
    return [this.iniPath(ctx)];
  }

  async doRun(ctx: StepContext): Promise<void> {
    fs.mkdirSync(path.join(ctx.target.gamePath, RESHADE_CACHE_DIR), { recursive: true });
    patchConfigFile(this.iniPath(ctx), buildWinePatches(ctx.target.gamePath, ctx.homeDir));
  }
}
