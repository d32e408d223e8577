import * as fs from 'fs';
import * as path from 'path';
import { BaseStep } from '../base-step';
import { FetchError, type StepContext } from '../types';
import { fileSize } from '../utils';
import { D3DCOMPILER_DLLS, MIN_REAL_DLL_SIZE } from '../../shared-constants';

const [PRIMARY_DLL] = D3DCOMPILER_DLLS;

export function prefixSystem32(prefixPath: string): string {
  return path.join(prefixPath, 'drive_c', 'windows', 'system32');
}

function isRealDll(filePath: string): boolean {
  return fileSize(filePath) > MIN_REAL_DLL_SIZE;
}

/**
 * Places Microsoft's d3dcompiler next to the game and inside the Wine
 * prefixes. ReShade compiles shaders with it; Wine's builtin does not work.
 * The same DLL is installed under the _47 and _43 names.
 */
export class D3dCompilerStep extends BaseStep {
  getName(): string {
    return 'install-d3dcompiler';
  }

  private systemDirs(ctx: StepContext): string[] {
    const dirs = [prefixSystem32(ctx.target.prefixPath)];
    if (ctx.target.protonPrefixPath) {
      const protonDir = prefixSystem32(ctx.target.protonPrefixPath);
      if (fs.existsSync(protonDir)) {
        dirs.push(protonDir);
      }
    }
    return dirs;
  }

  private destinations(ctx: StepContext): string[] {
    return [ctx.target.gamePath, ...this.systemDirs(ctx)].flatMap(dir => D3DCOMPILER_DLLS.map(dll => path.join(dir, dll)));
  }

  async checkSatisfied(ctx: StepContext): Promise<boolean> {
    return this.destinations(ctx).every(isRealDll);
  }

  mutatedFiles(ctx: StepContext): string[] {
    return this.systemDirs(ctx).flatMap(dir => D3DCOMPILER_DLLS.map(dll => path.join(dir, dll)));
  }

  private async obtainDll(ctx: StepContext): Promise<string> {
    const staged = path.join(ctx.target.gamePath, PRIMARY_DLL);
    if (isRealDll(staged)) {
      return staged;
    }

    console.log(`⬇️  Downloading native ${PRIMARY_DLL} via winetricks...`);
    const result = await ctx.runner.run('winetricks', ['--unattended', 'd3dcompiler_47'], {
      env: { ...ctx.env, WINEPREFIX: ctx.target.prefixPath },
    });
    if (result.exitCode !== 0) {
      console.warn(`⚠️  winetricks exited with code ${result.exitCode}, looking for the DLL anyway`);
    }

    // winetricks keeps the download in its cache and may also install into the prefix
    const candidates = [
      path.join(ctx.homeDir, '.cache', 'winetricks', 'd3dcompiler_47', PRIMARY_DLL),
      path.join(prefixSystem32(ctx.target.prefixPath), PRIMARY_DLL),
    ];
    const found = candidates.find(isRealDll);
    if (!found) {
      throw new FetchError(`Failed to obtain ${PRIMARY_DLL} via winetricks; try running: winetricks d3dcompiler_47`, 'winetricks');
    }
    return found;
  }

  async doRun(ctx: StepContext): Promise<void> {
    const source = await this.obtainDll(ctx);
    const staged = path.join(ctx.target.gamePath, PRIMARY_DLL);
    if (source !== staged) {
      fs.copyFileSync(source, staged);
    }

    for (const destination of this.destinations(ctx)) {
      if (destination !== staged) {
        fs.copyFileSync(staged, destination);
      }
    }
    console.log(`✓ d3dcompiler DLLs placed in ${[ctx.target.gamePath, ...this.systemDirs(ctx)].join(', ')}`);
  }
}
