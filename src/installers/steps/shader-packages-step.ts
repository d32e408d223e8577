import * as fs from 'fs';
import * as path from 'path';
import { globSync } from 'glob';
import { BaseStep } from '../base-step';
import { FetchError, toError, type StepContext } from '../types';
import { removePath } from '../utils';
import { SHADER_PACKAGES, type ShaderPackage } from '../../shared-constants';

const CONTENT_DIRS = ['Shaders', 'Textures'] as const;

interface CopyItem {
  source: string;
  destination: string;
}

/**
 * Extra shader packages some GPosingway presets depend on. They are copied
 * into the linked reshade-shaders tree next to GPosingway's own shaders.
 */
export class ShaderPackagesStep extends BaseStep {
  constructor(private readonly packages: readonly ShaderPackage[] = SHADER_PACKAGES) {
    super();
  }

  getName(): string {
    return 'install-shader-packages';
  }

  isOptional(): boolean {
    return true;
  }

  private archiveDir(ctx: StepContext, pkg: ShaderPackage): string {
    return path.join(ctx.paths.cacheDir, pkg.name.toLowerCase());
  }

  /**
   * GitHub archives unpack into a single <repo>-<branch>/ directory
   */
  private findExtractedRoot(ctx: StepContext, pkg: ShaderPackage): string | undefined {
    const archiveDir = this.archiveDir(ctx, pkg);
    if (!fs.existsSync(archiveDir)) {
      return undefined;
    }
    const [shaders] = globSync('*/Shaders', { cwd: archiveDir, absolute: true }).sort();
    return shaders === undefined ? undefined : path.dirname(shaders);
  }

  private copyItems(ctx: StepContext, root: string): CopyItem[] {
    return CONTENT_DIRS.flatMap(dir => {
      const sourceDir = path.join(root, dir);
      if (!fs.existsSync(sourceDir)) {
        return [];
      }
      const destinationDir = path.join(ctx.target.gamePath, 'reshade-shaders', dir);
      return fs.readdirSync(sourceDir).sort().map(name => ({
        source: path.join(sourceDir, name),
        destination: path.join(destinationDir, name),
      }));
    });
  }

  async checkSatisfied(ctx: StepContext): Promise<boolean> {
    return this.packages.every(pkg => {
      const root = this.findExtractedRoot(ctx, pkg);
      return root !== undefined && this.copyItems(ctx, root).every(({ destination }) => fs.existsSync(destination));
    });
  }

  private async installPackage(ctx: StepContext, pkg: ShaderPackage): Promise<void> {
    let root = this.findExtractedRoot(ctx, pkg);
    if (root === undefined) {
      await ctx.fetcher.fetchArchive(pkg.url, this.archiveDir(ctx, pkg));
      root = this.findExtractedRoot(ctx, pkg);
    }
    if (root === undefined) {
      throw new FetchError(`${pkg.name} archive has no Shaders directory`, pkg.url);
    }

    for (const { source, destination } of this.copyItems(ctx, root)) {
      fs.mkdirSync(path.dirname(destination), { recursive: true });
      if (fs.statSync(source).isDirectory()) {
        removePath(destination);
        fs.cpSync(source, destination, { recursive: true });
      } else {
        fs.copyFileSync(source, destination);
      }
    }
    console.log(`✓ ${pkg.name} installed`);
  }

  async doRun(ctx: StepContext): Promise<void> {
    const failures: string[] = [];

    for (const pkg of this.packages) {
      try {
        await this.installPackage(ctx, pkg);
      } catch (error) {
        console.warn(`⚠️  ${pkg.name}: ${toError(error).message}`);
        failures.push(`${pkg.name}: ${toError(error).message}`);
      }
    }

    if (failures.length > 0) {
      throw new FetchError(`Failed to install shader packages (${failures.join('; ')})`, this.packages.map(pkg => pkg.url).join(' '));
    }
  }
}
