import * as fs from 'fs';
import * as path from 'path';
import { BaseStep } from '../base-step';
import type { StepContext } from '../types';
import { isSymlinkTo, pathOccupied, removePath } from '../utils';
import { CACHE_DIR_NAMES } from '../../config';
import { BASELINE_SHADERS_DIR, GPOSINGWAY_LINKED_DIRS } from '../../shared-constants';

/**
 * Replaces ReShade's baseline shaders with links into the GPosingway checkout
 */
export class LinkGposingwayStep extends BaseStep {
  getName(): string {
    return 'link-gposingway';
  }

  private links(ctx: StepContext): Array<{ link: string; target: string }> {
    const checkout = path.join(ctx.paths.cacheDir, CACHE_DIR_NAMES.GPOSINGWAY);
    return GPOSINGWAY_LINKED_DIRS.map(name => ({
      link: path.join(ctx.target.gamePath, name),
      target: path.join(checkout, name),
    }));
  }

  async checkSatisfied(ctx: StepContext): Promise<boolean> {
    return (
      !pathOccupied(path.join(ctx.target.gamePath, BASELINE_SHADERS_DIR)) &&
      this.links(ctx).every(({ link, target }) => isSymlinkTo(link, target))
    );
  }

  async doRun(ctx: StepContext): Promise<void> {
    const baseline = path.join(ctx.target.gamePath, BASELINE_SHADERS_DIR);
    if (pathOccupied(baseline)) {
      removePath(baseline);
      console.log(`✓ Removed baseline shaders at ${baseline}`);
    }

    for (const { link, target } of this.links(ctx)) {
      if (isSymlinkTo(link, target)) {
        continue;
      }
      if (pathOccupied(link)) {
        console.warn(`⚠️  Replacing existing ${link}`);
        removePath(link);
      }
      fs.symlinkSync(target, link, 'dir');
    }
  }

  async validateStep(ctx: StepContext): Promise<boolean> {
    return (await this.checkSatisfied(ctx)) && this.links(ctx).every(({ target }) => fs.existsSync(target));
  }
}
