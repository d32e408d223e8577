import * as fs from 'fs';
import * as path from 'path';
import { BaseStep } from '../base-step';
import type { StepContext } from '../types';

/**
 * Clone a git repository into the cache, or update the existing checkout
 * when the run asks for a refresh.
 */
export class FetchRepositoryStep extends BaseStep {
  constructor(
    private readonly name: string,
    private readonly url: string,
    private readonly cacheName: string
  ) {
    super();
  }

  getName(): string {
    return this.name;
  }

  checkoutDir(ctx: StepContext): string {
    return path.join(ctx.paths.cacheDir, this.cacheName);
  }

  private hasCheckout(ctx: StepContext): boolean {
    return fs.existsSync(path.join(this.checkoutDir(ctx), '.git'));
  }

  async checkSatisfied(ctx: StepContext): Promise<boolean> {
    return !ctx.refresh && this.hasCheckout(ctx);
  }

  async doRun(ctx: StepContext): Promise<void> {
    await ctx.fetcher.fetchRepository(this.url, this.checkoutDir(ctx));
  }

  async validateStep(ctx: StepContext): Promise<boolean> {
    return this.hasCheckout(ctx);
  }
}
