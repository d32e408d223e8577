import type { InstallStep, StepContext } from './types';

export abstract class BaseStep implements InstallStep {
  abstract getName(): string;
  abstract checkSatisfied(ctx: StepContext): Promise<boolean>;
  abstract doRun(ctx: StepContext): Promise<void>;

  isOptional(): boolean {
    return false;
  }

  /**
   * Files this step rewrites; the pipeline backs them up before run()
   */
  mutatedFiles(_ctx: StepContext): string[] {
    return [];
  }

  /**
   * Postcondition. Most steps are done exactly when their precondition says so.
   */
  async validateStep(ctx: StepContext): Promise<boolean> {
    return this.checkSatisfied(ctx);
  }

  isSatisfied(ctx: StepContext): Promise<boolean> {
    return this.checkSatisfied(ctx);
  }

  run(ctx: StepContext): Promise<void> {
    return this.doRun(ctx);
  }

  verify(ctx: StepContext): Promise<boolean> {
    return this.validateStep(ctx);
  }
}
