import type { InstallationTarget, RunReport, StepFailure, StepOutcome } from '../types';
import type { InstallStep, StepContext } from './types';
import { BackupManager } from './backup-manager';
import { failureKindOf, toError } from './types';

export type PipelineServices = Omit<StepContext, 'target'> & {
  backupManager: BackupManager;
};

/**
 * Runs installation steps strictly in order.
 *
 * A step whose precondition already holds is skipped. Otherwise the files it
 * mutates are backed up, its action runs, and its postcondition is checked.
 * A failing required step, or any step whose backup fails, halts the run;
 * later steps get no outcome. Nothing is retried: re-running the whole
 * pipeline resumes at the first step that is not yet satisfied.
 *
 * Assumes a single concurrent invocation; there is no locking.
 */
export class StepPipeline {
  constructor(private readonly services: PipelineServices) {}

  // A check that throws answers "no"
  private async check(probe: () => Promise<boolean>): Promise<boolean> {
    try {
      return await probe();
    } catch (error) {
      return false;
    }
  }

  private fail(step: InstallStep, failure: StepFailure): StepOutcome {
    const name = step.getName();
    if (step.isOptional()) {
      console.log(`⚠️  ${name} failed (optional, continuing): ${failure.message}`);
    } else {
      console.error(`❌ ${name} failed: ${failure.message}`);
    }
    return { step: name, status: 'failed', failure };
  }

  private async runStep(step: InstallStep, ctx: StepContext): Promise<StepOutcome> {
    const name = step.getName();

    if (await this.check(() => step.isSatisfied(ctx))) {
      console.log(`⏭️  ${name} already done`);
      return { step: name, status: 'skipped' };
    }

    console.log(`📦 ${name}...`);

    try {
      for (const file of step.mutatedFiles(ctx)) {
        this.services.backupManager.backupIfNeeded(file);
      }
    } catch (error) {
      return this.fail(step, { kind: failureKindOf(error), message: toError(error).message });
    }

    try {
      await step.run(ctx);
    } catch (error) {
      return this.fail(step, { kind: failureKindOf(error), message: toError(error).message });
    }

    if (!(await this.check(() => step.verify(ctx)))) {
      return this.fail(step, { kind: 'verification', message: `Verification failed for ${name}` });
    }

    console.log(`✓ ${name} completed`);
    return { step: name, status: 'completed' };
  }

  async run(target: InstallationTarget, steps: readonly InstallStep[]): Promise<RunReport> {
    const { backupManager, ...rest } = this.services;
    backupManager.startRun();
    const ctx: StepContext = { ...rest, target };
    const outcomes: StepOutcome[] = [];
    let halted = false;

    for (const step of steps) {
      const outcome = await this.runStep(step, ctx);
      outcomes.push(outcome);

      // A backup failure halts even an optional step
      if (outcome.status === 'failed' && (!step.isOptional() || outcome.failure.kind === 'backup')) {
        halted = true;
        break;
      }
    }

    return { target, outcomes, backups: backupManager.getRecords(), halted };
  }
}
