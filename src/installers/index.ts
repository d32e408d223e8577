export type { InstallStep, StepContext } from './types';
export {
  SetupError,
  ResolutionError,
  FetchError,
  VerificationError,
  BackupError,
  PatchError,
  CommandError,
  failureKindOf,
} from './types';
export { BackupManager, formatBackupTimestamp } from './backup-manager';
export { BaseStep } from './base-step';
export { StepPipeline } from './step-pipeline';
export type { PipelineServices } from './step-pipeline';
export { createDefaultSteps } from './steps';
export { expandTilde, toWinePath } from './utils';
