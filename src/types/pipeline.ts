import type { BackupRecord } from './backup';
import type { InstallationTarget } from './target';

export type FailureKind =
  | 'resolution'
  | 'fetch'
  | 'verification'
  | 'backup'
  | 'patch'
  | 'command'
  | 'unexpected';

export interface StepFailure {
  kind: FailureKind;
  message: string;
}

export type StepOutcome =
  | { step: string; status: 'skipped' | 'completed' }
  | { step: string; status: 'failed'; failure: StepFailure };

export interface RunReport {
  target: InstallationTarget;
  outcomes: StepOutcome[];
  backups: BackupRecord[];
  halted: boolean;
}
