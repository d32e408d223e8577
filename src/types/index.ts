// Target types
export type { LauncherKind, InstallationTarget, KnownInstall } from './target';

// Config document types
export type { ConfigLine, ConfigEntry, ConfigSection, ConfigDocument, ConfigPatch } from './config-document';

// Backup types
export type { BackupRecord, CopiedBackup, BackupIndexEntry, BackupIndex } from './backup';

// Pipeline types
export type { FailureKind, StepFailure, StepOutcome, RunReport } from './pipeline';
