export type BackupRecord =
  | { kind: 'copied'; originalPath: string; backupPath: string; createdAt: number }
  | { kind: 'absent'; originalPath: string; createdAt: number };

export type CopiedBackup = Extract<BackupRecord, { kind: 'copied' }>;

export interface BackupIndexEntry extends CopiedBackup {
  runId: string;
}

export interface BackupIndex {
  entries: BackupIndexEntry[];
  timestamp: number;
}
