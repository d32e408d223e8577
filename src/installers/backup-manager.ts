import * as fs from 'fs';
import * as path from 'path';
import type { BackupIndex, BackupIndexEntry, BackupRecord, CopiedBackup } from '../types';
import { BackupError, toError } from './types';

function pad(value: number, width = 2): string {
  return String(value).padStart(width, '0');
}

/**
 * Local wall-clock timestamp with millisecond resolution: YYYYMMDD_HHMMSS_mmm
 */
export function formatBackupTimestamp(date: Date): string {
  return (
    `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}_` +
    `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}_` +
    pad(date.getMilliseconds(), 3)
  );
}

/**
 * Snapshots files before the installer first touches them in a run.
 *
 * Within a run the first backupIfNeeded() call for a path copies it and later
 * calls return that same record; startRun() begins a new run. Copies are also
 * listed in backup-index.json so a later invocation can restore the most
 * recent run.
 */
export class BackupManager {
  private readonly indexFile: string;
  private readonly records = new Map<string, BackupRecord>();
  private startedAt = '';
  private sameStampRuns = 0;
  private currentRunId = '';

  constructor(
    private readonly backupDir: string,
    private readonly now: () => Date = () => new Date()
  ) {
    this.indexFile = path.join(this.backupDir, 'backup-index.json');
    this.startRun();
  }

  get runId(): string {
    return this.currentRunId;
  }

  /**
   * Forget this manager's records and give later backups a new run id
   */
  startRun(): void {
    this.records.clear();
    const startedAt = this.now().toISOString();
    this.sameStampRuns = startedAt === this.startedAt ? this.sameStampRuns + 1 : 0;
    this.startedAt = startedAt;
    this.currentRunId = this.sameStampRuns === 0 ? startedAt : `${startedAt}#${this.sameStampRuns}`;
  }

  private ensureBackupDir(): void {
    if (!fs.existsSync(this.backupDir)) {
      fs.mkdirSync(this.backupDir, { recursive: true });
    }
  }

  private nextBackupPath(filePath: string, createdAt: Date): string {
    const base = `${path.basename(filePath)}.${formatBackupTimestamp(createdAt)}`;
    let candidate = path.join(this.backupDir, base);
    for (let n = 1; fs.existsSync(candidate); n++) {
      candidate = path.join(this.backupDir, `${base}_${n}`);
    }
    return candidate;
  }

  backupIfNeeded(filePath: string): BackupRecord {
    const originalPath = path.resolve(filePath);
    const existing = this.records.get(originalPath);
    if (existing) {
      return existing;
    }

    const createdAt = this.now();

    if (!fs.existsSync(originalPath)) {
      const absent: BackupRecord = { kind: 'absent', originalPath, createdAt: createdAt.getTime() };
      this.records.set(originalPath, absent);
      return absent;
    }

    try {
      this.ensureBackupDir();
      const backupPath = this.nextBackupPath(originalPath, createdAt);
      fs.copyFileSync(originalPath, backupPath, fs.constants.COPYFILE_EXCL);

      const record: CopiedBackup = { kind: 'copied', originalPath, backupPath, createdAt: createdAt.getTime() };
      this.records.set(originalPath, record);
      this.appendToIndex(record);
      console.log(`✓ Backed up ${originalPath} to ${backupPath}`);
      return record;
    } catch (error) {
      throw new BackupError(`Failed to create backup of ${originalPath}: ${toError(error).message}`, originalPath, toError(error));
    }
  }

  restore(record: BackupRecord): void {
    if (record.kind === 'absent') {
      // Nothing existed before the run, so restoring means removing what the run created
      if (fs.existsSync(record.originalPath)) {
        fs.rmSync(record.originalPath, { force: true });
        console.log(`✓ Removed ${record.originalPath} (it did not exist before)`);
      }
      return;
    }

    if (!fs.existsSync(record.backupPath)) {
      throw new BackupError(`Backup file not found: ${record.backupPath}`, record.originalPath);
    }

    try {
      fs.copyFileSync(record.backupPath, record.originalPath);
      console.log(`✓ Restored ${record.originalPath} from backup`);
    } catch (error) {
      throw new BackupError(`Failed to restore ${record.originalPath}: ${toError(error).message}`, record.originalPath, toError(error));
    }
  }

  getRecords(): BackupRecord[] {
    return [...this.records.values()];
  }

  readIndex(): BackupIndex {
    if (!fs.existsSync(this.indexFile)) {
      return { entries: [], timestamp: Date.now() };
    }

    try {
      const parsed: unknown = JSON.parse(fs.readFileSync(this.indexFile, 'utf-8'));
      if (isBackupIndex(parsed)) {
        return parsed;
      }
      console.warn('⚠️  Backup index has an unexpected shape, starting fresh');
    } catch (error) {
      console.warn(`⚠️  Failed to read backup index, starting fresh: ${toError(error).message}`);
    }
    return { entries: [], timestamp: Date.now() };
  }

  private saveIndex(index: BackupIndex): void {
    this.ensureBackupDir();
    fs.writeFileSync(this.indexFile, JSON.stringify(index, null, 2));
  }

  private appendToIndex(record: CopiedBackup): void {
    const index = this.readIndex();
    index.entries.push({ ...record, runId: this.runId });
    index.timestamp = Date.now();
    this.saveIndex(index);
  }

  /**
   * Backups taken by the most recent run that copied anything
   */
  getLatestRun(): BackupIndexEntry[] {
    const { entries } = this.readIndex();
    const latest = entries[entries.length - 1];
    return latest ? entries.filter(entry => entry.runId === latest.runId) : [];
  }
}

function isBackupIndex(value: unknown): value is BackupIndex {
  if (typeof value !== 'object' || value === null || !('entries' in value) || !Array.isArray(value.entries)) {
    return false;
  }
  return value.entries.every(
    (entry: unknown) =>
      typeof entry === 'object' &&
      entry !== null &&
      'kind' in entry &&
      entry.kind === 'copied' &&
      'originalPath' in entry &&
      typeof entry.originalPath === 'string' &&
      'backupPath' in entry &&
      typeof entry.backupPath === 'string' &&
      'runId' in entry &&
      typeof entry.runId === 'string'
  );
}
