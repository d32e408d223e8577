import type { FailureKind, InstallationTarget } from '../types';
import type { SetupPaths } from '../config';
import type { Fetcher } from '../lib/fetcher';
import type { CommandRunner } from '../lib/command-runner';

export interface StepContext {
  target: InstallationTarget;
  paths: SetupPaths;
  fetcher: Fetcher;
  runner: CommandRunner;
  reshadeVersion: string;
  // Pull cached repositories even when a checkout exists
  refresh: boolean;
  env: NodeJS.ProcessEnv;
  homeDir: string;
}

export interface InstallStep {
  getName(): string;
  isOptional(): boolean;
  isSatisfied(ctx: StepContext): Promise<boolean>;
  mutatedFiles(ctx: StepContext): string[];
  run(ctx: StepContext): Promise<void>;
  verify(ctx: StepContext): Promise<boolean>;
}

export class SetupError extends Error {
  constructor(
    message: string,
    public readonly kind: FailureKind,
    public cause?: Error
  ) {
    super(message);
    this.name = 'SetupError';
  }
}

export class ResolutionError extends SetupError {
  constructor(message = 'no installation found', cause?: Error) {
    super(message, 'resolution', cause);
    this.name = 'ResolutionError';
  }
}

export class FetchError extends SetupError {
  constructor(message: string, public readonly source: string, cause?: Error) {
    super(message, 'fetch', cause);
    this.name = 'FetchError';
  }
}

export class VerificationError extends SetupError {
  constructor(message: string, public readonly step: string) {
    super(message, 'verification');
    this.name = 'VerificationError';
  }
}

export class BackupError extends SetupError {
  constructor(message: string, public readonly filePath: string, cause?: Error) {
    super(message, 'backup', cause);
    this.name = 'BackupError';
  }
}

export class PatchError extends SetupError {
  constructor(message: string, public readonly filePath: string, public readonly line?: number) {
    super(message, 'patch');
    this.name = 'PatchError';
  }
}

export class CommandError extends SetupError {
  constructor(
    message: string,
    public readonly command: string,
    public readonly exitCode: number | null,
    public readonly output?: { stdout: string; stderr: string }
  ) {
    super(message, 'command');
    this.name = 'CommandError';
  }
}

export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

export function failureKindOf(error: unknown): FailureKind {
  return error instanceof SetupError ? error.kind : 'unexpected';
}
