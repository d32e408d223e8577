import * as fs from 'fs';
import * as path from 'path';
import { BaseStep } from '../base-step';
import { FetchError, type StepContext } from '../types';
import type { ConfigPatch } from '../../types';
import { listEntries } from '../../lib/config-document';
import { needsPatch, patchConfigFile, readConfigFile } from '../../lib/config-patcher';
import { CACHE_DIR_NAMES } from '../../config';
import { GPOSINGWAY_CONFIG_FILES } from '../../shared-constants';

/**
 * Every key of a GPosingway config file as a setIfAbsent patch, so values
 * the user already has are left alone.
 */
export function buildMergePatches(sourceFile: string): ConfigPatch[] {
  if (!fs.existsSync(sourceFile)) {
    throw new FetchError(`GPosingway checkout is missing ${path.basename(sourceFile)}`, sourceFile);
  }
  return listEntries(readConfigFile(sourceFile)).map(({ section, key, value }): ConfigPatch => ({
    mode: 'setIfAbsent',
    section,
    key,
    value,
  }));
}

export class GposingwayConfigStep extends BaseStep {
  getName(): string {
    return 'merge-gposingway-config';
  }

  private files(ctx: StepContext): Array<{ source: string; destination: string }> {
    const checkout = path.join(ctx.paths.cacheDir, CACHE_DIR_NAMES.GPOSINGWAY);
    return GPOSINGWAY_CONFIG_FILES.map(name => ({
      source: path.join(checkout, name),
      destination: path.join(ctx.target.gamePath, name),
    }));
  }

  async checkSatisfied(ctx: StepContext): Promise<boolean> {
    return this.files(ctx).every(({ source, destination }) => !needsPatch(destination, buildMergePatches(source)));
  }

  mutatedFiles(ctx: StepContext): string[] {
    return this.files(ctx).map(({ destination }) => destination);
  }

  async doRun(ctx: StepContext): Promise<void> {
    for (const { source, destination } of this.files(ctx)) {
      patchConfigFile(destination, buildMergePatches(source));
    }
  }
}
