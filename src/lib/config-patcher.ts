import * as fs from 'fs';
import * as path from 'path';
import type { ConfigDocument, ConfigPatch } from '../types';
import {
  cloneConfigDocument,
  getValue,
  parseConfigDocument,
  serializeConfigDocument,
  setValue,
} from './config-document';
import { writeFileAtomic } from '../installers/utils';

export const DEFAULT_LIST_DELIMITER = ',';

function assertNever(value: never): never {
  throw new Error(`Unhandled patch mode: ${JSON.stringify(value)}`);
}

function splitTokens(value: string, delimiter: string): string[] {
  return value
    .split(delimiter)
    .map(token => token.trim())
    .filter(token => token.length > 0);
}

function applyOne(document: ConfigDocument, patch: ConfigPatch): void {
  const existing = getValue(document, patch.section, patch.key);

  switch (patch.mode) {
    case 'overwrite':
      setValue(document, patch.section, patch.key, patch.value);
      return;

    case 'setIfAbsent':
      if (existing === undefined) {
        setValue(document, patch.section, patch.key, patch.value);
      }
      return;

    case 'appendToList': {
      const delimiter = patch.delimiter ?? DEFAULT_LIST_DELIMITER;
      const token = patch.value.trim();
      if (token === '') {
        return;
      }
      if (existing === undefined || existing.trim() === '') {
        setValue(document, patch.section, patch.key, token);
        return;
      }
      if (splitTokens(existing, delimiter).includes(token)) {
        return;
      }
      // "A," already ends in a separator
      const separator = existing.trimEnd().endsWith(delimiter) ? '' : delimiter;
      setValue(document, patch.section, patch.key, `${existing}${separator}${token}`);
      return;
    }

    default:
      assertNever(patch);
  }
}

function isPatchList(patches: ConfigPatch | readonly ConfigPatch[]): patches is readonly ConfigPatch[] {
  return Array.isArray(patches);
}

/**
 * Apply one patch or a batch to a copy of the document.
 * Patches in a batch apply in order, so the last one touching a key wins.
 */
export function applyPatch(document: ConfigDocument, patches: ConfigPatch | readonly ConfigPatch[]): ConfigDocument {
  const result = cloneConfigDocument(document);
  const batch = isPatchList(patches) ? patches : [patches];
  for (const patch of batch) {
    applyOne(result, patch);
  }
  return result;
}

/**
 * Load a config file; a missing file is an empty document
 */
export function readConfigFile(filePath: string): ConfigDocument {
  const content = fs.existsSync(filePath) ? fs.readFileSync(filePath, 'utf-8') : '';
  return parseConfigDocument(content, filePath);
}

/**
 * Whether applying the patches would change the file on disk
 */
export function needsPatch(filePath: string, patches: readonly ConfigPatch[]): boolean {
  const before = readConfigFile(filePath);
  const after = applyPatch(before, patches);
  return !fs.existsSync(filePath) || serializeConfigDocument(before) !== serializeConfigDocument(after);
}

/**
 * Patch a config file in place. Malformed files throw PatchError before
 * anything is written; unchanged documents are not rewritten.
 */
export function patchConfigFile(filePath: string, patches: readonly ConfigPatch[]): { changed: boolean } {
  const exists = fs.existsSync(filePath);
  const before = readConfigFile(filePath);
  const original = serializeConfigDocument(before);
  const updated = serializeConfigDocument(applyPatch(before, patches));

  if (exists && updated === original) {
    return { changed: false };
  }

  fs.mkdirSync(path.dirname(filePath), { recursive: true });
  writeFileAtomic(filePath, updated);
  console.log(`✓ Updated ${path.basename(filePath)}`);
  return { changed: true };
}
