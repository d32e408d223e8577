import * as fs from 'fs';
import * as path from 'path';
import { applyPatch, needsPatch, patchConfigFile } from './config-patcher';
import { getValue, parseConfigDocument, serializeConfigDocument } from './config-document';
import { PatchError } from '../installers/types';
import type { ConfigPatch } from '../types';
import { TEST_TEMP_DIR, writeTestFile } from '../test-setup';

describe('config-patcher', () => {
  beforeEach(() => {
    jest.spyOn(console, 'log').mockImplementation(() => {});
  });

  describe('applyPatch', () => {
    it('should overwrite an existing value', () => {
      const doc = parseConfigDocument('[General]\nFoo=user\n');
      const result = applyPatch(doc, { mode: 'overwrite', section: 'General', key: 'Foo', value: 'default' });

      expect(serializeConfigDocument(result)).toBe('[General]\nFoo=default\n');
    });

    it('should never overwrite a pre-existing key with setIfAbsent', () => {
      const doc = parseConfigDocument('[General]\nFoo=user\n');
      const result = applyPatch(doc, { mode: 'setIfAbsent', section: 'General', key: 'Foo', value: 'default' });

      expect(getValue(result, 'General', 'Foo')).toBe('user');
      expect(serializeConfigDocument(result)).toBe('[General]\nFoo=user\n');
    });

    it('should add a missing key with setIfAbsent', () => {
      const doc = parseConfigDocument('[General]\nFoo=user\n');
      const result = applyPatch(doc, { mode: 'setIfAbsent', section: 'General', key: 'Bar', value: 'default' });

      expect(serializeConfigDocument(result)).toBe('[General]\nFoo=user\nBar=default\n');
    });

    it('should append a new token at the end of the list', () => {
      const doc = parseConfigDocument('[GENERAL]\nPaths=A, B\n');
      const result = applyPatch(doc, { mode: 'appendToList', section: 'GENERAL', key: 'Paths', value: 'X' });

      expect(getValue(result, 'GENERAL', 'Paths')).toBe('A, B,X');
    });

    it('should not duplicate a token already in the list', () => {
      const doc = parseConfigDocument('[GENERAL]\nPaths=A,X,B\n');
      const patch: ConfigPatch = { mode: 'appendToList', section: 'GENERAL', key: 'Paths', value: 'X' };

      const once = applyPatch(doc, patch);
      const twice = applyPatch(once, patch);

      expect(serializeConfigDocument(twice)).toBe('[GENERAL]\nPaths=A,X,B\n');
    });

    it('should honour a custom delimiter', () => {
      const doc = parseConfigDocument('[GENERAL]\nOverrides=a;b\n');
      const result = applyPatch(doc, {
        mode: 'appendToList',
        section: 'GENERAL',
        key: 'Overrides',
        value: 'c',
        delimiter: ';',
      });

      expect(getValue(result, 'GENERAL', 'Overrides')).toBe('a;b;c');
    });

    it('should start a list when the key is missing or empty', () => {
      const doc = parseConfigDocument('[GENERAL]\nEmpty=\n');
      const result = applyPatch(doc, [
        { mode: 'appendToList', section: 'GENERAL', key: 'Empty', value: 'X' },
        { mode: 'appendToList', section: 'GENERAL', key: 'Missing', value: 'Y' },
      ]);

      expect(serializeConfigDocument(result)).toBe('[GENERAL]\nEmpty=X\nMissing=Y\n');
    });

    it('should not add an empty token after a trailing delimiter', () => {
      const doc = parseConfigDocument('[GENERAL]\nPaths=A,\n');
      const result = applyPatch(doc, { mode: 'appendToList', section: 'GENERAL', key: 'Paths', value: 'X' });

      expect(serializeConfigDocument(result)).toBe('[GENERAL]\nPaths=A,X\n');
    });

    it('should ignore an empty token', () => {
      const doc = parseConfigDocument('[GENERAL]\nPaths=A\n');
      const patch: ConfigPatch = { mode: 'appendToList', section: 'GENERAL', key: 'Paths', value: '  ' };

      const twice = applyPatch(applyPatch(doc, patch), patch);

      expect(serializeConfigDocument(twice)).toBe('[GENERAL]\nPaths=A\n');
    });

    it('should let the last patch in a batch win', () => {
      const doc = parseConfigDocument('[GENERAL]\n');
      const result = applyPatch(doc, [
        { mode: 'overwrite', section: 'GENERAL', key: 'PerformanceMode', value: '0' },
        { mode: 'overwrite', section: 'GENERAL', key: 'PerformanceMode', value: '1' },
      ]);

      expect(getValue(result, 'GENERAL', 'PerformanceMode')).toBe('1');
    });

    it('should pass unrelated sections and keys through unchanged', () => {
      const text = '; user notes\n[GENERAL]\nFoo = keep me\n\n[INPUT]\nKeyScreenshot=44,0,0,0\n';
      const doc = parseConfigDocument(text);
      const result = applyPatch(doc, { mode: 'overwrite', section: 'GENERAL', key: 'PerformanceMode', value: '1' });

      expect(serializeConfigDocument(result)).toBe(
        '; user notes\n[GENERAL]\nFoo = keep me\nPerformanceMode=1\n\n[INPUT]\nKeyScreenshot=44,0,0,0\n'
      );
    });

    it('should leave the input document untouched', () => {
      const doc = parseConfigDocument('[General]\nFoo=user\n');
      applyPatch(doc, { mode: 'overwrite', section: 'General', key: 'Foo', value: 'changed' });

      expect(getValue(doc, 'General', 'Foo')).toBe('user');
    });
  });

  describe('patchConfigFile', () => {
    const patches: ConfigPatch[] = [{ mode: 'overwrite', section: 'GENERAL', key: 'PerformanceMode', value: '1' }];

    it('should create the file when missing', () => {
      const file = path.join(TEST_TEMP_DIR, 'game', 'ReShade.ini');

      expect(patchConfigFile(file, patches)).toEqual({ changed: true });
      expect(fs.readFileSync(file, 'utf-8')).toBe('[GENERAL]\nPerformanceMode=1\n');
    });

    it('should not rewrite a file that already matches', () => {
      const file = writeTestFile(path.join(TEST_TEMP_DIR, 'ReShade.ini'), '[GENERAL]\nPerformanceMode=1\n');
      const mtime = fs.statSync(file).mtimeMs;

      expect(patchConfigFile(file, patches)).toEqual({ changed: false });
      expect(fs.statSync(file).mtimeMs).toBe(mtime);
    });

    it('should leave a malformed file untouched', () => {
      const content = '[GENERAL]\ngarbage line\n';
      const file = writeTestFile(path.join(TEST_TEMP_DIR, 'ReShade.ini'), content);

      expect(() => patchConfigFile(file, patches)).toThrow(PatchError);
      expect(fs.readFileSync(file, 'utf-8')).toBe(content);
    });
  });

  describe('needsPatch', () => {
    it('should report pending changes', () => {
      const file = writeTestFile(path.join(TEST_TEMP_DIR, 'ReShade.ini'), '[GENERAL]\nPerformanceMode=0\n');
      const patches: ConfigPatch[] = [{ mode: 'overwrite', section: 'GENERAL', key: 'PerformanceMode', value: '1' }];

      expect(needsPatch(file, patches)).toBe(true);
      patchConfigFile(file, patches);
      expect(needsPatch(file, patches)).toBe(false);
    });

    it('should report a missing file as needing a patch', () => {
      expect(needsPatch(path.join(TEST_TEMP_DIR, 'missing.ini'), [])).toBe(true);
    });
  });
});
