import { mkdtempSync, readFileSync, rmSync, writeFileSync, existsSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { z } from 'zod';
import { readJsonFile, saveStringToFile } from '../storage.js';

describe('storage', () => {
  let tmpDir: string;

  beforeEach(() => {
    tmpDir = mkdtempSync(join(tmpdir(), 'amvp-storage-'));
  });

  afterEach(() => {
    rmSync(tmpDir, { recursive: true, force: true });
  });

  describe('saveStringToFile', () => {
    it('writes the content and leaves no temp file', () => {
      const target = join(tmpDir, 'nested', 'registration.json');
      expect(saveStringToFile(target, '{"algorithms":[]}')).toEqual({ ok: true });
      expect(readFileSync(target, 'utf-8')).toBe('{"algorithms":[]}');
      expect(existsSync(target + '.tmp')).toBe(false);
    });

    it('overwrites an existing file', () => {
      const target = join(tmpDir, 'out.txt');
      writeFileSync(target, 'old');
      saveStringToFile(target, 'new');
      expect(readFileSync(target, 'utf-8')).toBe('new');
    });

    it('reports a failure instead of throwing', () => {
      const blocker = join(tmpDir, 'blocker');
      writeFileSync(blocker, 'not a directory');
      const result = saveStringToFile(join(blocker, 'out.txt'), 'data');
      expect(result.ok).toBe(false);
    });
  });

  describe('readJsonFile', () => {
    const Schema = z.object({ name: z.string() });

    it('parses a valid document', () => {
      const file = join(tmpDir, 'doc.json');
      writeFileSync(file, '{"name":"module"}');
      expect(readJsonFile(file, Schema)).toEqual({ ok: true, data: { name: 'module' } });
    });

    it('classifies failures', () => {
      const bad = join(tmpDir, 'bad.json');
      writeFileSync(bad, '{ nope');
      const wrong = join(tmpDir, 'wrong.json');
      writeFileSync(wrong, '{"name":7}');

      const missing = readJsonFile(join(tmpDir, 'absent.json'), Schema);
      const syntax = readJsonFile(bad, Schema);
      const shape = readJsonFile(wrong, Schema);
      expect(missing.ok ? null : missing.kind).toBe('missing');
      expect(syntax.ok ? null : syntax.kind).toBe('syntax');
      expect(shape.ok ? null : shape.kind).toBe('shape');
    });
  });
});
