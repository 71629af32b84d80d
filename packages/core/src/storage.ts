import { existsSync, mkdirSync, readFileSync, renameSync, unlinkSync, writeFileSync } from 'node:fs';
import { dirname } from 'node:path';
import type { z } from 'zod';

export type SaveResult = { ok: true } | { ok: false; reason: string };

/**
 * Write text output (registrations, confirmations) to a caller-named file.
 *
 * Write strategy:
 * 1. Write content to `<file>.tmp`
 * 2. Rename over the target (with a short retry loop for Windows locks)
 * 3. If the rename never succeeds, write the target directly
 */
export function saveStringToFile(filePath: string, content: string): SaveResult {
  try {
    const dir = dirname(filePath);
    if (!existsSync(dir)) mkdirSync(dir, { recursive: true });

    const tmpPath = filePath + '.tmp';
    writeFileSync(tmpPath, content, 'utf-8');

    if (!atomicRename(tmpPath, filePath)) {
      writeFileSync(filePath, content, 'utf-8');
      if (existsSync(tmpPath)) unlinkSync(tmpPath);
    }
    return { ok: true };
  } catch (err) {
    return { ok: false, reason: err instanceof Error ? err.message : String(err) };
  }
}

/** Rename with retry for EPERM/EACCES/EBUSY (file held by another process). */
function atomicRename(src: string, dest: string): boolean {
  const MAX_RETRIES = 5;
  const RETRY_MS = 50;

  for (let i = 0; i < MAX_RETRIES; i++) {
    try {
      renameSync(src, dest);
      return true;
    } catch (err: unknown) {
      const code = err instanceof Error && 'code' in err ? err.code : undefined;
      if (code !== 'EPERM' && code !== 'EACCES' && code !== 'EBUSY') {
        return false;
      }
      if (i < MAX_RETRIES - 1) {
        // Sync sleep: callers are not async and the wait is tiny
        const start = Date.now();
        while (Date.now() - start < RETRY_MS * (i + 1)) {
          /* spin */
        }
      }
    }
  }
  return false;
}

export type ReadJsonResult<T> =
  | { ok: true; data: T }
  | { ok: false; kind: 'missing' | 'syntax' | 'shape'; reason: string };

/** Read and validate a JSON document the engine was pointed at. */
export function readJsonFile<S extends z.ZodTypeAny>(filePath: string, schema: S): ReadJsonResult<z.infer<S>> {
  let text: string;
  try {
    text = readFileSync(filePath, 'utf-8');
  } catch (err) {
    return { ok: false, kind: 'missing', reason: err instanceof Error ? err.message : String(err) };
  }

  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (err) {
    return { ok: false, kind: 'syntax', reason: err instanceof Error ? err.message : String(err) };
  }

  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    return { ok: false, kind: 'shape', reason: parsed.error.issues.map((i) => i.message).join('; ') };
  }
  return { ok: true, data: parsed.data };
}
