import { resolve } from 'node:path';
import { pathToFileURL } from 'node:url';
import { describe, expect, it, vi } from 'vitest';
import { DryRunEngine } from '@amvp-runner/core';
import { loadEngine, toModuleSpecifier } from '../engine-loader.js';

describe('loadEngine', () => {
  it('falls back to the dry-run engine', async () => {
    const importer = vi.fn();
    const result = await loadEngine(undefined, importer);
    expect(result.ok && result.engine).toBeInstanceOf(DryRunEngine);
    expect(importer).not.toHaveBeenCalled();
  });

  it('builds the engine a module exports', async () => {
    const engine = new DryRunEngine();
    const importer = vi.fn(async () => ({ createEngine: () => engine }));

    const result = await loadEngine('amvp-engine-openssl', importer);

    expect(result).toEqual({ ok: true, engine });
    expect(importer).toHaveBeenCalledWith('amvp-engine-openssl');
  });

  it('awaits an async factory', async () => {
    const engine = new DryRunEngine();
    const result = await loadEngine('engine', async () => ({ createEngine: async () => engine }));
    expect(result).toEqual({ ok: true, engine });
  });

  it('imports file paths as file URLs', async () => {
    const importer = vi.fn(async () => ({ createEngine: () => new DryRunEngine() }));
    await loadEngine('./engines/local.js', importer);
    expect(importer).toHaveBeenCalledWith(pathToFileURL(resolve(process.cwd(), './engines/local.js')).href);
  });

  it('rejects a module without createEngine', async () => {
    expect(await loadEngine('engine', async () => ({ default: {} }))).toEqual({
      ok: false,
      reason: 'Engine module engine does not export a createEngine function',
    });
  });

  it('rejects a factory that returns something else', async () => {
    expect(await loadEngine('engine', async () => ({ createEngine: () => ({ name: 'half' }) }))).toEqual({
      ok: false,
      reason: 'createEngine in engine did not return a protocol engine',
    });
  });

  it('reports import failures', async () => {
    const importer = async () => {
      throw new Error('Cannot find module');
    };
    expect(await loadEngine('missing-engine', importer)).toEqual({
      ok: false,
      reason: 'Unable to load engine module missing-engine: Cannot find module',
    });
  });
});

describe('toModuleSpecifier', () => {
  it('leaves package names alone', () => {
    expect(toModuleSpecifier('amvp-engine-openssl', '/work')).toBe('amvp-engine-openssl');
  });

  it('resolves relative and absolute paths', () => {
    expect(toModuleSpecifier('./engine.js', '/work')).toBe('file:///work/engine.js');
    expect(toModuleSpecifier('/opt/engine.js', '/work')).toBe('file:///opt/engine.js');
  });
});
