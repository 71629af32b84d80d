import { isAbsolute, resolve } from 'node:path';
import { pathToFileURL } from 'node:url';
import { DryRunEngine, type ProtocolEngine } from '@amvp-runner/core';

export type ModuleImporter = (specifier: string) => Promise<unknown>;

export type LoadEngineResult = { ok: true; engine: ProtocolEngine } | { ok: false; reason: string };

const importModule: ModuleImporter = (specifier) => import(specifier);

function hasCreateEngine(mod: unknown): mod is { createEngine: () => unknown } {
  return typeof mod === 'object' && mod !== null && 'createEngine' in mod && typeof mod.createEngine === 'function';
}

function isProtocolEngine(value: unknown): value is ProtocolEngine {
  return (
    typeof value === 'object' &&
    value !== null &&
    'createSession' in value &&
    typeof value.createSession === 'function' &&
    'cleanup' in value &&
    typeof value.cleanup === 'function'
  );
}

/** File paths load relative to the working directory; anything else is a package name. */
export function toModuleSpecifier(moduleRef: string, cwd: string = process.cwd()): string {
  if (moduleRef.startsWith('.') || isAbsolute(moduleRef)) return pathToFileURL(resolve(cwd, moduleRef)).href;
  return moduleRef;
}

/**
 * Resolve the protocol engine for this run. Without a module the offline
 * dry-run engine is used; otherwise the module must export `createEngine`.
 */
export async function loadEngine(moduleRef?: string, importer: ModuleImporter = importModule): Promise<LoadEngineResult> {
  if (moduleRef === undefined) return { ok: true, engine: new DryRunEngine() };

  try {
    const mod = await importer(toModuleSpecifier(moduleRef));
    if (!hasCreateEngine(mod)) {
      return { ok: false, reason: `Engine module ${moduleRef} does not export a createEngine function` };
    }
    const engine = await mod.createEngine();
    if (!isProtocolEngine(engine)) {
      return { ok: false, reason: `createEngine in ${moduleRef} did not return a protocol engine` };
    }
    return { ok: true, engine };
  } catch (err) {
    return { ok: false, reason: `Unable to load engine module ${moduleRef}: ${err instanceof Error ? err.message : String(err)}` };
  }
}
