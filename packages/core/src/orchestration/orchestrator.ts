/**
 * Orchestrator: one invocation, start to finish:
 * environment → FIPS gate → mode selection → session construction →
 * registration source → terminal action → cleanup.
 *
 * Every path, including a gate abort before any session exists, leaves
 * through the same `finally` that releases the session scope.
 */

import chalk, { type ChalkInstance } from 'chalk';
import { describeResult, ResultCode } from '../engine/result.js';
import type { ProtocolEngine } from '../engine/types.js';
import { type EnvSource, formatRuntimeSummary, resolveEnvironment } from '../environment.js';
import { runFipsGate } from '../fips/gate.js';
import { type FipsProvider, NodeFipsProvider } from '../fips/provider.js';
import { createProgressSink } from '../progress.js';
import type { SaveResult } from '../storage.js';
import type { Output, SessionConfig } from '../types.js';
import { applyRegistration, constructSession } from './construct.js';
import { dispatchMode } from './dispatcher.js';
import { type ModeKind, selectMode } from './modes.js';
import { SessionScope } from './session-scope.js';

export interface OrchestratorDeps {
  engine: ProtocolEngine;
  env?: EnvSource;
  fipsProvider?: FipsProvider;
  output?: Output;
  colors?: ChalkInstance;
  sleep?: (ms: number) => Promise<unknown>;
  clock?: () => number;
  saveFile?: (filePath: string, content: string) => SaveResult;
}

export interface RunOutcome {
  code: ResultCode;
  /** Process exit status: the final result code itself, 0 on success. */
  exitCode: number;
  /** Mode the run settled on; null when it aborted before selection. */
  mode: ModeKind | null;
  cleanedUp: boolean;
}

export async function runSession(config: SessionConfig, deps: OrchestratorDeps): Promise<RunOutcome> {
  const output = deps.output ?? console;
  const colors = deps.colors ?? chalk;
  const scope = new SessionScope(deps.engine);
  let mode: ModeKind | null = null;
  let code: ResultCode = ResultCode.SUCCESS;

  try {
    code = await execute();
  } catch (err) {
    output.error(colors.red(`Unexpected engine failure: ${err instanceof Error ? err.message : String(err)}`));
    code = ResultCode.INTERNAL_ERR;
  } finally {
    const rv = await releaseScope();
    if (code === ResultCode.SUCCESS && rv !== ResultCode.SUCCESS) code = rv;
  }

  return {
    code,
    exitCode: code,
    mode,
    cleanedUp: scope.isReleased,
  };

  async function execute(): Promise<ResultCode> {
    const resolved = resolveEnvironment(deps.env ?? process.env);
    for (const line of formatRuntimeSummary(resolved)) output.log(line);

    const gate = await runFipsGate({
      disabled: config.disableFips,
      provider: deps.fipsProvider ?? new NodeFipsProvider(),
      output,
      sleep: deps.sleep,
    });
    if (!gate.ok) return gate.code;

    const selected = selectMode(config);
    mode = selected.kind;
    if (selected.kind === 'invalid') {
      output.error(colors.red(selected.reason));
      return ResultCode.MISSING_ARG;
    }

    const created = await scope.open(createProgressSink(output, colors), config.level);
    if (!created.ok) {
      output.error(`Failed to create session: ${describeResult(created.code)}`);
      return created.code;
    }
    const session = created.session;

    let rv = await constructSession(session, resolved.params, config, { output, clock: deps.clock });
    if (rv !== ResultCode.SUCCESS) return rv;

    rv = await applyRegistration(session, config, output);
    if (rv !== ResultCode.SUCCESS) return rv;

    return dispatchMode(session, selected, {
      output,
      params: resolved.params,
      config,
      saveFile: deps.saveFile,
    });
  }

  async function releaseScope(): Promise<ResultCode> {
    try {
      const rv = await scope.release();
      if (rv !== ResultCode.SUCCESS) output.error(`Failed to clean up session (rv=${rv}: ${describeResult(rv)})`);
      return rv;
    } catch (err) {
      output.error(`Failed to clean up session: ${err instanceof Error ? err.message : String(err)}`);
      return ResultCode.CLEANUP_FAIL;
    }
  }
}
