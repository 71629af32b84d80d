/**
 * Session construction: binds server, TLS, two-factor and the
 * construction-time modifiers to a fresh session, then picks the
 * registration source. Each step stops the run at its first failure.
 */

import { decodeSeed, createTotpCallback } from '../auth/totp.js';
import { enableHashCapabilities } from '../capabilities/hash.js';
import { describeResult, ResultCode } from '../engine/result.js';
import type { EngineSession } from '../engine/types.js';
import type { Output, RuntimeParameters, SessionConfig } from '../types.js';
import { needsCapabilities } from './modes.js';

export interface ConstructOptions {
  output: Output;
  clock?: () => number;
}

type Step = { label: string; call: () => Promise<ResultCode> };

async function runSteps(steps: Step[], output: Output): Promise<ResultCode> {
  for (const step of steps) {
    const rv = await step.call();
    if (rv !== ResultCode.SUCCESS) {
      output.error(`${step.label} (rv=${rv}: ${describeResult(rv)})`);
      return rv;
    }
  }
  return ResultCode.SUCCESS;
}

/**
 * Bind server, auth and construction-time modifiers to a fresh session.
 * Stops at the first failing call.
 */
export async function constructSession(
  session: EngineSession,
  params: RuntimeParameters,
  config: SessionConfig,
  options: ConstructOptions,
): Promise<ResultCode> {
  const { output } = options;
  const steps: Step[] = [
    { label: 'Failed to set server/port', call: () => session.setServer(params.server, params.port) },
    { label: 'Failed to set API context', call: () => session.setApiContext(params.apiContext) },
    { label: 'Failed to set URI prefix', call: () => session.setPathSegment(params.pathSegment) },
  ];

  const { caFile, clientAuth, totpSeed } = params;
  if (caFile) {
    steps.push({ label: 'Failed to set CA certs', call: () => session.setCaCerts(caFile) });
  }
  if (clientAuth) {
    steps.push({
      label: 'Failed to set TLS cert/key',
      call: () => session.setCertKey(clientAuth.certFile, clientAuth.keyFile),
    });
  }

  let rv = await runSteps(steps, output);
  if (rv !== ResultCode.SUCCESS) return rv;

  if (totpSeed) {
    const decoded = decodeSeed(totpSeed);
    if (!decoded.ok) {
      output.error(`Failed to set up two-factor authentication: ${decoded.reason}`);
      return ResultCode.TOTP_FAIL;
    }
    rv = await runSteps(
      [
        {
          label: 'Failed to set up two-factor authentication',
          call: () => session.setTwoFactorCallback(createTotpCallback(decoded.seed, options.clock)),
        },
      ],
      output,
    );
    if (rv !== ResultCode.SUCCESS) return rv;
  }

  const modifiers: Step[] = [];
  if (config.sample) {
    modifiers.push({ label: 'Failed to mark as sample', call: () => session.markAsSample() });
  }
  const { getString, postFile, deleteUrl, vectorReqFile } = config;
  if (getString) {
    modifiers.push({ label: 'Failed to mark as get only', call: () => session.markAsGetOnly(getString) });
  }
  rv = await runSteps(modifiers, output);
  if (rv !== ResultCode.SUCCESS) return rv;

  if (getString && config.saveFile) {
    const saveRv = await session.setGetSaveFile(config.saveFile);
    if (saveRv !== ResultCode.SUCCESS) {
      output.log('Failed to set save file for get request, continuing anyway...');
    }
  }

  const tail: Step[] = [];
  if (postFile) {
    tail.push({ label: 'Failed to mark as post only', call: () => session.markAsPostOnly(postFile) });
  }
  if (deleteUrl) {
    tail.push({ label: 'Failed to mark as delete only', call: () => session.markAsDeleteOnly(deleteUrl) });
  }
  if (vectorReqFile && !config.vectorRspFile) {
    tail.push({ label: 'Failed to mark as request only', call: () => session.markAsRequestOnly(vectorReqFile) });
  }
  return runSteps(tail, output);
}

/**
 * Choose where the registration comes from: a manual JSON file replaces
 * capability registration entirely; otherwise enable requested capabilities.
 */
export async function applyRegistration(
  session: EngineSession,
  config: SessionConfig,
  output: Output,
): Promise<ResultCode> {
  if (config.regFile) {
    const rv = await session.setJsonFilename(config.regFile);
    if (rv !== ResultCode.SUCCESS) {
      output.error(`Failed to set json file within session (rv=${rv}: ${describeResult(rv)})`);
    }
    return rv;
  }

  if (needsCapabilities(config)) return enableHashCapabilities(session, output);
  return ResultCode.SUCCESS;
}
