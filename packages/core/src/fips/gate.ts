/**
 * FIPS gate. Runs before any session exists.
 *
 * ENFORCED: switch the certified provider on, confirm it took, self-test it.
 * BYPASSED: print the warning box and hold the run for a fixed delay.
 * Builds without provider support skip the gate entirely.
 */

import { setTimeout as delay } from 'node:timers/promises';
import { describeResult, ResultCode } from '../engine/result.js';
import { FIPS_BYPASS_DELAY_MS, type Output } from '../types.js';
import type { FipsProvider } from './provider.js';

export type FipsGateState = 'enforced' | 'bypassed' | 'unsupported';

export type FipsGateResult =
  | { ok: true; state: FipsGateState }
  | { ok: false; code: ResultCode; reason: string };

export interface FipsGateOptions {
  disabled: boolean;
  provider: FipsProvider;
  output: Output;
  sleep?: (ms: number) => Promise<unknown>;
  delayMs?: number;
}

export const FIPS_BYPASS_WARNING = [
  '***********************************************************************************',
  '* WARNING: You have chosen to not fetch the FIPS provider for this run. Any tests *',
  '* created or performed during this run MUST NOT have any validation requested     *',
  '* on it unless the FIPS provider is exclusively loaded or enabled by default in   *',
  '* your configuration. Proceed at your own risk. Continuing in 5 seconds...        *',
  '***********************************************************************************',
  '',
];

export async function runFipsGate(options: FipsGateOptions): Promise<FipsGateResult> {
  const { provider, output } = options;
  if (!provider.isSupported()) return { ok: true, state: 'unsupported' };

  if (options.disabled) {
    for (const line of FIPS_BYPASS_WARNING) output.log(line);
    await (options.sleep ?? delay)(options.delayMs ?? FIPS_BYPASS_DELAY_MS);
    return { ok: true, state: 'bypassed' };
  }

  let enabled = false;
  try {
    provider.enable();
    enabled = provider.isEnabled();
  } catch (err) {
    output.error(`[fips] ${err instanceof Error ? err.message : String(err)}`);
  }
  if (!enabled) {
    output.error('Error setting FIPS property at startup');
    output.error('');
    return { ok: false, code: ResultCode.CRYPTO_MODULE_FAIL, reason: 'FIPS provider could not be enabled' };
  }

  const rv = provider.selfTest();
  if (rv !== ResultCode.SUCCESS) {
    output.error(`Error occurred when testing FIPS at startup (rv = ${rv}: ${describeResult(rv)}). Please verify the FIPS provider is`);
    output.error('properly installed and configured. Exiting...');
    output.error('');
    return { ok: false, code: rv, reason: 'FIPS self-test failed' };
  }

  return { ok: true, state: 'enforced' };
}
