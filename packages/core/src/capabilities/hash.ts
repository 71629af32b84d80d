import { createHash } from 'node:crypto';
import { describeResult, ResultCode } from '../engine/result.js';
import type { EngineSession, HashHandler } from '../engine/types.js';
import type { HashAlgorithm, HashDomain, HashParameter, Output } from '../types.js';

const DIGESTS: Record<HashAlgorithm, string> = {
  'SHA-1': 'sha1',
  'SHA2-224': 'sha224',
  'SHA2-256': 'sha256',
  'SHA2-384': 'sha384',
  'SHA2-512': 'sha512',
};

const HEX = /^(?:[0-9a-fA-F]{2})*$/;

export const shaHandler: HashHandler = (testCase) => {
  if (!HEX.test(testCase.msg)) return { ok: false, code: ResultCode.INVALID_ARG };
  try {
    const md = createHash(DIGESTS[testCase.algorithm])
      .update(Buffer.from(testCase.msg, 'hex'))
      .digest('hex');
    return { ok: true, md };
  } catch {
    return { ok: false, code: ResultCode.CRYPTO_MODULE_FAIL };
  }
};

export interface HashCapability {
  algorithm: HashAlgorithm;
  handler: HashHandler;
  domains: ReadonlyArray<{ parameter: HashParameter } & HashDomain>;
}

/** Hash algorithms registered by `--hash`. */
export const HASH_CAPABILITIES: readonly HashCapability[] = [
  {
    algorithm: 'SHA2-256',
    handler: shaHandler,
    domains: [{ parameter: 'messageLength', min: 0, max: 65536, increment: 8 }],
  },
];

function reportFailure(output: Output, rv: ResultCode): void {
  output.error(`Failed to register capability with the engine (rv=${rv}: ${describeResult(rv)})`);
}

/**
 * Register every hash capability with the session. Stops at the first
 * failing call and returns its code; the caller must not run the session.
 */
export async function enableHashCapabilities(
  session: EngineSession,
  output: Output,
  capabilities: readonly HashCapability[] = HASH_CAPABILITIES,
): Promise<ResultCode> {
  for (const cap of capabilities) {
    let rv = await session.enableHash(cap.algorithm, cap.handler);
    if (rv !== ResultCode.SUCCESS) {
      reportFailure(output, rv);
      return rv;
    }
    for (const d of cap.domains) {
      rv = await session.setHashDomain(cap.algorithm, d.parameter, d.min, d.max, d.increment);
      if (rv !== ResultCode.SUCCESS) {
        reportFailure(output, rv);
        return rv;
      }
    }
  }
  return ResultCode.SUCCESS;
}
