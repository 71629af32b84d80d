import { createHash, createHmac, getFips, setFips } from 'node:crypto';
import { ResultCode } from '../engine/result.js';

/** Certified crypto provider the FIPS gate switches on and checks. */
export interface FipsProvider {
  /** False when the linked crypto library has no FIPS provider support at all. */
  isSupported(): boolean;
  enable(): void;
  isEnabled(): boolean;
  selfTest(): ResultCode;
}

export interface KnownAnswer {
  name: string;
  compute: () => string;
  expected: string;
}

const KNOWN_ANSWERS: KnownAnswer[] = [
  {
    name: 'SHA2-256',
    compute: () => createHash('sha256').update('abc').digest('hex'),
    expected: 'ba7816bf8f01cfea414140de5dae2223b00361a396177a9cb410ff61f20015ad',
  },
  {
    name: 'HMAC-SHA2-256',
    compute: () => createHmac('sha256', 'Jefe').update('what do ya want for nothing?').digest('hex'),
    expected: '5bdcc146bf60754e6a042426089575c75a003f089d2739839dec58b964ec3843',
  },
];

/** Runs each known-answer check once; any mismatch or thrown error fails the whole test. */
export function runKnownAnswers(answers: readonly KnownAnswer[] = KNOWN_ANSWERS): ResultCode {
  for (const kat of answers) {
    try {
      if (kat.compute() !== kat.expected) return ResultCode.CRYPTO_MODULE_FAIL;
    } catch {
      return ResultCode.CRYPTO_MODULE_FAIL;
    }
  }
  return ResultCode.SUCCESS;
}

export class NodeFipsProvider implements FipsProvider {
  /** `null` means no OpenSSL is linked. */
  constructor(private readonly opensslVersion: string | null = process.versions.openssl ?? null) {}

  isSupported(): boolean {
    const major = Number.parseInt(this.opensslVersion ?? '', 10);
    return Number.isFinite(major) && major >= 3;
  }

  enable(): void {
    setFips(true);
  }

  isEnabled(): boolean {
    return getFips() === 1;
  }

  selfTest(): ResultCode {
    return runKnownAnswers();
  }
}
