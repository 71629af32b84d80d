import { createHmac } from 'node:crypto';
import { ResultCode } from '../engine/result.js';
import type { TwoFactorCallback } from '../engine/types.js';

export const TOTP_STEP_SECONDS = 30;
export const TOTP_DIGITS = 8;

const BASE64 = /^[A-Za-z0-9+/]+={0,2}$/;

export type SeedResult = { ok: true; seed: Buffer } | { ok: false; reason: string };

export function decodeSeed(encoded: string): SeedResult {
  const trimmed = encoded.trim();
  if (!BASE64.test(trimmed) || trimmed.length % 4 !== 0) {
    return { ok: false, reason: 'AMV_TOTP_SEED is not valid base64' };
  }
  return { ok: true, seed: Buffer.from(trimmed, 'base64') };
}

/** RFC 6238 time-based one-time password over HMAC-SHA-256. */
export function generateTotp(seed: Buffer, unixSeconds: number): string {
  const counter = Buffer.alloc(8);
  counter.writeBigUInt64BE(BigInt(Math.floor(unixSeconds / TOTP_STEP_SECONDS)));

  const hmac = createHmac('sha256', seed).update(counter).digest();
  const offset = hmac[hmac.length - 1] & 0x0f;
  const binary = hmac.readUInt32BE(offset) & 0x7fffffff;

  return String(binary % 10 ** TOTP_DIGITS).padStart(TOTP_DIGITS, '0');
}

export function createTotpCallback(seed: Buffer, clock: () => number = Date.now): TwoFactorCallback {
  return () => {
    try {
      return { ok: true, token: generateTotp(seed, clock() / 1000) };
    } catch {
      return { ok: false, code: ResultCode.TOTP_FAIL };
    }
  };
}
