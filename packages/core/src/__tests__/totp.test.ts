import { describe, expect, it } from 'vitest';
import { createTotpCallback, decodeSeed, generateTotp } from '../auth/totp.js';

// RFC 6238 SHA-256 seed: the ASCII string "12345678901234567890123456789012"
const SEED = Buffer.from('12345678901234567890123456789012', 'ascii');

describe('generateTotp', () => {
  it('matches the RFC 6238 SHA-256 vectors', () => {
    expect(generateTotp(SEED, 59)).toBe('46119246');
    expect(generateTotp(SEED, 1111111109)).toBe('68084774');
    expect(generateTotp(SEED, 2000000000)).toBe('90698825');
  });
});

describe('decodeSeed', () => {
  it('decodes base64', () => {
    const result = decodeSeed('MTIzNDU2Nzg5MDEyMzQ1Njc4OTAxMjM0NTY3ODkwMTI=');
    expect(result.ok && result.seed.equals(SEED)).toBe(true);
  });

  it('rejects text that is not base64', () => {
    expect(decodeSeed('not a seed!')).toEqual({ ok: false, reason: 'AMV_TOTP_SEED is not valid base64' });
  });
});

describe('createTotpCallback', () => {
  it('produces the token for the injected clock', () => {
    const callback = createTotpCallback(SEED, () => 59_000);
    expect(callback()).toEqual({ ok: true, token: '46119246' });
  });
});
