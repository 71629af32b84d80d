import { describe, expect, it } from 'vitest';
import { enableHashCapabilities, shaHandler } from '../capabilities/hash.js';
import { ResultCode } from '../engine/result.js';
import { FakeSession, memoryOutput } from './helpers.js';

describe('shaHandler', () => {
  it('hashes a hex message', () => {
    expect(shaHandler({ tcId: 1, algorithm: 'SHA2-256', msg: '616263' })).toEqual({
      ok: true,
      md: 'ba7816bf8f01cfea414140de5dae2223b00361a396177a9cb410ff61f20015ad',
    });
  });

  it('hashes the empty message', () => {
    expect(shaHandler({ tcId: 2, algorithm: 'SHA2-256', msg: '' })).toEqual({
      ok: true,
      md: 'e3b0c44298fc1c149afbf4c8996fb92427ae41e4649b934ca495991b7852b855',
    });
  });

  it('supports SHA-1', () => {
    expect(shaHandler({ tcId: 3, algorithm: 'SHA-1', msg: '616263' })).toEqual({
      ok: true,
      md: 'a9993e364706816aba3e25717850c26c9cd0d89d',
    });
  });

  it('rejects malformed hex', () => {
    expect(shaHandler({ tcId: 4, algorithm: 'SHA2-256', msg: 'abc' })).toEqual({
      ok: false,
      code: ResultCode.INVALID_ARG,
    });
  });
});

describe('enableHashCapabilities', () => {
  it('registers SHA2-256 with its message-length domain', async () => {
    const session = new FakeSession();
    const rv = await enableHashCapabilities(session, memoryOutput());

    expect(rv).toBe(ResultCode.SUCCESS);
    expect(session.ops).toEqual(['enableHash', 'setHashDomain']);
    expect(session.argsOf('enableHash')).toEqual(['SHA2-256', shaHandler]);
    expect(session.argsOf('setHashDomain')).toEqual(['SHA2-256', 'messageLength', 0, 65536, 8]);
  });

  it('stops at a failed enable', async () => {
    const session = new FakeSession();
    session.results.enableHash = ResultCode.DUP_CIPHER;
    const out = memoryOutput();
    const rv = await enableHashCapabilities(session, out);

    expect(rv).toBe(ResultCode.DUP_CIPHER);
    expect(session.ops).toEqual(['enableHash']);
    expect(out.errors).toEqual([
      'Failed to register capability with the engine (rv=15: duplicate cipher, may have already registered)',
    ]);
  });

  it('reports a failed domain', async () => {
    const session = new FakeSession();
    session.results.setHashDomain = ResultCode.INVALID_ARG;
    const rv = await enableHashCapabilities(session, memoryOutput());
    expect(rv).toBe(ResultCode.INVALID_ARG);
  });
});
