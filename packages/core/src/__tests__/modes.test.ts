import { describe, expect, it } from 'vitest';
import {
  MODE_PRECEDENCE,
  needsCapabilities,
  OFFLINE_PAIR_REQUIRED,
  putAfterTestFile,
  selectMode,
  type ModeKind,
} from '../orchestration/modes.js';
import type { SessionConfigInput } from '../types.js';
import { makeConfig } from './helpers.js';

/** Minimal flags that trigger each terminal action on their own. */
const TRIGGERS: Array<{ kind: ModeKind; flags: SessionConfigInput }> = [
  { kind: 'cost', flags: { getCost: true } },
  { kind: 'registration', flags: { getRegistration: true } },
  { kind: 'kat', flags: { katFile: 'kat.json' } },
  { kind: 'offlineVectors', flags: { vectorReqFile: 'req.json', vectorRspFile: 'rsp.json' } },
  { kind: 'uploadVectors', flags: { vectorUploadFile: 'upload.json' } },
  { kind: 'putData', flags: { putFile: 'artifact.json', emptyAlg: true } },
  { kind: 'results', flags: { getResults: true, sessionFile: 'session.json' } },
  { kind: 'resume', flags: { resumeSession: true, sessionFile: 'session.json' } },
  { kind: 'cancel', flags: { cancelSession: true, sessionFile: 'session.json' } },
  { kind: 'expectedResults', flags: { getExpected: true, sessionFile: 'session.json' } },
];

describe('selectMode', () => {
  it('falls back to the default run for an empty config', () => {
    expect(selectMode(makeConfig())).toEqual({
      kind: 'run',
      stage: 'session',
      fipsValidation: false,
      postResourcesFile: undefined,
      certReqFile: undefined,
    });
  });

  it('rejects a response file without a request file', () => {
    expect(selectMode(makeConfig({ vectorRspFile: 'rsp.json', getCost: true }))).toEqual({
      kind: 'invalid',
      reason: OFFLINE_PAIR_REQUIRED,
    });
  });

  it('treats a lone request file as a construction modifier, not a mode', () => {
    expect(selectMode(makeConfig({ vectorReqFile: 'req.json' })).kind).toBe('run');
  });

  it('follows the table order', () => {
    expect(MODE_PRECEDENCE.map((r) => r.kind)).toEqual(TRIGGERS.map((t) => t.kind));
  });

  it.each(TRIGGERS)('selects $kind on its own', ({ kind, flags }) => {
    expect(selectMode(makeConfig(flags)).kind).toBe(kind);
  });

  describe('pairwise precedence', () => {
    for (let i = 0; i < TRIGGERS.length; i++) {
      for (let j = i + 1; j < TRIGGERS.length; j++) {
        const higher = TRIGGERS[i];
        const lower = TRIGGERS[j];
        it(`${higher.kind} beats ${lower.kind}`, () => {
          const config = makeConfig({ ...lower.flags, ...higher.flags });
          expect(selectMode(config).kind).toBe(higher.kind);
        });
      }
    }
  });

  it('lets cost win over every other terminal flag at once', () => {
    const all = Object.assign({}, ...TRIGGERS.map((t) => t.flags));
    expect(selectMode(makeConfig(all)).kind).toBe('cost');
  });

  it('carries save files and validation intent', () => {
    expect(
      selectMode(
        makeConfig({
          resumeSession: true,
          sessionFile: 'session.json',
          saveFile: 'out.json',
          validationMetadataFile: 'oe.json',
        }),
      ),
    ).toEqual({
      kind: 'resume',
      stage: 'session',
      sessionFile: 'session.json',
      fipsValidation: true,
      saveFile: 'out.json',
    });
  });

  it('keeps run modifiers on the default run', () => {
    expect(selectMode(makeConfig({ postResourcesFile: 'res.json', certReqFile: 'cert.json' }))).toEqual({
      kind: 'run',
      stage: 'session',
      fipsValidation: false,
      postResourcesFile: 'res.json',
      certReqFile: 'cert.json',
    });
  });

  it('does not turn a PUT with algorithms into a terminal action', () => {
    expect(selectMode(makeConfig({ putFile: 'artifact.json' })).kind).toBe('run');
  });
});

describe('putAfterTestFile', () => {
  it('is set only for a PUT that carries algorithms', () => {
    expect(putAfterTestFile(makeConfig({ putFile: 'artifact.json' }))).toBe('artifact.json');
    expect(putAfterTestFile(makeConfig({ putFile: 'artifact.json', emptyAlg: true }))).toBeUndefined();
    expect(putAfterTestFile(makeConfig())).toBeUndefined();
  });
});

describe('needsCapabilities', () => {
  it('is skipped for manual registration and get-only sessions', () => {
    expect(needsCapabilities(makeConfig({ hash: true }))).toBe(true);
    expect(needsCapabilities(makeConfig({ hash: true, regFile: 'reg.json' }))).toBe(false);
    expect(needsCapabilities(makeConfig({ hash: true, getString: 'testSessions' }))).toBe(false);
    expect(needsCapabilities(makeConfig())).toBe(false);
  });
});
