/**
 * Mode selection: the precedence table that picks exactly one terminal
 * action for a session.
 *
 * Stages decide which shared steps run ahead of the action:
 *   local   : offline/local work; no default-server advisory, no FIPS metadata
 *   submit  : talks to the server; advisory and FIPS metadata apply
 *   session : as submit, plus the PUT-after-test mark
 */

import type { SessionConfig } from '../types.js';

export type ModeStage = 'local' | 'submit' | 'session';

export type SelectedMode =
  | { kind: 'invalid'; reason: string }
  | { kind: 'cost'; stage: 'local' }
  | { kind: 'registration'; stage: 'local'; saveFile?: string }
  | { kind: 'kat'; stage: 'local'; katFile: string }
  | { kind: 'offlineVectors'; stage: 'local'; requestFile: string; responseFile: string }
  | { kind: 'uploadVectors'; stage: 'submit'; uploadFile: string; fipsValidation: boolean }
  | { kind: 'putData'; stage: 'submit'; putFile: string }
  | { kind: 'results'; stage: 'session'; sessionFile: string }
  | { kind: 'resume'; stage: 'session'; sessionFile: string; fipsValidation: boolean; saveFile?: string }
  | { kind: 'cancel'; stage: 'session'; sessionFile: string; saveFile?: string }
  | { kind: 'expectedResults'; stage: 'session'; sessionFile: string; saveFile?: string }
  | {
      kind: 'run';
      stage: 'session';
      fipsValidation: boolean;
      postResourcesFile?: string;
      certReqFile?: string;
    };

export type ModeKind = SelectedMode['kind'];
export type ActionMode = Exclude<SelectedMode, { kind: 'invalid' }>;

export interface ModeRule {
  kind: Exclude<ModeKind, 'invalid' | 'run'>;
  select(config: SessionConfig): ActionMode | null;
}

const isFipsValidation = (config: SessionConfig): boolean => config.validationMetadataFile !== undefined;

/** Terminal actions in precedence order; the first match wins. */
export const MODE_PRECEDENCE: readonly ModeRule[] = [
  {
    kind: 'cost',
    select: (c) => (c.getCost ? { kind: 'cost', stage: 'local' } : null),
  },
  {
    kind: 'registration',
    select: (c) =>
      c.getRegistration ? { kind: 'registration', stage: 'local', saveFile: c.saveFile } : null,
  },
  {
    kind: 'kat',
    select: (c) => (c.katFile ? { kind: 'kat', stage: 'local', katFile: c.katFile } : null),
  },
  {
    kind: 'offlineVectors',
    select: (c) =>
      c.vectorReqFile && c.vectorRspFile
        ? { kind: 'offlineVectors', stage: 'local', requestFile: c.vectorReqFile, responseFile: c.vectorRspFile }
        : null,
  },
  {
    kind: 'uploadVectors',
    select: (c) =>
      c.vectorUploadFile
        ? { kind: 'uploadVectors', stage: 'submit', uploadFile: c.vectorUploadFile, fipsValidation: isFipsValidation(c) }
        : null,
  },
  {
    kind: 'putData',
    select: (c) =>
      c.putFile && c.emptyAlg ? { kind: 'putData', stage: 'submit', putFile: c.putFile } : null,
  },
  {
    kind: 'results',
    select: (c) =>
      c.getResults && c.sessionFile ? { kind: 'results', stage: 'session', sessionFile: c.sessionFile } : null,
  },
  {
    kind: 'resume',
    select: (c) =>
      c.resumeSession && c.sessionFile
        ? {
            kind: 'resume',
            stage: 'session',
            sessionFile: c.sessionFile,
            fipsValidation: isFipsValidation(c),
            saveFile: c.saveFile,
          }
        : null,
  },
  {
    kind: 'cancel',
    select: (c) =>
      c.cancelSession && c.sessionFile
        ? { kind: 'cancel', stage: 'session', sessionFile: c.sessionFile, saveFile: c.saveFile }
        : null,
  },
  {
    kind: 'expectedResults',
    select: (c) =>
      c.getExpected && c.sessionFile
        ? { kind: 'expectedResults', stage: 'session', sessionFile: c.sessionFile, saveFile: c.saveFile }
        : null,
  },
];

export const OFFLINE_PAIR_REQUIRED =
  'Offline vector processing requires both options, --vector-req and --vector-rsp';

/** Apply the precedence table. Pure: touches no engine and no file. */
export function selectMode(config: SessionConfig): SelectedMode {
  if (config.vectorRspFile && !config.vectorReqFile) {
    return { kind: 'invalid', reason: OFFLINE_PAIR_REQUIRED };
  }

  for (const rule of MODE_PRECEDENCE) {
    const mode = rule.select(config);
    if (mode) return mode;
  }

  return {
    kind: 'run',
    stage: 'session',
    fipsValidation: isFipsValidation(config),
    postResourcesFile: config.postResourcesFile,
    certReqFile: config.certReqFile,
  };
}

/** File to PUT once the run completes; only a PUT that carries algorithms qualifies. */
export function putAfterTestFile(config: SessionConfig): string | undefined {
  return config.putFile && !config.emptyAlg ? config.putFile : undefined;
}

/** Capabilities are built only for from-scratch sessions. */
export function needsCapabilities(config: SessionConfig): boolean {
  return config.regFile === undefined && config.getString === undefined && config.hash;
}
