import { Chalk } from 'chalk';
import { ResultCode } from '../engine/result.js';
import type {
  CreateSessionResult,
  EngineSession,
  HashHandler,
  ProgressCallback,
  ProtocolEngine,
  TwoFactorCallback,
} from '../engine/types.js';
import type { FipsProvider } from '../fips/provider.js';
import {
  type HashAlgorithm,
  type HashParameter,
  type LogLevel,
  type Output,
  SessionConfigSchema,
  type SessionConfig,
  type SessionConfigInput,
} from '../types.js';

export const plain = new Chalk({ level: 0 });

export function makeConfig(overrides: SessionConfigInput = {}): SessionConfig {
  return SessionConfigSchema.parse(overrides);
}

export interface MemoryOutput extends Output {
  lines: string[];
  errors: string[];
}

export function memoryOutput(): MemoryOutput {
  const lines: string[] = [];
  const errors: string[] = [];
  return {
    lines,
    errors,
    log: (line) => lines.push(line),
    error: (line) => errors.push(line),
  };
}

export const noFips: FipsProvider = {
  isSupported: () => false,
  enable: () => undefined,
  isEnabled: () => false,
  selfTest: () => ResultCode.SUCCESS,
};

type SessionOp = keyof EngineSession;

/** Engine session that journals calls and answers from a result table. */
export class FakeSession implements EngineSession {
  readonly calls: Array<{ op: SessionOp; args: unknown[] }> = [];
  readonly results: Partial<Record<SessionOp, ResultCode>> = {};
  vectorSetCount = 3;
  registration: string | null = '{"algorithms":[]}';
  throwOn: SessionOp | null = null;

  get ops(): SessionOp[] {
    return this.calls.map((c) => c.op);
  }

  argsOf(op: SessionOp): unknown[] | undefined {
    return this.calls.find((c) => c.op === op)?.args;
  }

  private call(op: SessionOp, args: unknown[]): Promise<ResultCode> {
    this.calls.push({ op, args });
    if (this.throwOn === op) return Promise.reject(new Error(`${op} exploded`));
    return Promise.resolve(this.results[op] ?? ResultCode.SUCCESS);
  }

  setServer(host: string, port: number) { return this.call('setServer', [host, port]); }
  setApiContext(context: string) { return this.call('setApiContext', [context]); }
  setPathSegment(segment: string) { return this.call('setPathSegment', [segment]); }
  setCaCerts(caFile: string) { return this.call('setCaCerts', [caFile]); }
  setCertKey(certFile: string, keyFile: string) { return this.call('setCertKey', [certFile, keyFile]); }
  setTwoFactorCallback(callback: TwoFactorCallback) { return this.call('setTwoFactorCallback', [callback]); }
  markAsSample() { return this.call('markAsSample', []); }
  markAsGetOnly(query: string) { return this.call('markAsGetOnly', [query]); }
  setGetSaveFile(saveFile: string) { return this.call('setGetSaveFile', [saveFile]); }
  markAsPostOnly(postFile: string) { return this.call('markAsPostOnly', [postFile]); }
  markAsDeleteOnly(url: string) { return this.call('markAsDeleteOnly', [url]); }
  markAsRequestOnly(requestFile: string) { return this.call('markAsRequestOnly', [requestFile]); }
  enableHash(algorithm: HashAlgorithm, handler: HashHandler) { return this.call('enableHash', [algorithm, handler]); }
  setHashDomain(algorithm: HashAlgorithm, parameter: HashParameter, min: number, max: number, increment: number) {
    return this.call('setHashDomain', [algorithm, parameter, min, max, increment]);
  }
  setJsonFilename(regFile: string) { return this.call('setJsonFilename', [regFile]); }
  async getVectorSetCount() {
    await this.call('getVectorSetCount', []);
    return this.vectorSetCount;
  }
  async getCurrentRegistration() {
    await this.call('getCurrentRegistration', []);
    return this.registration;
  }
  loadKatFile(katFile: string) { return this.call('loadKatFile', [katFile]); }
  runVectorsFromFile(requestFile: string, responseFile: string) { return this.call('runVectorsFromFile', [requestFile, responseFile]); }
  ingestOeMetadata(metadataFile: string) { return this.call('ingestOeMetadata', [metadataFile]); }
  setOeFipsMetadata(moduleId: number, oeId: number) { return this.call('setOeFipsMetadata', [moduleId, oeId]); }
  uploadVectorsFromFile(uploadFile: string, fipsValidation: boolean) { return this.call('uploadVectorsFromFile', [uploadFile, fipsValidation]); }
  putDataFromFile(putFile: string) { return this.call('putDataFromFile', [putFile]); }
  markAsPutAfterTest(putFile: string) { return this.call('markAsPutAfterTest', [putFile]); }
  getResultsFromServer(sessionFile: string) { return this.call('getResultsFromServer', [sessionFile]); }
  resumeSession(sessionFile: string, fipsValidation: boolean, saveFile?: string) {
    return this.call('resumeSession', [sessionFile, fipsValidation, saveFile]);
  }
  cancelSession(sessionFile: string, saveFile?: string) { return this.call('cancelSession', [sessionFile, saveFile]); }
  getExpectedResults(sessionFile: string, saveFile?: string) { return this.call('getExpectedResults', [sessionFile, saveFile]); }
  markAsPostResources(resourcesFile: string) { return this.call('markAsPostResources', [resourcesFile]); }
  markAsCertRequest(certReqFile: string) { return this.call('markAsCertRequest', [certReqFile]); }
  run(fipsValidation: boolean) { return this.call('run', [fipsValidation]); }
}

export class FakeEngine implements ProtocolEngine {
  readonly name = 'fake';
  readonly session = new FakeSession();
  createFailure: ResultCode | null = null;
  cleanupResult: ResultCode = ResultCode.SUCCESS;
  createCalls = 0;
  level: LogLevel | null = null;
  progress: ProgressCallback | null = null;
  readonly cleaned: EngineSession[] = [];

  async createSession(progress: ProgressCallback, level: LogLevel): Promise<CreateSessionResult> {
    this.createCalls++;
    this.progress = progress;
    this.level = level;
    if (this.createFailure !== null) return { ok: false, code: this.createFailure };
    return { ok: true, session: this.session };
  }

  async cleanup(session: EngineSession): Promise<ResultCode> {
    this.cleaned.push(session);
    return this.cleanupResult;
  }

  get contacted(): boolean {
    return this.createCalls > 0 || this.cleaned.length > 0;
  }
}
