/**
 * DryRunEngine: an offline protocol engine.
 *
 * Journals every call and answers everything it can locally: registrations
 * built from enabled capabilities or a manual JSON file, vector-set counts,
 * known-answer files and offline request/response files. Operations that need
 * a live server are reported and acknowledged without side effects.
 */

import { z } from 'zod';
import { readJsonFile, saveStringToFile } from '../storage.js';
import { HashAlgorithm, type HashDomain, type HashParameter, LogLevel } from '../types.js';
import { describeResult, ResultCode } from './result.js';
import type {
  CreateSessionResult,
  EngineSession,
  HashHandler,
  ProgressCallback,
  ProtocolEngine,
  TwoFactorCallback,
} from './types.js';

export interface JournalEntry {
  op: string;
  args: unknown[];
}

const ManualRegistrationSchema = z.union([
  z.array(z.object({ algorithm: z.string() }).passthrough()),
  z.object({ algorithms: z.array(z.object({ algorithm: z.string() }).passthrough()) }).passthrough(),
]);

const VectorFileSchema = z.object({
  algorithm: HashAlgorithm,
  tests: z.array(
    z.object({
      tcId: z.number().int(),
      msg: z.string(),
      md: z.string().optional(),
    }),
  ),
});

type VectorFile = z.infer<typeof VectorFileSchema>;

const OeMetadataSchema = z.object({}).passthrough();

interface HashRegistration {
  handler: HashHandler;
  domains: Partial<Record<HashParameter, HashDomain>>;
}

function readFailureCode(kind: 'missing' | 'syntax' | 'shape'): ResultCode {
  if (kind === 'missing') return ResultCode.MISSING_ARG;
  if (kind === 'syntax') return ResultCode.JSON_ERR;
  return ResultCode.MALFORMED_JSON;
}

export class DryRunSession implements EngineSession {
  readonly journal: JournalEntry[] = [];
  private readonly hashes = new Map<HashAlgorithm, HashRegistration>();
  private manualAlgorithms: string[] | null = null;
  private oeMetadataLoaded = false;
  private twoFactor: TwoFactorCallback | null = null;
  private onlyMode: 'get' | 'post' | 'delete' | null = null;

  constructor(
    private readonly progress: ProgressCallback,
    private readonly level: LogLevel,
  ) {}

  private record(op: string, ...args: unknown[]): void {
    this.journal.push({ op, args });
    if (this.level >= LogLevel.VERBOSE) this.progress(`dry run: ${op}`, LogLevel.VERBOSE);
  }

  private status(message: string): void {
    if (this.level >= LogLevel.STATUS) this.progress(message, LogLevel.STATUS);
  }

  private error(message: string, rv: ResultCode): ResultCode {
    this.progress(`${message} (${describeResult(rv)})`, LogLevel.ERR);
    return rv;
  }

  private offline(action: string): ResultCode {
    this.status(`dry run: skipping ${action}, no server is contacted`);
    return ResultCode.SUCCESS;
  }

  private registeredAlgorithms(): string[] {
    return this.manualAlgorithms ?? [...this.hashes.keys()];
  }

  async setServer(host: string, port: number): Promise<ResultCode> {
    this.record('setServer', host, port);
    if (!host || port <= 0) return ResultCode.INVALID_ARG;
    return ResultCode.SUCCESS;
  }

  async setApiContext(context: string): Promise<ResultCode> {
    this.record('setApiContext', context);
    return ResultCode.SUCCESS;
  }

  async setPathSegment(segment: string): Promise<ResultCode> {
    this.record('setPathSegment', segment);
    return segment ? ResultCode.SUCCESS : ResultCode.MISSING_ARG;
  }

  async setCaCerts(caFile: string): Promise<ResultCode> {
    this.record('setCaCerts', caFile);
    return caFile ? ResultCode.SUCCESS : ResultCode.MISSING_ARG;
  }

  async setCertKey(certFile: string, keyFile: string): Promise<ResultCode> {
    this.record('setCertKey', certFile, keyFile);
    return certFile && keyFile ? ResultCode.SUCCESS : ResultCode.MISSING_ARG;
  }

  async setTwoFactorCallback(callback: TwoFactorCallback): Promise<ResultCode> {
    this.record('setTwoFactorCallback');
    this.twoFactor = callback;
    return ResultCode.SUCCESS;
  }

  async markAsSample(): Promise<ResultCode> {
    this.record('markAsSample');
    return ResultCode.SUCCESS;
  }

  async markAsGetOnly(query: string): Promise<ResultCode> {
    this.record('markAsGetOnly', query);
    this.onlyMode = 'get';
    return ResultCode.SUCCESS;
  }

  async setGetSaveFile(saveFile: string): Promise<ResultCode> {
    this.record('setGetSaveFile', saveFile);
    return this.onlyMode === 'get' ? ResultCode.SUCCESS : ResultCode.UNSUPPORTED_OP;
  }

  async markAsPostOnly(postFile: string): Promise<ResultCode> {
    this.record('markAsPostOnly', postFile);
    this.onlyMode = 'post';
    return ResultCode.SUCCESS;
  }

  async markAsDeleteOnly(url: string): Promise<ResultCode> {
    this.record('markAsDeleteOnly', url);
    this.onlyMode = 'delete';
    return ResultCode.SUCCESS;
  }

  async markAsRequestOnly(requestFile: string): Promise<ResultCode> {
    this.record('markAsRequestOnly', requestFile);
    return ResultCode.SUCCESS;
  }

  async enableHash(algorithm: HashAlgorithm, handler: HashHandler): Promise<ResultCode> {
    this.record('enableHash', algorithm);
    if (this.hashes.has(algorithm)) return ResultCode.DUP_CIPHER;
    this.hashes.set(algorithm, { handler, domains: {} });
    return ResultCode.SUCCESS;
  }

  async setHashDomain(
    algorithm: HashAlgorithm,
    parameter: HashParameter,
    min: number,
    max: number,
    increment: number,
  ): Promise<ResultCode> {
    this.record('setHashDomain', algorithm, parameter, min, max, increment);
    const reg = this.hashes.get(algorithm);
    if (!reg) return ResultCode.NO_CAP;
    if (min < 0 || max < min || increment <= 0) return ResultCode.INVALID_ARG;
    reg.domains[parameter] = { min, max, increment };
    return ResultCode.SUCCESS;
  }

  async setJsonFilename(regFile: string): Promise<ResultCode> {
    this.record('setJsonFilename', regFile);
    const read = readJsonFile(regFile, ManualRegistrationSchema);
    if (!read.ok) return this.error(`Unable to load registration ${regFile}: ${read.reason}`, readFailureCode(read.kind));
    const entries = Array.isArray(read.data) ? read.data : read.data.algorithms;
    this.manualAlgorithms = entries.map((e) => e.algorithm);
    return ResultCode.SUCCESS;
  }

  async getVectorSetCount(): Promise<number> {
    this.record('getVectorSetCount');
    const count = this.registeredAlgorithms().length;
    return count > 0 ? count : -1;
  }

  async getCurrentRegistration(): Promise<string | null> {
    this.record('getCurrentRegistration');
    if (this.manualAlgorithms) {
      return JSON.stringify({ algorithms: this.manualAlgorithms.map((algorithm) => ({ algorithm })) }, null, 2);
    }
    if (this.hashes.size === 0) return null;

    const algorithms = [...this.hashes.entries()].map(([algorithm, reg]) => ({
      algorithm,
      revision: '1.0',
      ...reg.domains,
    }));
    return JSON.stringify({ algorithms }, null, 2);
  }

  /** Run each test through its registered handler; `md` answers are checked when present. */
  private process(file: VectorFile): { ok: true; tests: Array<{ tcId: number; md: string }> } | { ok: false; code: ResultCode } {
    const reg = this.hashes.get(file.algorithm);
    if (!reg) return { ok: false, code: this.error(`No capability registered for ${file.algorithm}`, ResultCode.NO_CAP) };

    const tests: Array<{ tcId: number; md: string }> = [];
    for (const t of file.tests) {
      const result = reg.handler({ tcId: t.tcId, algorithm: file.algorithm, msg: t.msg });
      if (!result.ok) return { ok: false, code: this.error(`Handler failed on test ${t.tcId}`, result.code) };
      if (t.md !== undefined && t.md.toLowerCase() !== result.md) {
        return { ok: false, code: this.error(`Known answer mismatch on test ${t.tcId}`, ResultCode.CRYPTO_MODULE_FAIL) };
      }
      tests.push({ tcId: t.tcId, md: result.md });
    }
    return { ok: true, tests };
  }

  async loadKatFile(katFile: string): Promise<ResultCode> {
    this.record('loadKatFile', katFile);
    const read = readJsonFile(katFile, VectorFileSchema);
    if (!read.ok) return this.error(`Unable to load ${katFile}: ${read.reason}`, readFailureCode(read.kind));

    const result = this.process(read.data);
    if (!result.ok) return result.code;
    this.status(`${result.tests.length} known-answer tests passed for ${read.data.algorithm}`);
    return ResultCode.SUCCESS;
  }

  async runVectorsFromFile(requestFile: string, responseFile: string): Promise<ResultCode> {
    this.record('runVectorsFromFile', requestFile, responseFile);
    const read = readJsonFile(requestFile, VectorFileSchema);
    if (!read.ok) return this.error(`Unable to load ${requestFile}: ${read.reason}`, readFailureCode(read.kind));

    const result = this.process(read.data);
    if (!result.ok) return result.code;

    const saved = saveStringToFile(
      responseFile,
      JSON.stringify({ algorithm: read.data.algorithm, tests: result.tests }, null, 2),
    );
    if (!saved.ok) return this.error(`Unable to write ${responseFile}: ${saved.reason}`, ResultCode.INTERNAL_ERR);
    this.status(`Wrote ${result.tests.length} responses to ${responseFile}`);
    return ResultCode.SUCCESS;
  }

  async ingestOeMetadata(metadataFile: string): Promise<ResultCode> {
    this.record('ingestOeMetadata', metadataFile);
    const read = readJsonFile(metadataFile, OeMetadataSchema);
    if (!read.ok) return this.error(`Unable to load ${metadataFile}: ${read.reason}`, readFailureCode(read.kind));
    this.oeMetadataLoaded = true;
    return ResultCode.SUCCESS;
  }

  async setOeFipsMetadata(moduleId: number, oeId: number): Promise<ResultCode> {
    this.record('setOeFipsMetadata', moduleId, oeId);
    return this.oeMetadataLoaded ? ResultCode.SUCCESS : ResultCode.MISSING_ARG;
  }

  async uploadVectorsFromFile(uploadFile: string, fipsValidation: boolean): Promise<ResultCode> {
    this.record('uploadVectorsFromFile', uploadFile, fipsValidation);
    return this.offline(`upload of ${uploadFile}`);
  }

  async putDataFromFile(putFile: string): Promise<ResultCode> {
    this.record('putDataFromFile', putFile);
    return this.offline(`PUT of ${putFile}`);
  }

  async markAsPutAfterTest(putFile: string): Promise<ResultCode> {
    this.record('markAsPutAfterTest', putFile);
    return ResultCode.SUCCESS;
  }

  async getResultsFromServer(sessionFile: string): Promise<ResultCode> {
    this.record('getResultsFromServer', sessionFile);
    return this.offline(`results for ${sessionFile}`);
  }

  async resumeSession(sessionFile: string, fipsValidation: boolean, saveFile?: string): Promise<ResultCode> {
    this.record('resumeSession', sessionFile, fipsValidation, saveFile);
    return this.offline(`resume of ${sessionFile}`);
  }

  async cancelSession(sessionFile: string, saveFile?: string): Promise<ResultCode> {
    this.record('cancelSession', sessionFile, saveFile);
    return this.offline(`cancel of ${sessionFile}`);
  }

  async getExpectedResults(sessionFile: string, saveFile?: string): Promise<ResultCode> {
    this.record('getExpectedResults', sessionFile, saveFile);
    return this.offline(`expected results for ${sessionFile}`);
  }

  async markAsPostResources(resourcesFile: string): Promise<ResultCode> {
    this.record('markAsPostResources', resourcesFile);
    return ResultCode.SUCCESS;
  }

  async markAsCertRequest(certReqFile: string): Promise<ResultCode> {
    this.record('markAsCertRequest', certReqFile);
    return ResultCode.SUCCESS;
  }

  async run(fipsValidation: boolean): Promise<ResultCode> {
    this.record('run', fipsValidation);
    if (this.onlyMode === null && this.registeredAlgorithms().length === 0) {
      return this.error('Nothing to test: no capabilities registered', ResultCode.NO_CAP);
    }
    if (this.twoFactor) {
      const token = this.twoFactor();
      if (!token.ok) return this.error('Unable to produce a two-factor token', token.code);
    }
    return this.offline('test session run');
  }
}

export class DryRunEngine implements ProtocolEngine {
  readonly name = 'dry-run';
  readonly sessions: DryRunSession[] = [];
  private live = new Set<DryRunSession>();

  async createSession(progress: ProgressCallback, level: LogLevel): Promise<CreateSessionResult> {
    const session = new DryRunSession(progress, level);
    this.sessions.push(session);
    this.live.add(session);
    return { ok: true, session };
  }

  async cleanup(session: EngineSession): Promise<ResultCode> {
    if (!(session instanceof DryRunSession) || !this.live.delete(session)) return ResultCode.CLEANUP_FAIL;
    return ResultCode.SUCCESS;
  }

  get openSessions(): number {
    return this.live.size;
  }
}
