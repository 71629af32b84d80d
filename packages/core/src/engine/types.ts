import type {
  HashAlgorithm,
  HashParameter,
  HashTestCase,
  LogLevel,
} from '../types.js';
import type { ResultCode } from './result.js';

/** Leveled status callback the engine reports progress through. */
export type ProgressCallback = (message: string, level: LogLevel) => ResultCode;

export type HashResult = { ok: true; md: string } | { ok: false; code: ResultCode };

export type HashHandler = (testCase: HashTestCase) => HashResult;

/** Produces the current one-time password for two-factor login. */
export type TwoFactorCallback = () => { ok: true; token: string } | { ok: false; code: ResultCode };

/**
 * One conformance-test session held by a protocol engine.
 *
 * Setters and `mark*` calls configure the session and may be issued in any
 * order; a single terminal call (`run`, `resumeSession`, ...) then consumes it.
 */
export interface EngineSession {
  // Connection
  setServer(host: string, port: number): Promise<ResultCode>;
  setApiContext(context: string): Promise<ResultCode>;
  setPathSegment(segment: string): Promise<ResultCode>;
  setCaCerts(caFile: string): Promise<ResultCode>;
  setCertKey(certFile: string, keyFile: string): Promise<ResultCode>;
  setTwoFactorCallback(callback: TwoFactorCallback): Promise<ResultCode>;

  // Construction-time modifiers
  markAsSample(): Promise<ResultCode>;
  markAsGetOnly(query: string): Promise<ResultCode>;
  setGetSaveFile(saveFile: string): Promise<ResultCode>;
  markAsPostOnly(postFile: string): Promise<ResultCode>;
  markAsDeleteOnly(url: string): Promise<ResultCode>;
  markAsRequestOnly(requestFile: string): Promise<ResultCode>;

  // Registration
  enableHash(algorithm: HashAlgorithm, handler: HashHandler): Promise<ResultCode>;
  setHashDomain(
    algorithm: HashAlgorithm,
    parameter: HashParameter,
    min: number,
    max: number,
    increment: number,
  ): Promise<ResultCode>;
  setJsonFilename(regFile: string): Promise<ResultCode>;

  /** Number of vector sets the registration would generate; negative on failure. */
  getVectorSetCount(): Promise<number>;
  /** Serialized registration, or null when it cannot be produced. */
  getCurrentRegistration(): Promise<string | null>;

  // Offline work
  loadKatFile(katFile: string): Promise<ResultCode>;
  runVectorsFromFile(requestFile: string, responseFile: string): Promise<ResultCode>;

  // Validation metadata
  ingestOeMetadata(metadataFile: string): Promise<ResultCode>;
  setOeFipsMetadata(moduleId: number, oeId: number): Promise<ResultCode>;

  // Submission
  uploadVectorsFromFile(uploadFile: string, fipsValidation: boolean): Promise<ResultCode>;
  putDataFromFile(putFile: string): Promise<ResultCode>;
  markAsPutAfterTest(putFile: string): Promise<ResultCode>;

  // Saved sessions
  getResultsFromServer(sessionFile: string): Promise<ResultCode>;
  resumeSession(sessionFile: string, fipsValidation: boolean, saveFile?: string): Promise<ResultCode>;
  cancelSession(sessionFile: string, saveFile?: string): Promise<ResultCode>;
  getExpectedResults(sessionFile: string, saveFile?: string): Promise<ResultCode>;

  // Run modifiers
  markAsPostResources(resourcesFile: string): Promise<ResultCode>;
  markAsCertRequest(certReqFile: string): Promise<ResultCode>;

  run(fipsValidation: boolean): Promise<ResultCode>;
}

export type CreateSessionResult =
  | { ok: true; session: EngineSession }
  | { ok: false; code: ResultCode };

export interface ProtocolEngine {
  readonly name: string;
  createSession(progress: ProgressCallback, level: LogLevel): Promise<CreateSessionResult>;
  /** Releases the session and everything the engine holds for it. */
  cleanup(session: EngineSession): Promise<ResultCode>;
}
