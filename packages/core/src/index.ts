export * from './types.js';
export { ResultCode, describeResult, isResultCode } from './engine/result.js';
export type {
  CreateSessionResult,
  EngineSession,
  HashHandler,
  HashResult,
  ProgressCallback,
  ProtocolEngine,
  TwoFactorCallback,
} from './engine/types.js';
export { DryRunEngine, DryRunSession, type JournalEntry } from './engine/dry-run.js';
export {
  ENV,
  formatRuntimeSummary,
  isDefaultServer,
  parsePort,
  resolveEnvironment,
  resolveRuntimeParameters,
  type EnvSource,
  type ResolvedEnvironment,
} from './environment.js';
export { createProgressSink, formatProgress, parseLogLevel } from './progress.js';
export { runFipsGate, FIPS_BYPASS_WARNING, type FipsGateResult, type FipsGateState } from './fips/gate.js';
export { NodeFipsProvider, runKnownAnswers, type FipsProvider } from './fips/provider.js';
export { enableHashCapabilities, HASH_CAPABILITIES, shaHandler, type HashCapability } from './capabilities/hash.js';
export { createTotpCallback, decodeSeed, generateTotp } from './auth/totp.js';
export { saveStringToFile, readJsonFile, type SaveResult } from './storage.js';
export * from './orchestration/index.js';
