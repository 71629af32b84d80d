export {
  MODE_PRECEDENCE,
  OFFLINE_PAIR_REQUIRED,
  needsCapabilities,
  putAfterTestFile,
  selectMode,
  type ActionMode,
  type ModeKind,
  type ModeRule,
  type ModeStage,
  type SelectedMode,
} from './modes.js';
export { SessionScope } from './session-scope.js';
export { applyRegistration, constructSession } from './construct.js';
export { dispatchMode, FIPS_MODULE_ID, FIPS_OE_ID, type DispatchContext } from './dispatcher.js';
export { runSession, type OrchestratorDeps, type RunOutcome } from './orchestrator.js';
