export { BASE_URL, MAX_PAGE_TIMEOUT_MS, isLeakContext, isMarkupContext } from './context.js';
export { renderDocument, speedUpMetaRefresh } from './renderer.js';
export { inferTimeoutMs, resolveCaseTimeoutMs } from './timeouts.js';
export {
  NO_EXECUTION_DETAILS,
  classifySignals,
  executedResult,
  toVectorResult,
  type Classification,
  type ExecutionSignal,
} from './classifier.js';
export type {
  DialogEvent,
  DriverLauncher,
  InterceptedRequest,
  PageCallResult,
  PageDriver,
  RouteDecision,
} from './driver.js';
export { PlaywrightPageDriver, launchPlaywrightDriver } from './playwright-driver.js';
export {
  SignalSession,
  openSignalSession,
  type CaseInput,
  type CaseSession,
  type SessionState,
  type SignalSessionOptions,
} from './session.js';
