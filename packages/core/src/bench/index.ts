export { adaptPayload, foldOutcome, runCase, type RunCaseOptions } from './case.js';
export {
  ALL_BROWSERS,
  DEFAULT_BROWSERS,
  defaultSessionProvider,
  plannedCaseCount,
  runBench,
  type BenchOptions,
  type ProgressCallback,
  type SessionProvider,
} from './orchestrator.js';
export { summarizeResults } from './summary.js';
export {
  DEFAULT_STALL_TIMEOUT_S,
  DEFAULT_TEARDOWN_GRACE_MS,
  effectiveWorkerCount,
  orderResults,
  runBenchParallel,
  type ParallelBenchOptions,
} from './parallel/pool.js';
export { vectorsPerTask } from './parallel/batching.js';
export { forkSpawner, type WorkerHandle, type WorkerSpawner } from './parallel/transport.js';
