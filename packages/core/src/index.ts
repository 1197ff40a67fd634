// @sinkbench/core entry point
//
// Corpus loading, sanitizer adapters, the browser harness and the two
// orchestrators (sequential reuse mode and the forked worker pool).

export * from './corpus/index.js';
export * from './sanitizers/index.js';
export * from './harness/index.js';
export { extractStartTags, verifyExpectedTags, type LossyVerdict } from './lossy/verifier.js';
export * from './bench/index.js';

// Errors
export { ErrorCode, type Severity, getExitCode, isErrorCode, EXIT_CODES } from './errors/codes.js';
export {
  ErrorPresenter,
  type CLIErrorView,
  type PresenterOptions,
} from './errors/presenter.js';
export { didYouMean, suggestAlternatives } from './errors/suggestions.js';
export * from './types/errors.js';
