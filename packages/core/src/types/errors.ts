/**
 * Error hierarchy for sinkbench
 * Structured errors with stable codes and context. Case-level failures are
 * folded into `error` outcomes by the orchestrator; only launch and
 * configuration failures reach the CLI.
 */

import {
  ErrorCode,
  type Severity,
  getExitCode as _getExitCode,
} from '../errors/codes.js';

/**
 * Typed error context shared across error types
 */
export interface ErrorContext {
  vectorId?: string;
  payloadContext?: string;
  sanitizer?: string;
  browser?: string;
  file?: string;
  setting?: string;
  phase?: string;
  suggestion?: string;
  [key: string]: unknown;
}

export interface SerializedError {
  name: string;
  message: string;
  errorCode: ErrorCode;
  severity: Severity;
  context?: ErrorContext;
  stack?: string;
  cause?: { name: string; message: string } | undefined;
}

export interface SinkbenchErrorParams {
  message: string;
  errorCode: ErrorCode;
  severity?: Severity;
  context?: ErrorContext;
  cause?: unknown;
}

type SubclassParams = Omit<SinkbenchErrorParams, 'errorCode'> & {
  errorCode?: ErrorCode;
};

function asError(cause: unknown): Error | undefined {
  if (cause === undefined) return undefined;
  return cause instanceof Error ? cause : new Error(String(cause));
}

/**
 * Base error class for all sinkbench errors
 */
export abstract class SinkbenchError extends Error {
  public readonly errorCode: ErrorCode;
  public readonly severity: Severity;
  public readonly context?: ErrorContext;
  public override readonly cause?: Error;

  constructor(params: SinkbenchErrorParams) {
    const { message, errorCode, severity = 'error', context } = params;
    const cause = asError(params.cause);
    super(message, { cause });
    this.name = this.constructor.name;
    this.errorCode = errorCode;
    this.severity = severity;
    this.context = context;
    this.cause = cause;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  /**
   * Serialize error to JSON for logging and debugging
   * - dev: includes stack
   * - prod: excludes stack
   */
  toJSON(env: 'dev' | 'prod' = 'dev'): SerializedError {
    const base: SerializedError = {
      name: this.name,
      message: this.message,
      errorCode: this.errorCode,
      severity: this.severity,
      context: this.context,
      cause: this.cause
        ? { name: this.cause.name, message: this.cause.message }
        : undefined,
    };
    if (env !== 'prod') {
      base.stack = this.stack;
    }
    return base;
  }

  /** Resolve the process exit code associated with this error */
  getExitCode(): number {
    return _getExitCode(this.errorCode);
  }
}

/**
 * Malformed corpus files, invalid vectors, duplicate ids or unknown id selections
 */
export class CorpusError extends SinkbenchError {
  constructor(params: SubclassParams) {
    super({ ...params, errorCode: params.errorCode ?? ErrorCode.INVALID_VECTOR });
  }
}

/**
 * A sanitizer adapter threw while processing a payload
 */
export class SanitizerError extends SinkbenchError {
  constructor(params: SubclassParams) {
    super({
      ...params,
      errorCode: params.errorCode ?? ErrorCode.SANITIZER_FAILED,
    });
  }
}

/**
 * Page navigation/evaluation failed in a way that is not an execution signal
 */
export class HarnessError extends SinkbenchError {
  constructor(params: SubclassParams) {
    super({ ...params, errorCode: params.errorCode ?? ErrorCode.HARNESS_FAILURE });
  }
}

/**
 * No browser session could be started
 */
export class BrowserLaunchError extends SinkbenchError {
  constructor(params: SubclassParams) {
    super({
      ...params,
      errorCode: params.errorCode ?? ErrorCode.BROWSER_LAUNCH_FAILED,
    });
  }
}

export const stallTimeoutMessage = (stallSeconds: number): string =>
  `Parallel run stalled (no completed chunks for ${stallSeconds}s)`;

export const workerCrashMessage = (exitCode: number | null, signal: string | null): string =>
  `Worker crashed (exitcode=${exitCode ?? signal ?? 'unknown'})`;

/**
 * Parallel mode: no progress arrived within the watchdog window
 */
export class StallTimeoutError extends SinkbenchError {
  public readonly stallSeconds: number;

  constructor(stallSeconds: number, context?: ErrorContext) {
    super({
      message: stallTimeoutMessage(stallSeconds),
      errorCode: ErrorCode.WORKER_STALLED,
      context,
    });
    this.stallSeconds = stallSeconds;
  }
}

/**
 * Parallel mode: a worker process exited while holding work
 */
export class WorkerCrashError extends SinkbenchError {
  public readonly exitCode: number | null;

  constructor(
    exitCode: number | null,
    signal: string | null = null,
    context?: ErrorContext
  ) {
    super({
      message: workerCrashMessage(exitCode, signal),
      errorCode: ErrorCode.WORKER_CRASHED,
      context,
    });
    this.exitCode = exitCode;
  }
}

/**
 * Configuration and setup errors
 */
export class ConfigError extends SinkbenchError {
  constructor(params: SubclassParams) {
    super({
      ...params,
      errorCode: params.errorCode ?? ErrorCode.CONFIGURATION_ERROR,
    });
  }

  get setting(): string | undefined {
    return this.context?.setting;
  }
}

/**
 * Fallback wrapper for unexpected non-sinkbench errors
 */
export class InternalError extends SinkbenchError {
  constructor(params: SubclassParams) {
    super({ ...params, errorCode: params.errorCode ?? ErrorCode.INTERNAL_ERROR });
  }
}

export function isSinkbenchError(error: unknown): error is SinkbenchError {
  return error instanceof SinkbenchError;
}

/**
 * Rebuilds an error that crossed a process boundary as `{ errorCode, message }`
 * into the class owning that code.
 */
export function errorFromCode(
  errorCode: ErrorCode,
  params: Omit<SubclassParams, 'errorCode'>
): SinkbenchError {
  const withCode = { ...params, errorCode };
  switch (errorCode) {
    case ErrorCode.CORPUS_PARSE_FAILED:
    case ErrorCode.INVALID_VECTOR:
    case ErrorCode.DUPLICATE_VECTOR:
    case ErrorCode.UNKNOWN_VECTOR_ID:
      return new CorpusError(withCode);
    case ErrorCode.SANITIZER_FAILED:
      return new SanitizerError(withCode);
    case ErrorCode.HARNESS_FAILURE:
      return new HarnessError(withCode);
    case ErrorCode.BROWSER_LAUNCH_FAILED:
      return new BrowserLaunchError(withCode);
    case ErrorCode.CONFIGURATION_ERROR:
      return new ConfigError(withCode);
    case ErrorCode.WORKER_STALLED:
    case ErrorCode.WORKER_CRASHED:
    case ErrorCode.INTERNAL_ERROR:
      return new InternalError(withCode);
  }
}

export function toSinkbenchError(error: unknown): SinkbenchError {
  if (isSinkbenchError(error)) return error;
  const message = error instanceof Error ? error.message : String(error);
  return new InternalError({
    message: message || 'Unexpected error',
    cause: error,
  });
}
