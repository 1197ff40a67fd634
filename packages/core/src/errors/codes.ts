/**
 * Error Code Infrastructure
 * Stable error codes and CLI exit code mappings.
 */

// Severity levels used across the system
export type Severity = 'info' | 'warn' | 'error';

// Stable error codes grouped by domain
export enum ErrorCode {
  // Corpus Errors (E001–E099)
  CORPUS_PARSE_FAILED = 'E001',
  INVALID_VECTOR = 'E010',
  DUPLICATE_VECTOR = 'E011',
  UNKNOWN_VECTOR_ID = 'E012',

  // Sanitizer Errors (E100–E199)
  SANITIZER_FAILED = 'E100',

  // Harness Errors (E200–E299)
  HARNESS_FAILURE = 'E200',
  BROWSER_LAUNCH_FAILED = 'E210',

  // Parallel Execution Errors (E300–E399)
  WORKER_STALLED = 'E300',
  WORKER_CRASHED = 'E301',

  // Configuration Errors (E400–E499)
  CONFIGURATION_ERROR = 'E400',

  // Internal Errors (E500–E599)
  INTERNAL_ERROR = 'E500',
}

const KNOWN_CODES: ReadonlySet<string> = new Set(Object.values(ErrorCode));

export function isErrorCode(value: unknown): value is ErrorCode {
  return typeof value === 'string' && KNOWN_CODES.has(value);
}

// CLI exit codes mapping (0, 1 and 2 are reserved for benchmark verdicts)
export const EXIT_CODES = {
  [ErrorCode.CORPUS_PARSE_FAILED]: 10,
  [ErrorCode.INVALID_VECTOR]: 11,
  [ErrorCode.DUPLICATE_VECTOR]: 12,
  [ErrorCode.UNKNOWN_VECTOR_ID]: 13,
  [ErrorCode.SANITIZER_FAILED]: 20,
  [ErrorCode.HARNESS_FAILURE]: 30,
  [ErrorCode.BROWSER_LAUNCH_FAILED]: 31,
  [ErrorCode.WORKER_STALLED]: 40,
  [ErrorCode.WORKER_CRASHED]: 41,
  [ErrorCode.CONFIGURATION_ERROR]: 50,
  [ErrorCode.INTERNAL_ERROR]: 99,
} satisfies Record<ErrorCode, number>;

export function getExitCode(code: ErrorCode): number {
  return EXIT_CODES[code];
}
