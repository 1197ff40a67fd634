// Shared utilities for sinkbench packages

import type { BenchCaseResult } from './types.js';

export const describeError = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);

export const formatErrorMessage = (error: unknown): string =>
  `[sinkbench] ${describeError(error)}`;

/** Diagnostics go to stderr; stdout is reserved for the report. */
export const logLine = (message: string): void => {
  process.stderr.write(`[sinkbench] ${message}\n`);
};

/** Shorten a value for single-line display, keeping the head. */
export const truncate = (value: string, max: number): string => {
  if (value.length <= max) return value;
  if (max <= 1) return value.slice(0, max);
  return `${value.slice(0, max - 1)}…`;
};

/** Parse a comma-separated flag value into trimmed, non-empty entries. */
export const splitCsv = (value: string): string[] =>
  value
    .split(',')
    .map((part) => part.trim())
    .filter((part) => part.length > 0);

/** `sanitizer / browser / vector (context)`, as used in progress and report lines. */
export const formatCaseLabel = (
  result: Pick<BenchCaseResult, 'sanitizer' | 'browser' | 'vectorId' | 'payloadContext'>
): string =>
  `${result.sanitizer} / ${result.browser} / ${result.vectorId} (${result.payloadContext})`;
