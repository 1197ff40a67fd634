import { existsSync, readdirSync } from 'node:fs';
import path from 'node:path';

import {
  ALL_BROWSERS,
  ConfigError,
  DEFAULT_SANITIZERS,
  DEFAULT_STALL_TIMEOUT_S,
  normalizeIdArgs,
  resolveSanitizers,
  suggestAlternatives,
  type Sanitizer,
} from '@sinkbench/core';
import { BROWSER_NAMES, isBrowserName, splitCsv, type BrowserName } from '@sinkbench/shared';

/**
 * `run` options as commander hands them over: numbers still as strings.
 */
export interface BenchCliOptions {
  vectors?: string[];
  sanitizers?: string[];
  browser?: string;
  timeoutMs?: string;
  workers?: string;
  workerStallTimeoutS?: string;
  failFast?: boolean;
  jsonOut?: string;
  markdownOut?: string;
  progressEvery?: string;
  /** False under --no-progress. */
  progress?: boolean;
  ids?: string[];
}

export interface ResolvedBenchOptions {
  vectorPaths: string[];
  sanitizers: Sanitizer[];
  browsers: BrowserName[];
  /** Undefined means adaptive per case. */
  timeoutMs: number | undefined;
  workers: number;
  stallTimeoutS: number;
  failFast: boolean;
  jsonOut: string | undefined;
  markdownOut: string | undefined;
  /** 0 disables progress output. */
  progressEvery: number;
  ids: string[];
}

export const DEFAULT_PROGRESS_EVERY = 25;
export const DEFAULT_VECTOR_DIR = 'vectors';

export function parseIntegerFlag(
  value: string | undefined,
  flag: string,
  min: number
): number | undefined {
  if (value === undefined) return undefined;
  const trimmed = value.trim();
  const parsed = Number(trimmed);
  if (trimmed === '' || !Number.isInteger(parsed) || parsed < min) {
    throw new ConfigError({
      message: `--${flag} must be an integer >= ${min} (got "${value}")`,
      context: { setting: flag },
    });
  }
  return parsed;
}

export function resolveBrowsers(value: string | undefined): BrowserName[] {
  const name = (value ?? 'chromium').trim();
  if (name === 'all') return [...ALL_BROWSERS];
  if (isBrowserName(name)) return [name];
  throw new ConfigError({
    message: `Unknown browser: ${name}`,
    context: {
      setting: 'browser',
      suggestion: suggestAlternatives(name, [...BROWSER_NAMES, 'all']),
    },
  });
}

/** `vectors/*.json` under `cwd`, sorted; empty when the directory is missing. */
export function defaultVectorPaths(cwd: string): string[] {
  const dir = path.join(cwd, DEFAULT_VECTOR_DIR);
  if (!existsSync(dir)) return [];
  return readdirSync(dir)
    .filter((name) => name.endsWith('.json'))
    .sort()
    .map((name) => path.join(dir, name));
}

export function resolveBenchOptions(
  options: BenchCliOptions,
  cwd: string = process.cwd()
): ResolvedBenchOptions {
  const vectorPaths =
    options.vectors && options.vectors.length > 0
      ? options.vectors.map((file) => path.resolve(cwd, file))
      : defaultVectorPaths(cwd);
  if (vectorPaths.length === 0) {
    throw new ConfigError({
      message: `No vector files found in ./${DEFAULT_VECTOR_DIR}`,
      context: {
        setting: 'vectors',
        suggestion: 'Pass --vectors <files...> or run from a directory containing vectors/*.json',
      },
    });
  }

  const sanitizerNames = options.sanitizers?.flatMap(splitCsv) ?? [...DEFAULT_SANITIZERS];
  const progressEvery =
    options.progress === false
      ? 0
      : parseIntegerFlag(options.progressEvery, 'progress-every', 0) ?? DEFAULT_PROGRESS_EVERY;

  return {
    vectorPaths,
    sanitizers: resolveSanitizers([...new Set(sanitizerNames)]),
    browsers: resolveBrowsers(options.browser),
    timeoutMs: parseIntegerFlag(options.timeoutMs, 'timeout-ms', 0),
    workers: parseIntegerFlag(options.workers, 'workers', 1) ?? 1,
    stallTimeoutS:
      parseIntegerFlag(options.workerStallTimeoutS, 'worker-stall-timeout-s', 0) ??
      DEFAULT_STALL_TIMEOUT_S,
    failFast: options.failFast ?? false,
    jsonOut: options.jsonOut,
    markdownOut: options.markdownOut,
    progressEvery,
    ids: normalizeIdArgs(options.ids ?? []),
  };
}
