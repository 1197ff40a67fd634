import {
  BROWSER_NAMES,
  type BenchCaseResult,
  type BenchSummary,
  type BrowserName,
} from '@sinkbench/shared';

import type { Vector } from '../corpus/types.js';
import { launchPlaywrightDriver } from '../harness/playwright-driver.js';
import { openSignalSession } from '../harness/session.js';
import type { Sanitizer } from '../sanitizers/types.js';
import {
  assertAnyLaunched,
  closeSessions,
  launchSessions,
  runCaseOn,
  type SessionProvider,
} from './sessions.js';
import { summarizeResults } from './summary.js';

export type { SessionProvider } from './sessions.js';

export type ProgressCallback = (
  done: number,
  total: number,
  result: BenchCaseResult
) => void;

export interface BenchOptions {
  vectors: readonly Vector[];
  sanitizers: readonly Sanitizer[];
  /** Defaults to chromium only. */
  browsers?: readonly BrowserName[];
  /** Fixed post-trigger wait for every case; inferred per payload when omitted. */
  timeoutMs?: number;
  failFast?: boolean;
  onProgress?: ProgressCallback;
  /** Session factory; defaults to a Playwright-backed SignalSession. */
  openSession?: SessionProvider;
  signal?: AbortSignal;
}

export const DEFAULT_BROWSERS: readonly BrowserName[] = ['chromium'];

export const ALL_BROWSERS: readonly BrowserName[] = BROWSER_NAMES;

export const defaultSessionProvider: SessionProvider = (browser) =>
  openSignalSession(browser, { launcher: launchPlaywrightDriver });

export function plannedCaseCount(options: BenchOptions): number {
  const browsers = options.browsers ?? DEFAULT_BROWSERS;
  return options.vectors.length * options.sanitizers.length * browsers.length;
}

/**
 * Sequential reuse mode: one session per browser, cases run strictly in
 * browser → sanitizer → vector order.
 */
export async function runBench(options: BenchOptions): Promise<BenchSummary> {
  const browsers = options.browsers ?? DEFAULT_BROWSERS;
  const total = plannedCaseCount(options);
  const launched = await launchSessions(browsers, options.openSession ?? defaultSessionProvider);

  assertAnyLaunched(launched);

  const results: BenchCaseResult[] = [];
  try {
    matrix: for (const outcome of launched) {
      for (const sanitizer of options.sanitizers) {
        for (const vector of options.vectors) {
          if (options.signal?.aborted) break matrix;
          const identity = { sanitizer, browser: outcome.browser, vector };
          const result = await runCaseOn(outcome, identity, options.timeoutMs);
          results.push(result);
          options.onProgress?.(results.length, total, result);
          if (options.failFast && result.outcome === 'xss') break matrix;
        }
      }
    }
  } finally {
    await closeSessions(launched);
  }

  return summarizeResults(results);
}
