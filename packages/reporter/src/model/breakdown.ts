import type { BenchCaseResult, BrowserName } from '@sinkbench/shared';

/** Per (sanitizer, browser) counts for the summary table. */
export interface BreakdownRow {
  sanitizer: string;
  browser: BrowserName;
  xss: number;
  leaks: number;
  lossy: number;
  errors: number;
  skipped: number;
  total: number;
}

const compare = (a: string, b: string): number => (a < b ? -1 : a > b ? 1 : 0);

export function breakdownResults(results: readonly BenchCaseResult[]): BreakdownRow[] {
  const rows = new Map<string, BreakdownRow>();
  for (const result of results) {
    const key = `${result.sanitizer}\u0000${result.browser}`;
    const row = rows.get(key) ?? {
      sanitizer: result.sanitizer,
      browser: result.browser,
      xss: 0,
      leaks: 0,
      lossy: 0,
      errors: 0,
      skipped: 0,
      total: 0,
    };
    row.total += 1;
    if (result.executed) row.xss += 1;
    if (result.outcome === 'http_leak') row.leaks += 1;
    if (result.lossy) row.lossy += 1;
    if (result.outcome === 'error') row.errors += 1;
    if (result.outcome === 'skip') row.skipped += 1;
    rows.set(key, row);
  }
  return [...rows.values()].sort(
    (a, b) => compare(a.sanitizer, b.sanitizer) || compare(a.browser, b.browser)
  );
}

/** Report sections, in print order. */
export interface ResultSection {
  title: string;
  select: (result: BenchCaseResult) => boolean;
  details: (result: BenchCaseResult) => string;
  /** Print the sanitized output even when it is empty. */
  showEmptyOutput: boolean;
}

export const RESULT_SECTIONS: readonly ResultSection[] = [
  {
    title: 'XSS',
    select: (result) => result.outcome === 'xss',
    details: (result) => result.details,
    showEmptyOutput: false,
  },
  {
    title: 'HTTP leaks',
    select: (result) => result.outcome === 'http_leak',
    details: (result) => result.details,
    showEmptyOutput: false,
  },
  {
    title: 'Errors',
    select: (result) => result.outcome === 'error',
    details: (result) => result.details,
    showEmptyOutput: false,
  },
  {
    // An empty output is usually the whole story for a lossy case.
    title: 'Lossy (expected tags stripped)',
    select: (result) => result.lossy,
    details: (result) => result.lossyDetails ?? '',
    showEmptyOutput: true,
  },
];
