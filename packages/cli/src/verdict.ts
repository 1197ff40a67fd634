import type { BenchTotals } from '@sinkbench/shared';

export const EXIT_CLEAN = 0;
export const EXIT_XSS = 1;
/** Errors or lossy output: the verdict cannot be trusted as clean. */
export const EXIT_DEGRADED = 2;

export function exitCodeFor(summary: BenchTotals): number {
  if (summary.totalErrors > 0 || summary.totalLossy > 0) return EXIT_DEGRADED;
  return summary.totalExecuted > 0 ? EXIT_XSS : EXIT_CLEAN;
}
