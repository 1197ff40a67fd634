import type { BenchCaseResult, BenchSummary, BenchTotals } from '@sinkbench/shared';

const EMPTY_TOTALS: BenchTotals = {
  totalCases: 0,
  totalExecuted: 0,
  totalExternal: 0,
  totalErrors: 0,
  totalLossy: 0,
};

/** Totals are always derived from the result list, never kept alongside it. */
export function summarizeResults(results: readonly BenchCaseResult[]): BenchSummary {
  const totals = results.reduce<BenchTotals>(
    (acc, result) => ({
      totalCases: acc.totalCases + 1,
      totalExecuted: acc.totalExecuted + (result.executed ? 1 : 0),
      totalExternal: acc.totalExternal + (result.outcome === 'http_leak' ? 1 : 0),
      totalErrors: acc.totalErrors + (result.outcome === 'error' ? 1 : 0),
      totalLossy: acc.totalLossy + (result.lossy ? 1 : 0),
    }),
    EMPTY_TOTALS
  );
  return { ...totals, results: [...results] };
}
