import { describe, expect, it } from 'vitest';

import { EXIT_CLEAN, EXIT_DEGRADED, EXIT_XSS, exitCodeFor } from '../verdict.js';

const totals = {
  totalCases: 10,
  totalExecuted: 0,
  totalExternal: 0,
  totalErrors: 0,
  totalLossy: 0,
};

describe('exitCodeFor', () => {
  it('is clean when nothing executed', () => {
    expect(exitCodeFor(totals)).toBe(EXIT_CLEAN);
    expect(exitCodeFor({ ...totals, totalExternal: 3 })).toBe(EXIT_CLEAN);
  });

  it('flags executions', () => {
    expect(exitCodeFor({ ...totals, totalExecuted: 1 })).toBe(EXIT_XSS);
  });

  it('ranks errors and lossy output above executions', () => {
    expect(exitCodeFor({ ...totals, totalExecuted: 2, totalErrors: 1 })).toBe(EXIT_DEGRADED);
    expect(exitCodeFor({ ...totals, totalExecuted: 2, totalLossy: 1 })).toBe(EXIT_DEGRADED);
  });
});
