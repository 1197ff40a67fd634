import type { BenchCaseResult, BenchSummary } from '@sinkbench/shared';

export function caseResult(overrides: Partial<BenchCaseResult>): BenchCaseResult {
  return {
    sanitizer: 'noop',
    browser: 'chromium',
    vectorId: 'v',
    payloadContext: 'html',
    runPayloadContext: 'html',
    outcome: 'pass',
    executed: false,
    lossy: false,
    lossyDetails: null,
    details: 'No execution detected',
    sanitizerInputHtml: '',
    sanitizedHtml: '',
    renderedHtml: '',
    ...overrides,
  };
}

/** Four cases over two sanitizers: one xss, one pass, one lossy, one skip. */
export function sampleSummary(): BenchSummary {
  const results = [
    caseResult({
      vectorId: 'img',
      outcome: 'xss',
      executed: true,
      details: 'Executed: hook:alert:1',
      sanitizerInputHtml: '<img src=x onerror=alert(1)>',
      sanitizedHtml: '<img src=x onerror=alert(1)>',
    }),
    caseResult({
      sanitizer: 'dompurify',
      vectorId: 'img',
      sanitizerInputHtml: '<img src=x onerror=alert(1)>',
      sanitizedHtml: '<img src="x">',
    }),
    caseResult({
      sanitizer: 'dompurify',
      vectorId: 'bold',
      outcome: 'lossy',
      lossy: true,
      lossyDetails: 'Expected tags not preserved: position 1: expected b, got nothing',
      sanitizerInputHtml: '<b>x</b>',
    }),
    caseResult({
      vectorId: 'link',
      payloadContext: 'href',
      runPayloadContext: 'href',
      outcome: 'skip',
      details: 'Skipped: noop does not support context href',
    }),
  ];
  return {
    totalCases: 4,
    totalExecuted: 1,
    totalExternal: 0,
    totalErrors: 0,
    totalLossy: 1,
    results,
  };
}
