import type { BenchCaseResult } from '@sinkbench/shared';

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
