import { describe, expect, it } from 'vitest';

import { caseResult, sampleSummary } from '../test-utils/fixtures.js';
import { quoteHtml, renderBreakdownTable, renderTextReport } from './table.js';

describe('renderTextReport', () => {
  it('prints detail sections, then the table', () => {
    expect(renderTextReport(sampleSummary()).split('\n')).toEqual([
      'XSS:',
      '- noop / chromium / img (html): Executed: hook:alert:1',
      '  input="<img src=x onerror=alert(1)>"',
      '  sanitized="<img src=x onerror=alert(1)>"',
      '',
      'Lossy (expected tags stripped):',
      '- dompurify / chromium / bold (html): Expected tags not preserved: position 1: expected b, got nothing',
      '  input="<b>x</b>"',
      '  sanitized=""',
      '',
      'sanitizer               browser      xss   leaks   lossy  errors  skipped  total',
      '-'.repeat(80),
      'dompurify               chromium       0       0       1       0        0      2',
      'noop                    chromium       1       0       0       0        1      2',
      '',
    ]);
  });

  it('a clean run is just the table', () => {
    const report = renderTextReport({
      totalCases: 1,
      totalExecuted: 0,
      totalExternal: 0,
      totalErrors: 0,
      totalLossy: 0,
      results: [caseResult({})],
    });
    expect(report.split('\n')[0]).toBe(
      'sanitizer               browser      xss   leaks   lossy  errors  skipped  total'
    );
    expect(report.split('\n')).toHaveLength(4);
  });

  it('lists errors and leaks with their details', () => {
    const report = renderTextReport({
      totalCases: 2,
      totalExecuted: 0,
      totalExternal: 1,
      totalErrors: 1,
      totalLossy: 0,
      results: [
        caseResult({ vectorId: 'e', outcome: 'error', details: 'Harness error: page crashed' }),
        caseResult({ vectorId: 'l', outcome: 'http_leak', details: 'External fetch: image:https://leak.example/x.png' }),
      ],
    });
    expect(report.startsWith(
      [
        'HTTP leaks:',
        '- noop / chromium / l (html): External fetch: image:https://leak.example/x.png',
        '',
        'Errors:',
        '- noop / chromium / e (html): Harness error: page crashed',
        '',
      ].join('\n')
    )).toBe(true);
  });
});

describe('renderBreakdownTable', () => {
  it('has a header and a rule even without rows', () => {
    expect(renderBreakdownTable([])).toHaveLength(2);
  });
});

describe('quoteHtml', () => {
  it('quotes and escapes markup onto one line', () => {
    expect(quoteHtml('<a title="x">\n</a>')).toBe('"<a title=\\"x\\">\\n</a>"');
  });

  it('shortens long markup', () => {
    expect(quoteHtml('<b>abcdef</b>', 8)).toBe('"<b>abc…');
  });
});
