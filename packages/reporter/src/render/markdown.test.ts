import { describe, expect, it } from 'vitest';

import { caseResult, sampleSummary } from '../test-utils/fixtures.js';
import { renderMarkdownReport } from './markdown.js';

describe('renderMarkdownReport', () => {
  it('includes totals, the breakdown and every section', () => {
    const lines = renderMarkdownReport(sampleSummary(), { title: 'Nightly' }).split('\n');

    expect(lines[0]).toBe('# Nightly');
    expect(lines).toContain('| Cases | 4 |');
    expect(lines).toContain('| Executed | 1 |');
    expect(lines).toContain('| dompurify | chromium | 0 | 0 | 1 | 0 | 0 | 2 |');
    expect(lines).toContain('| noop | chromium | 1 | 0 | 0 | 0 | 1 | 2 |');
    expect(lines).toContain('## HTTP leaks');
    expect(lines).toContain('- noop / chromium / img (html): Executed: hook:alert:1');
    expect(lines).toContain('  - sanitized: `<img src=x onerror=alert(1)>`');
    expect(lines).toContain('  - sanitized: ``');
  });

  it('says None. for empty sections', () => {
    const lines = renderMarkdownReport(sampleSummary()).split('\n');
    const errors = lines.indexOf('## Errors');
    expect(lines[0]).toBe('# Sanitizer benchmark');
    expect(lines.slice(errors, errors + 3)).toEqual(['## Errors', '', 'None.']);
  });

  it('keeps table cells and code spans intact', () => {
    const summary = {
      totalCases: 1,
      totalExecuted: 1,
      totalExternal: 0,
      totalErrors: 0,
      totalLossy: 0,
      results: [
        caseResult({
          sanitizer: 'a|b',
          outcome: 'xss',
          executed: true,
          details: 'Executed: hook:alert:1',
          sanitizedHtml: '<p>`x`</p>',
        }),
      ],
    };
    const lines = renderMarkdownReport(summary).split('\n');
    expect(lines).toContain('| a\\|b | chromium | 1 | 0 | 0 | 0 | 0 | 1 |');
    expect(lines).toContain('  - sanitized: `` <p>`x`</p> ``');
  });

  it('an empty run has no breakdown table', () => {
    const lines = renderMarkdownReport({
      totalCases: 0,
      totalExecuted: 0,
      totalExternal: 0,
      totalErrors: 0,
      totalLossy: 0,
      results: [],
    }).split('\n');
    expect(lines).toContain('No cases ran.');
  });
});
