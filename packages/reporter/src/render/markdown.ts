import {
  formatCaseLabel,
  truncate,
  type BenchCaseResult,
  type BenchSummary,
} from '@sinkbench/shared';

import { RESULT_SECTIONS, breakdownResults, type ResultSection } from '../model/breakdown.js';

export interface MarkdownReportOptions {
  title?: string;
  /** Longest HTML excerpt shown per case. */
  htmlLimit?: number;
}

function escapeCell(value: string): string {
  return value.replace(/\|/g, '\\|');
}

function codeSpan(value: string): string {
  return value.includes('`') ? `\`\` ${value} \`\`` : `\`${value}\``;
}

function renderTotals(summary: BenchSummary): string[] {
  return [
    '| Metric | Count |',
    '|---|---:|',
    `| Cases | ${summary.totalCases} |`,
    `| Executed | ${summary.totalExecuted} |`,
    `| HTTP leaks | ${summary.totalExternal} |`,
    `| Lossy | ${summary.totalLossy} |`,
    `| Errors | ${summary.totalErrors} |`,
  ];
}

function renderBreakdown(summary: BenchSummary): string[] {
  const rows = breakdownResults(summary.results);
  if (rows.length === 0) return ['No cases ran.'];
  return [
    '| Sanitizer | Browser | XSS | Leaks | Lossy | Errors | Skipped | Total |',
    '|---|---|---:|---:|---:|---:|---:|---:|',
    ...rows.map(
      (row) =>
        `| ${escapeCell(row.sanitizer)} | ${row.browser} | ${row.xss} | ${row.leaks} | ${row.lossy} | ${row.errors} | ${row.skipped} | ${row.total} |`
    ),
  ];
}

function renderCases(
  results: readonly BenchCaseResult[],
  section: ResultSection,
  htmlLimit: number
): string[] {
  const hits = results.filter(section.select);
  if (hits.length === 0) return ['None.'];
  return hits.flatMap((result) => {
    const lines = [`- ${formatCaseLabel(result)}: ${section.details(result)}`];
    if (result.sanitizedHtml || section.showEmptyOutput) {
      lines.push(`  - sanitized: ${codeSpan(truncate(result.sanitizedHtml, htmlLimit))}`);
    }
    return lines;
  });
}

export function renderMarkdownReport(
  summary: BenchSummary,
  options: MarkdownReportOptions = {}
): string {
  const htmlLimit = options.htmlLimit ?? 200;
  const lines: string[] = [`# ${options.title ?? 'Sanitizer benchmark'}`, ''];
  lines.push('## Totals', '', ...renderTotals(summary), '');
  lines.push('## By sanitizer and browser', '', ...renderBreakdown(summary), '');
  for (const section of RESULT_SECTIONS) {
    lines.push(`## ${section.title}`, '', ...renderCases(summary.results, section, htmlLimit), '');
  }
  return lines.join('\n');
}
