import {
  formatCaseLabel,
  truncate,
  type BenchCaseResult,
  type BenchSummary,
} from '@sinkbench/shared';

import {
  RESULT_SECTIONS,
  breakdownResults,
  type BreakdownRow,
  type ResultSection,
} from '../model/breakdown.js';

export const HTML_PREVIEW_LIMIT = 400;

/** JSON-quoted and shortened, so that markup stays on one line. */
export function quoteHtml(value: string, limit = HTML_PREVIEW_LIMIT): string {
  return truncate(JSON.stringify(value), limit);
}

function renderCase(result: BenchCaseResult, section: ResultSection): string[] {
  const lines = [`- ${formatCaseLabel(result)}: ${section.details(result)}`];
  if (result.sanitizerInputHtml) {
    lines.push(`  input=${quoteHtml(result.sanitizerInputHtml)}`);
  }
  if (result.sanitizedHtml || section.showEmptyOutput) {
    lines.push(`  sanitized=${quoteHtml(result.sanitizedHtml)}`);
  }
  return lines;
}

const COLUMNS: ReadonlyArray<{ label: string; width: number; value: (row: BreakdownRow) => number }> = [
  { label: 'xss', width: 6, value: (row) => row.xss },
  { label: 'leaks', width: 6, value: (row) => row.leaks },
  { label: 'lossy', width: 6, value: (row) => row.lossy },
  { label: 'errors', width: 6, value: (row) => row.errors },
  { label: 'skipped', width: 7, value: (row) => row.skipped },
  { label: 'total', width: 5, value: (row) => row.total },
];

export function renderBreakdownTable(rows: readonly BreakdownRow[]): string[] {
  const header = [
    'sanitizer'.padEnd(22),
    'browser'.padEnd(8),
    ...COLUMNS.map((column) => column.label.padStart(column.width)),
  ].join('  ');
  const body = rows.map((row) =>
    [
      row.sanitizer.padEnd(22),
      row.browser.padEnd(8),
      ...COLUMNS.map((column) => String(column.value(row)).padStart(column.width)),
    ].join('  ')
  );
  return [header, '-'.repeat(header.length), ...body];
}

/**
 * Plain-text report for stdout: detail sections first, the per
 * sanitizer/browser table last so it stays visible at the bottom.
 */
export function renderTextReport(summary: BenchSummary): string {
  const blocks: string[][] = [];
  for (const section of RESULT_SECTIONS) {
    const hits = summary.results.filter(section.select);
    if (hits.length === 0) continue;
    blocks.push([`${section.title}:`, ...hits.flatMap((result) => renderCase(result, section))]);
  }
  blocks.push(renderBreakdownTable(breakdownResults(summary.results)));
  return `${blocks.map((block) => block.join('\n')).join('\n\n')}\n`;
}
