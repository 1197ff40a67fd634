import type { BenchSummary } from '@sinkbench/shared';

const compareKeys = ([a]: [string, unknown], [b]: [string, unknown]): number =>
  a < b ? -1 : a > b ? 1 : 0;

/** Deep copy with object keys in sorted order. */
export function sortKeys(value: unknown): unknown {
  if (Array.isArray(value)) return value.map(sortKeys);
  if (value !== null && typeof value === 'object') {
    return Object.fromEntries(
      Object.entries(value)
        .sort(compareKeys)
        .map(([key, entry]) => [key, sortKeys(entry)])
    );
  }
  return value;
}

/** The JSON artifact: two-space indent, sorted keys, trailing newline. */
export function renderJsonReport(summary: BenchSummary): string {
  return `${JSON.stringify(sortKeys(summary), null, 2)}\n`;
}
