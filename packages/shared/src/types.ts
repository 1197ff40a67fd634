// Shared result model for sinkbench packages

/**
 * Sinks a sanitized fragment can be rendered into. Closed set: every switch over
 * it is exhaustive so that a new context fails to compile until handled.
 */
export const PAYLOAD_CONTEXTS = [
  'html',
  'html_head',
  'html_outer',
  'http_leak',
  'http_leak_style',
  'href',
  'js',
  'js_arg',
  'js_string',
  'js_string_double',
  'onerror_attr',
] as const;

export type PayloadContext = (typeof PAYLOAD_CONTEXTS)[number];

export const BROWSER_NAMES = ['chromium', 'firefox', 'webkit'] as const;

export type BrowserName = (typeof BROWSER_NAMES)[number];

export type BenchOutcome =
  | 'pass'
  | 'xss'
  | 'http_leak'
  | 'lossy'
  | 'skip'
  | 'error';

export type ResultSignal = 'none' | 'http_leak';

/** Low-level outcome of one harness run. */
export interface VectorResult {
  executed: boolean;
  signal: ResultSignal;
  details: string;
}

export interface BenchCaseResult {
  sanitizer: string;
  browser: BrowserName;
  vectorId: string;
  /** Context declared by the vector. */
  payloadContext: PayloadContext;
  /** Context the harness actually rendered (differs when the payload was wrapped). */
  runPayloadContext: PayloadContext;
  outcome: BenchOutcome;
  executed: boolean;
  /** Orthogonal to `outcome`: an `xss` case may also be lossy. */
  lossy: boolean;
  lossyDetails: string | null;
  details: string;
  sanitizerInputHtml: string;
  sanitizedHtml: string;
  renderedHtml: string;
}

export interface BenchTotals {
  totalCases: number;
  totalExecuted: number;
  totalExternal: number;
  totalErrors: number;
  totalLossy: number;
}

export interface BenchSummary extends BenchTotals {
  results: BenchCaseResult[];
}

export function isPayloadContext(value: unknown): value is PayloadContext {
  return (
    typeof value === 'string' &&
    (PAYLOAD_CONTEXTS as readonly string[]).includes(value)
  );
}

export function isBrowserName(value: unknown): value is BrowserName {
  return (
    typeof value === 'string' &&
    (BROWSER_NAMES as readonly string[]).includes(value)
  );
}
