import type { PayloadContext } from '@sinkbench/shared';

/** Synthetic origin every rendered document is served from. */
export const BASE_URL = 'http://sinkbench.local/';

/** Upper bound for any single navigation, click or evaluation. */
export const MAX_PAGE_TIMEOUT_MS = 5000;

export const POLL_INTERVAL_MS = 50;

export const HREF_LINK_ID = 'sinkbench-link';

export function assertNever(value: never): never {
  throw new Error(`Unhandled payload context: ${String(value)}`);
}

/**
 * Leak contexts reinterpret navigations and passive fetches as `http_leak`
 * rather than execution.
 */
export function isLeakContext(context: PayloadContext): boolean {
  switch (context) {
    case 'http_leak':
    case 'http_leak_style':
      return true;
    case 'html':
    case 'html_head':
    case 'html_outer':
    case 'href':
    case 'js':
    case 'js_arg':
    case 'js_string':
    case 'js_string_double':
    case 'onerror_attr':
      return false;
    default:
      return assertNever(context);
  }
}

/** Contexts whose sink is a script body or attribute value rather than markup. */
export function isMarkupContext(context: PayloadContext): boolean {
  switch (context) {
    case 'html':
    case 'html_head':
    case 'html_outer':
    case 'http_leak':
    case 'http_leak_style':
    case 'onerror_attr':
      return true;
    case 'href':
    case 'js':
    case 'js_arg':
    case 'js_string':
    case 'js_string_double':
      return false;
    default:
      return assertNever(context);
  }
}
