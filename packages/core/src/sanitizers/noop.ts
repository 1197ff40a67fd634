import type { PayloadContext } from '@sinkbench/shared';

import type { Sanitizer } from './types.js';

/** Baseline: returns its input unchanged, so every live payload should register. */
export const noopSanitizer: Sanitizer = {
  name: 'noop',
  description: 'Baseline: returns HTML unchanged',
  sanitize: (html) => html,
  supportedContexts: new Set<PayloadContext>([
    'html',
    'html_head',
    'html_outer',
    'js',
    'js_arg',
    'js_string',
    'js_string_double',
    'onerror_attr',
  ]),
};
