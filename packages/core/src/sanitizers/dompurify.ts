import type { PayloadContext } from '@sinkbench/shared';
import createDOMPurify, { type Config } from 'dompurify';
import { JSDOM } from 'jsdom';

import {
  ALLOWED_ATTRIBUTES,
  ALLOWED_TAGS,
  ALLOWED_URI_REGEXP,
  allowedAttributesForTag,
} from './policy.js';
import type { Sanitizer } from './types.js';

const PURIFY_CONFIG: Config = {
  ALLOWED_TAGS: [...ALLOWED_TAGS],
  ALLOWED_ATTR: [...ALLOWED_ATTRIBUTES],
  ALLOWED_URI_REGEXP,
  ALLOW_DATA_ATTR: false,
  ALLOW_ARIA_ATTR: false,
};

type PurifyInstance = ReturnType<typeof createDOMPurify>;

let instance: PurifyInstance | null = null;

function purifier(): PurifyInstance {
  if (instance) return instance;
  // The jsdom window satisfies DOMPurify at runtime; the trusted-types
  // declarations of the two packages disagree.
  const jsdomWindow = new JSDOM('').window as unknown as Parameters<typeof createDOMPurify>[0];
  const purify = createDOMPurify(jsdomWindow);
  // ALLOWED_ATTR is global; narrow it to the per-tag policy.
  purify.addHook('uponSanitizeAttribute', (node, data) => {
    if (!allowedAttributesForTag(node.nodeName).has(data.attrName)) {
      data.keepAttr = false;
    }
  });
  instance = purify;
  return purify;
}

export const dompurifySanitizer: Sanitizer = {
  name: 'dompurify',
  description: 'DOMPurify on a jsdom window with the shared allow-list',
  sanitize: (html) => purifier().sanitize(html, PURIFY_CONFIG),
  supportedContexts: new Set<PayloadContext>(['html', 'html_head', 'html_outer', 'http_leak', 'http_leak_style']),
};
