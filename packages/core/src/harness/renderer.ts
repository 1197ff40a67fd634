import type { PayloadContext } from '@sinkbench/shared';

import { BASE_URL, HREF_LINK_ID, assertNever } from './context.js';

// Instrumentation is installed as an init script, so templates carry only the
// sink itself and the synthetic <base>.

function shell(head: string, rest: string): string {
  return [
    '<!doctype html>',
    '<html>',
    '  <head>',
    '    <meta charset="utf-8">',
    `    <base href="${BASE_URL}">`,
    ...(head ? [`    ${head}`] : []),
    '  </head>',
    rest,
    '</html>',
    '',
  ].join('\n');
}

function body(...lines: string[]): string {
  return ['  <body>', ...lines.map((line) => `    ${line}`), '  </body>'].join(
    '\n'
  );
}

const FIRST_TAG_RE = /<\s*([A-Za-z][A-Za-z0-9:-]*)/;
const OUTER_TAGS = new Set(['html', 'body', 'frameset']);

function renderLeakDocument(payload: string): string {
  const firstTag = FIRST_TAG_RE.exec(payload)?.[1]?.toLowerCase() ?? '';
  if (OUTER_TAGS.has(firstTag)) {
    return shell('', payload);
  }
  // Head-only primitives (<meta>, <link>) and body-only ones both get a chance;
  // the parser drops or relocates whichever placement is invalid.
  return shell(
    payload,
    body(
      `<div id="root">${payload}</div>`,
      '<s id="sinkbench-css-target">x</s>',
      '<big id="sinkbench-css-target2">x</big>'
    )
  );
}

function renderForContext(payload: string, context: PayloadContext): string {
  switch (context) {
    case 'html':
      return shell('', body(`<div id="root">${payload}</div>`));
    case 'html_head':
      return shell(payload, body('<div id="root"></div>'));
    case 'html_outer':
      return shell('', payload);
    case 'http_leak':
    case 'http_leak_style':
      return renderLeakDocument(payload);
    case 'href':
      return shell('', body(`<a id="${HREF_LINK_ID}" href="${payload}">x</a>`));
    case 'js':
      return shell('', body(`<script>${payload}</script>`));
    case 'js_arg':
      return shell('', body(`<script>setTimeout(function(){}, ${payload});</script>`));
    case 'js_string':
      return shell('', body(`<script>var sinkbenchSink = '${payload}';</script>`));
    case 'js_string_double':
      return shell('', body(`<script>var sinkbenchSink = "${payload}";</script>`));
    case 'onerror_attr':
      return shell(
        '',
        body(`<img id="sinkbench-img" src="nonexistent://x" onerror="${payload}">`)
      );
    default:
      return assertNever(context);
  }
}

const META_REFRESH_RE =
  /(<meta\b[^>]*\bhttp-equiv\s*=\s*['"]?refresh['"]?[^>]*\bcontent\s*=\s*['"])([^'"]*)(['"])/gi;
const REFRESH_CONTENT_RE = /^\s*(\d+)?\s*(?:;\s*)?(?:url\s*=\s*(.+?))?\s*$/i;

/**
 * Rewrites `<meta http-equiv=refresh content="N; url=X">` to a zero delay so a
 * long refresh does not force a long wait. Navigation detection is unchanged.
 * Content that does not parse as a refresh value is left as is.
 */
export function speedUpMetaRefresh(html: string): string {
  const lower = html.toLowerCase();
  if (!lower.includes('http-equiv') || !lower.includes('refresh')) {
    return html;
  }
  return html.replace(
    META_REFRESH_RE,
    (match: string, before: string, content: string, after: string) => {
      const parsed = REFRESH_CONTENT_RE.exec(content);
      if (!parsed) return match;
      const url = (parsed[2] ?? '').trim().replace(/^["']+|["']+$/g, '');
      return `${before}${url ? `0; url=${url}` : '0'}${after}`;
    }
  );
}

/** Builds the full synthetic document that places `sanitizedHtml` in its sink. */
export function renderDocument(
  sanitizedHtml: string,
  context: PayloadContext
): string {
  return speedUpMetaRefresh(renderForContext(sanitizedHtml, context));
}
