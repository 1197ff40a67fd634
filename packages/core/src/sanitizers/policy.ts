/**
 * Shared allow-list: keep common structure (div/span, tables, links, images)
 * while dropping scripting primitives, event handlers and unsafe URLs.
 */

export const ALLOWED_TAGS = [
  // Text / structure
  'p',
  'br',
  'div',
  'span',
  'blockquote',
  'pre',
  'code',
  'hr',
  // Emphasis
  'strong',
  'em',
  'b',
  'i',
  'u',
  's',
  'sub',
  'sup',
  // Lists
  'ul',
  'ol',
  'li',
  // Headings
  'h1',
  'h2',
  'h3',
  'h4',
  'h5',
  'h6',
  // Links & media
  'a',
  'img',
  // Tables
  'table',
  'thead',
  'tbody',
  'tfoot',
  'tr',
  'th',
  'td',
] as const;

export const GLOBAL_ATTRIBUTES = ['class', 'id', 'title', 'lang', 'dir', 'style'] as const;

const TAG_ATTRIBUTES: Readonly<Record<string, readonly string[]>> = {
  a: ['href', 'title'],
  img: ['src', 'alt', 'title', 'width', 'height', 'loading'],
  th: ['colspan', 'rowspan'],
  td: ['colspan', 'rowspan'],
};

export const URL_PROTOCOLS = ['http', 'https', 'mailto', 'tel'] as const;

/** Every attribute allowed on at least one tag. */
export const ALLOWED_ATTRIBUTES: readonly string[] = [
  ...new Set([...GLOBAL_ATTRIBUTES, ...Object.values(TAG_ATTRIBUTES).flat()]),
];

export function allowedAttributesForTag(tag: string): ReadonlySet<string> {
  const name = tag.trim().toLowerCase();
  if (!name) return new Set();
  return new Set([...GLOBAL_ATTRIBUTES, ...(TAG_ATTRIBUTES[name] ?? [])]);
}

/**
 * Accepts the listed schemes and scheme-less (relative) values, in the shape
 * DOMPurify's ALLOWED_URI_REGEXP expects.
 */
export const ALLOWED_URI_REGEXP = new RegExp(
  `^(?:(?:${URL_PROTOCOLS.join('|')}):|[^a-z]|[a-z+.-]+(?:[^a-z+.\\-:]|$))`,
  'i'
);
