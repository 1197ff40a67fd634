import { Parser } from 'htmlparser2';

import { formatExpectedTag, type ExpectedTag } from '../corpus/types.js';

export interface LossyVerdict {
  lossy: boolean;
  details: string | null;
}

const NOT_LOSSY: LossyVerdict = { lossy: false, details: null };

/** Start and self-closing tags in document order, names lowercased. */
export function extractStartTags(html: string): ExpectedTag[] {
  const found: ExpectedTag[] = [];
  const parser = new Parser(
    {
      onopentag(name, attribs, isImplied) {
        // Stray end tags such as </p> make the parser imply an opening tag.
        if (isImplied) return;
        found.push({ tag: name, attrs: Object.keys(attribs).sort() });
      },
    },
    { lowerCaseTags: true, lowerCaseAttributeNames: true, decodeEntities: true }
  );
  parser.write(html);
  parser.end();
  return found;
}

function matches(expected: ExpectedTag, actual: ExpectedTag): boolean {
  if (expected.tag !== actual.tag) return false;
  if (expected.attrs.length === 0) return actual.attrs.length === 0;
  return expected.attrs.every((attr) => actual.attrs.includes(attr));
}

/**
 * Compares the sanitized output's element shape against the vector's
 * declaration. Positions are 1-based.
 */
export function verifyExpectedTags(
  sanitizedHtml: string,
  expectedTags: readonly ExpectedTag[] | null
): LossyVerdict {
  if (expectedTags === null) return NOT_LOSSY;
  const actual = extractStartTags(sanitizedHtml);

  if (expectedTags.length === 0) {
    if (actual.length === 0) return NOT_LOSSY;
    return {
      lossy: true,
      details: `Expected no tags after sanitization, but found: ${actual
        .slice(0, 20)
        .map(formatExpectedTag)
        .join(', ')}`,
    };
  }

  const missing: string[] = [];
  const unexpected: string[] = [];
  const length = Math.max(expectedTags.length, actual.length);
  for (let i = 0; i < length; i += 1) {
    const want = expectedTags[i];
    const got = actual[i];
    if (want === undefined) {
      if (got !== undefined) {
        unexpected.push(`position ${i + 1}: unexpected ${formatExpectedTag(got)}`);
      }
      continue;
    }
    if (got === undefined || !matches(want, got)) {
      missing.push(
        `position ${i + 1}: expected ${formatExpectedTag(want)}, got ${
          got === undefined ? 'nothing' : formatExpectedTag(got)
        }`
      );
    }
  }

  const parts = [
    ...(missing.length > 0
      ? [`Missing expected tags after sanitization: ${missing.join(', ')}`]
      : []),
    ...(unexpected.length > 0
      ? [`Unexpected tags after sanitization: ${unexpected.join(', ')}`]
      : []),
  ];
  return parts.length > 0 ? { lossy: true, details: parts.join('; ') } : NOT_LOSSY;
}
