import type { PayloadContext } from '@sinkbench/shared';

/** One element the sanitized output must keep, e.g. `img[alt,src]`. */
export interface ExpectedTag {
  readonly tag: string;
  /** Lowercase, sorted. Empty means "no attributes at all". */
  readonly attrs: readonly string[];
}

export interface Vector {
  readonly id: string;
  readonly description: string;
  readonly payloadHtml: string;
  readonly payloadContext: PayloadContext;
  /** `null`: not declared, the lossy check is skipped. */
  readonly expectedTags: readonly ExpectedTag[] | null;
}

export function formatExpectedTag(tag: ExpectedTag): string {
  return tag.attrs.length > 0 ? `${tag.tag}[${tag.attrs.join(',')}]` : tag.tag;
}
