import type { PayloadContext } from '@sinkbench/shared';

export interface Sanitizer {
  readonly name: string;
  readonly description: string;
  sanitize(html: string): string;
  /** `null` means every context is supported. */
  readonly supportedContexts: ReadonlySet<PayloadContext> | null;
}

export function supportsContext(sanitizer: Sanitizer, context: PayloadContext): boolean {
  return sanitizer.supportedContexts === null || sanitizer.supportedContexts.has(context);
}

/** True only when the sanitizer lists the context itself (universal support does not count). */
export function explicitlySupports(sanitizer: Sanitizer, context: PayloadContext): boolean {
  return sanitizer.supportedContexts?.has(context) ?? false;
}
