const ASYNC_TOKENS = [
  'settimeout',
  'setinterval',
  'requestanimationframe',
  'promise.resolve',
  'new promise',
  'async ',
  'await ',
] as const;

const LOAD_OR_ERROR_HANDLER_RE = /\bon(load|error)\s*=/;

/**
 * Post-trigger wait window in ms, inferred from payload text. Synchronous
 * payloads are caught by the hook without waiting, so the default is zero.
 */
export function inferTimeoutMs(payloadHtml: string, sanitizedHtml: string): number {
  const blob = `${payloadHtml}\n${sanitizedHtml}`.toLowerCase();
  if (ASYNC_TOKENS.some((token) => blob.includes(token))) return 250;
  if (blob.includes('http-equiv') && blob.includes('refresh')) return 400;
  if (LOAD_OR_ERROR_HANDLER_RE.test(blob)) return 25;
  return 0;
}

/** A fixed caller timeout wins over inference. */
export function resolveCaseTimeoutMs(
  fixedTimeoutMs: number | undefined,
  payloadHtml: string,
  sanitizedHtml: string
): number {
  return fixedTimeoutMs ?? inferTimeoutMs(payloadHtml, sanitizedHtml);
}
