import type { PayloadContext, VectorResult } from '@sinkbench/shared';

import { isLeakContext } from './context.js';
import type { SignalSnapshot } from './signals.js';

export type ExecutionSignal =
  | 'dangerous-url'
  | 'hook'
  | 'dialog'
  | 'navigation'
  | 'external-script';

export type Classification =
  | { verdict: 'executed'; signal: ExecutionSignal; evidence: string }
  | { verdict: 'leak'; evidence: string };

export interface ClassifyOptions {
  context: PayloadContext;
  /**
   * Passive cross-origin fetches are judged only when set: after events were
   * triggered in leak contexts, otherwise in the final check.
   */
  includeNetwork: boolean;
}

const MAX_LISTED_URLS = 3;

const listUrls = (urls: readonly string[]): string =>
  urls.slice(0, MAX_LISTED_URLS).join(', ');

/**
 * Fixed precedence, highest first: javascript: URL in the DOM, hook, dialog,
 * navigation (a leak in leak contexts), external script, external network.
 * A script attempt outranks a passive leak seen in the same run.
 */
export function classifySignals(
  snapshot: SignalSnapshot,
  options: ClassifyOptions
): Classification | null {
  const [hit] = snapshot.javascriptUrls;
  if (hit) {
    return {
      verdict: 'executed',
      signal: 'dangerous-url',
      evidence: `dangerous-url:${hit.tag}[${hit.attr}]=${hit.value}`,
    };
  }

  if (snapshot.hook.fired) {
    return {
      verdict: 'executed',
      signal: 'hook',
      evidence: `hook:${snapshot.hook.details}`,
    };
  }

  const [dialog] = snapshot.dialogs;
  if (dialog !== undefined) {
    return { verdict: 'executed', signal: 'dialog', evidence: dialog };
  }

  if (snapshot.navigations.length > 0) {
    const urls = listUrls(snapshot.navigations);
    return isLeakContext(options.context)
      ? { verdict: 'leak', evidence: `document:${urls}` }
      : { verdict: 'executed', signal: 'navigation', evidence: `navigation:${urls}` };
  }

  if (snapshot.externalScripts.length > 0) {
    return {
      verdict: 'executed',
      signal: 'external-script',
      evidence: `external-script:${listUrls(snapshot.externalScripts)}`,
    };
  }

  const [attempt] = snapshot.externalNetwork;
  if (attempt && options.includeNetwork) {
    return {
      verdict: 'leak',
      evidence: `${attempt.resourceType}:${attempt.url}`,
    };
  }

  return null;
}

export const NO_EXECUTION_DETAILS = 'No execution detected';

export function executedResult(evidence: string, payloadHtml: string): VectorResult {
  return {
    executed: true,
    signal: 'none',
    details: `Executed: ${evidence}; payload=${JSON.stringify(payloadHtml)}`,
  };
}

export function toVectorResult(
  classification: Classification | null,
  payloadHtml: string
): VectorResult {
  if (!classification) {
    return { executed: false, signal: 'none', details: NO_EXECUTION_DETAILS };
  }
  if (classification.verdict === 'executed') {
    return executedResult(classification.evidence, payloadHtml);
  }
  return {
    executed: false,
    signal: 'http_leak',
    details: `External fetch: ${classification.evidence}; payload=${JSON.stringify(payloadHtml)}`,
  };
}
