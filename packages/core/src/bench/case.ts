import {
  describeError,
  type BenchCaseResult,
  type BenchOutcome,
  type BrowserName,
  type PayloadContext,
  type VectorResult,
} from '@sinkbench/shared';

import type { Vector } from '../corpus/types.js';
import { renderDocument } from '../harness/renderer.js';
import type { CaseSession } from '../harness/session.js';
import { resolveCaseTimeoutMs } from '../harness/timeouts.js';
import { verifyExpectedTags } from '../lossy/verifier.js';
import { explicitlySupports, supportsContext, type Sanitizer } from '../sanitizers/types.js';
import { toSinkbenchError } from '../types/errors.js';

export interface AdaptedPayload {
  sanitizerInputHtml: string;
  runPayloadContext: PayloadContext;
}

/**
 * Attribute-value contexts are wrapped into markup unless the sanitizer
 * declares it can handle the bare value itself.
 */
export function adaptPayload(vector: Vector, sanitizer: Sanitizer): AdaptedPayload {
  const { payloadHtml, payloadContext } = vector;
  if (payloadContext === 'href' && !explicitlySupports(sanitizer, 'href')) {
    return {
      sanitizerInputHtml: `<a href="${payloadHtml}">x</a>`,
      runPayloadContext: 'html',
    };
  }
  if (payloadContext === 'onerror_attr' && !explicitlySupports(sanitizer, 'onerror_attr')) {
    return {
      sanitizerInputHtml: `<img src="nonexistent://x" onerror="${payloadHtml}">`,
      runPayloadContext: 'html',
    };
  }
  return { sanitizerInputHtml: payloadHtml, runPayloadContext: payloadContext };
}

export function foldOutcome(result: VectorResult, lossy: boolean): BenchOutcome {
  if (result.executed) return 'xss';
  if (result.signal === 'http_leak') return 'http_leak';
  return lossy ? 'lossy' : 'pass';
}

export interface CaseIdentity {
  sanitizer: Sanitizer;
  browser: BrowserName;
  vector: Vector;
}

function baseResult({ sanitizer, browser, vector }: CaseIdentity): BenchCaseResult {
  return {
    sanitizer: sanitizer.name,
    browser,
    vectorId: vector.id,
    payloadContext: vector.payloadContext,
    runPayloadContext: vector.payloadContext,
    outcome: 'pass',
    executed: false,
    lossy: false,
    lossyDetails: null,
    details: '',
    sanitizerInputHtml: '',
    sanitizedHtml: '',
    renderedHtml: '',
  };
}

export function skippedResult(identity: CaseIdentity): BenchCaseResult {
  return {
    ...baseResult(identity),
    outcome: 'skip',
    details: `Skipped: ${identity.sanitizer.name} does not support context ${identity.vector.payloadContext}`,
  };
}

/** Error outcome for a case that never ran; `details` is used verbatim. */
export function errorResult(identity: CaseIdentity, details: string): BenchCaseResult {
  return { ...baseResult(identity), outcome: 'error', details };
}

/** Error outcome for a case that never reached the browser (e.g. its engine failed to launch). */
export function harnessErrorResult(identity: CaseIdentity, error: unknown): BenchCaseResult {
  return errorResult(identity, `Harness error: ${describeError(error)}`);
}

export interface RunCaseOptions extends CaseIdentity {
  session: CaseSession;
  /** Fixed post-trigger wait; inferred per payload when omitted. */
  timeoutMs?: number;
}

/**
 * Runs one (sanitizer, browser, vector) case. Failures never escape: they are
 * folded into an `error` outcome.
 */
export async function runCase(options: RunCaseOptions): Promise<BenchCaseResult> {
  const { sanitizer, vector, session } = options;
  if (!supportsContext(sanitizer, vector.payloadContext)) {
    return skippedResult(options);
  }

  const { sanitizerInputHtml, runPayloadContext } = adaptPayload(vector, sanitizer);
  const base = { ...baseResult(options), runPayloadContext, sanitizerInputHtml };

  let sanitizedHtml: string;
  try {
    sanitizedHtml = sanitizer.sanitize(sanitizerInputHtml);
  } catch (cause) {
    return { ...base, outcome: 'error', details: `Sanitizer error: ${describeError(cause)}` };
  }

  const verdict = verifyExpectedTags(sanitizedHtml, vector.expectedTags);
  const checked = {
    ...base,
    sanitizedHtml,
    lossy: verdict.lossy,
    lossyDetails: verdict.details,
  };

  let renderedHtml = '';
  try {
    renderedHtml = renderDocument(sanitizedHtml, runPayloadContext);
    const result = await session.run({
      payloadHtml: vector.payloadHtml,
      sanitizedHtml,
      payloadContext: runPayloadContext,
      timeoutMs: resolveCaseTimeoutMs(options.timeoutMs, vector.payloadHtml, sanitizedHtml),
    });
    return {
      ...checked,
      renderedHtml,
      outcome: foldOutcome(result, verdict.lossy),
      executed: result.executed,
      details: result.details,
    };
  } catch (cause) {
    return {
      ...checked,
      renderedHtml,
      outcome: 'error',
      details: `Harness error: ${toSinkbenchError(cause).message}`,
    };
  }
}
