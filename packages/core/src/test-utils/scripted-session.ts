import type { BrowserName, VectorResult } from '@sinkbench/shared';

import { executedResult, toVectorResult } from '../harness/classifier.js';
import type { CaseInput, CaseSession } from '../harness/session.js';

export type SessionScript = (input: CaseInput) => VectorResult | Promise<VectorResult>;

/** CaseSession whose verdicts come from a script instead of a page. */
export class ScriptedSession implements CaseSession {
  readonly browser: BrowserName;
  readonly inputs: CaseInput[] = [];
  closed = false;
  readonly #script: SessionScript;

  constructor(browser: BrowserName, script: SessionScript = () => toVectorResult(null, '')) {
    this.browser = browser;
    this.#script = script;
  }

  async run(input: CaseInput): Promise<VectorResult> {
    this.inputs.push(input);
    return this.#script(input);
  }

  async close(): Promise<void> {
    this.closed = true;
  }
}

/** Reports execution whenever the sanitized output still contains `marker`. */
export function executesWhenPresent(marker: string): SessionScript {
  return (input) =>
    input.sanitizedHtml.includes(marker)
      ? executedResult(`hook:alert:${marker}`, input.payloadHtml)
      : toVectorResult(null, input.payloadHtml);
}
