/* eslint-disable max-lines */
import type { BrowserName, PayloadContext, VectorResult } from '@sinkbench/shared';

import { HarnessError } from '../types/errors.js';
import {
  classifySignals,
  executedResult,
  toVectorResult,
  type Classification,
} from './classifier.js';
import {
  BASE_URL,
  HREF_LINK_ID,
  MAX_PAGE_TIMEOUT_MS,
  POLL_INTERVAL_MS,
  isLeakContext,
} from './context.js';
import type {
  DangerousUrlHit,
  DriverLauncher,
  HookState,
  PageCallResult,
  PageDriver,
} from './driver.js';
import { readPageScript } from './page-scripts.js';
import { renderDocument } from './renderer.js';
import { NO_HOOK, SignalBuffer } from './signals.js';

export type SessionState = 'closed' | 'launched' | 'idle' | 'running';

export type RunPhase =
  | 'navigating'
  | 'signal-check'
  | 'event-trigger'
  | 'poll-wait'
  | 'final-check';

export interface CaseInput {
  /** Raw vector payload, quoted in result details. */
  payloadHtml: string;
  sanitizedHtml: string;
  payloadContext: PayloadContext;
  /** Post-trigger wait window; 0 skips polling. */
  timeoutMs: number;
}

/** What the orchestrator needs from a session; SignalSession is the real one. */
export interface CaseSession {
  readonly browser: BrowserName;
  run(input: CaseInput): Promise<VectorResult>;
  close(): Promise<void>;
}

export interface SignalSessionOptions {
  launcher: DriverLauncher;
  /** Monotonic milliseconds; injectable for tests. */
  clock?: () => number;
  pollIntervalMs?: number;
  /** Prelude source installed before any page script; defaults to page-scripts/prelude.js. */
  prelude?: string;
}

interface RunState {
  readonly input: CaseInput;
  readonly leak: boolean;
  expectedClickUrl: string | null;
  javascriptUrls: DangerousUrlHit[];
  deadline: number;
}

type PhaseStep = { next: RunPhase } | { done: VectorResult };

const next = (phase: RunPhase): PhaseStep => ({ next: phase });
const done = (result: VectorResult): PhaseStep => ({ done: result });

function clickTimeoutMs(timeoutMs: number): number {
  return Math.min(Math.max(timeoutMs, 500), MAX_PAGE_TIMEOUT_MS);
}

/**
 * Owns one browser page for its lifetime and runs cases on it strictly one at
 * a time: closed → launched → (idle ↔ running) → closed.
 */
export class SignalSession implements CaseSession {
  readonly browser: BrowserName;
  readonly #options: SignalSessionOptions;
  readonly #clock: () => number;
  readonly #signals = new SignalBuffer(BASE_URL);
  #driver: PageDriver | null = null;
  #state: SessionState = 'closed';
  #currentHtml = '';

  constructor(browser: BrowserName, options: SignalSessionOptions) {
    this.browser = browser;
    this.#options = options;
    this.#clock = options.clock ?? (() => performance.now());
  }

  get state(): SessionState {
    return this.#state;
  }

  static async open(
    browser: BrowserName,
    options: SignalSessionOptions
  ): Promise<SignalSession> {
    const session = new SignalSession(browser, options);
    await session.launch();
    return session;
  }

  async launch(): Promise<void> {
    if (this.#state !== 'closed') {
      throw new HarnessError({
        message: `Session already launched (state=${this.#state})`,
        context: { browser: this.browser },
      });
    }
    const driver = await this.#options.launcher(this.browser);
    this.#driver = driver;
    this.#state = 'launched';
    try {
      await driver.addInitScript(this.#options.prelude ?? readPageScript('prelude.js'));
      driver.onDialog((dialog) => this.#signals.recordDialog(dialog));
      driver.onFrameNavigated((url) => this.#signals.recordFrameNavigation(url));
      await driver.route((request) =>
        this.#signals.recordRequest(request) === 'serve-document'
          ? { action: 'fulfill', contentType: 'text/html', body: this.#currentHtml }
          : { action: 'abort' }
      );
    } catch (error) {
      await this.close();
      throw error;
    }
    this.#state = 'idle';
  }

  async run(input: CaseInput): Promise<VectorResult> {
    const driver = this.#driver;
    if (!driver || this.#state !== 'idle') {
      throw new HarnessError({
        message: `Session is not idle (state=${this.#state})`,
        context: { browser: this.browser, payloadContext: input.payloadContext },
      });
    }
    this.#state = 'running';
    try {
      // Timers a previous payload left running must not fire into this case.
      await driver.cleanup();
      this.#signals.reset();
      this.#currentHtml = renderDocument(input.sanitizedHtml, input.payloadContext);
      return await this.#runPhases(driver, {
        input,
        leak: isLeakContext(input.payloadContext),
        expectedClickUrl: null,
        javascriptUrls: [],
        deadline: 0,
      });
    } finally {
      if (this.#state === 'running') this.#state = 'idle';
    }
  }

  async close(): Promise<void> {
    const driver = this.#driver;
    this.#driver = null;
    this.#state = 'closed';
    if (driver) await driver.close();
  }

  async #runPhases(driver: PageDriver, run: RunState): Promise<VectorResult> {
    let phase: RunPhase = 'navigating';
    for (;;) {
      const step = await this.#step(phase, driver, run);
      if ('done' in step) return step.done;
      phase = step.next;
    }
  }

  #step(phase: RunPhase, driver: PageDriver, run: RunState): Promise<PhaseStep> {
    switch (phase) {
      case 'navigating':
        return this.#navigate(driver, run);
      case 'signal-check':
        return this.#signalCheck(driver, run);
      case 'event-trigger':
        return this.#eventTrigger(driver, run);
      case 'poll-wait':
        return this.#pollWait(driver, run);
      case 'final-check':
        return this.#finalCheck(driver, run);
    }
  }

  async #navigate(driver: PageDriver, run: RunState): Promise<PhaseStep> {
    const result = await driver.goto(BASE_URL, MAX_PAGE_TIMEOUT_MS);
    switch (result.kind) {
      case 'ok':
        this.#signals.acknowledgeInitialLoad();
        return next('signal-check');
      case 'timeout': {
        // A load that never settles is itself suspicious: fall back to what
        // was gathered, else count it as execution.
        const decision = this.#decide(run, NO_HOOK, true);
        return done(
          decision
            ? toVectorResult(decision, run.input.payloadHtml)
            : executedResult('navigation:goto-timeout', run.input.payloadHtml)
        );
      }
      case 'context-destroyed':
        return done(this.#contextDestroyed(run));
      case 'failed':
        throw this.#harnessError('navigating', result.error, run);
    }
  }

  async #signalCheck(driver: PageDriver, run: RunState): Promise<PhaseStep> {
    const found = await driver.findJavascriptUrls();
    if (found.kind === 'context-destroyed') return done(this.#contextDestroyed(run));
    if (found.kind === 'ok') run.javascriptUrls = found.value;

    const decision = this.#decide(run, await this.#readHook(driver), false);
    return decision
      ? done(toVectorResult(decision, run.input.payloadHtml))
      : next('event-trigger');
  }

  async #eventTrigger(driver: PageDriver, run: RunState): Promise<PhaseStep> {
    const { input } = run;
    if (input.payloadContext === 'href') {
      const href = await driver.resolveAnchorHref(HREF_LINK_ID);
      run.expectedClickUrl = href.kind === 'ok' && href.value ? href.value : null;
      // javascript: URLs need a trusted gesture in some engines.
      const clicked = await driver.click(`#${HREF_LINK_ID}`, clickTimeoutMs(input.timeoutMs));
      if (clicked.kind === 'context-destroyed') return done(this.#contextDestroyed(run));
    } else {
      const triggered = await driver.triggerEvents();
      if (triggered.kind !== 'ok') {
        return done(this.#afterFailedCall('event-trigger', triggered, run));
      }
      const clicked = await driver.clickJavascriptLinks(clickTimeoutMs(input.timeoutMs));
      if (clicked.kind === 'context-destroyed') return done(this.#contextDestroyed(run));
      if (run.leak) {
        const gestures = await driver.runLeakGestures();
        if (gestures.kind === 'context-destroyed') {
          return done(this.#contextDestroyed(run));
        }
      }
    }

    const decision = this.#decide(run, await this.#readHook(driver), run.leak);
    if (decision) return done(toVectorResult(decision, input.payloadHtml));
    run.deadline = this.#clock() + input.timeoutMs;
    return next(input.timeoutMs > 0 ? 'poll-wait' : 'final-check');
  }

  async #pollWait(driver: PageDriver, run: RunState): Promise<PhaseStep> {
    const pollMs = this.#options.pollIntervalMs ?? POLL_INTERVAL_MS;
    for (;;) {
      const decision = this.#decide(run, await this.#readHook(driver), run.leak);
      if (decision) return done(toVectorResult(decision, run.input.payloadHtml));

      const remaining = run.deadline - this.#clock();
      if (remaining <= 0) return next('final-check');

      const waited = await driver.wait(Math.min(pollMs, remaining));
      if (waited.kind !== 'ok') {
        return done(this.#afterFailedCall('poll-wait', waited, run));
      }
    }
  }

  async #finalCheck(driver: PageDriver, run: RunState): Promise<PhaseStep> {
    const decision = this.#decide(run, await this.#readHook(driver), true);
    return done(toVectorResult(decision, run.input.payloadHtml));
  }

  #decide(
    run: RunState,
    hook: HookState,
    includeNetwork: boolean
  ): Classification | null {
    const snapshot = this.#signals.snapshot(
      run.input.payloadContext,
      run.expectedClickUrl,
      { hook, javascriptUrls: run.javascriptUrls }
    );
    return classifySignals(snapshot, {
      context: run.input.payloadContext,
      includeNetwork,
    });
  }

  async #readHook(driver: PageDriver): Promise<HookState> {
    const hook = await driver.readHook();
    return hook.kind === 'ok' ? hook.value : NO_HOOK;
  }

  /**
   * A page call that did not complete: gathered signals explain it first, a
   * torn-down context means the payload navigated, anything else is a
   * harness failure.
   */
  #afterFailedCall(
    phase: RunPhase,
    result: Exclude<PageCallResult, { kind: 'ok' }>,
    run: RunState
  ): VectorResult {
    const decision = this.#decide(run, NO_HOOK, run.leak);
    if (decision) return toVectorResult(decision, run.input.payloadHtml);
    if (result.kind === 'context-destroyed') return this.#contextDestroyed(run);
    const error =
      result.kind === 'timeout'
        ? new Error(`page call timed out during ${phase}`)
        : result.error;
    throw this.#harnessError(phase, error, run);
  }

  #contextDestroyed(run: RunState): VectorResult {
    return executedResult('navigation:context-destroyed', run.input.payloadHtml);
  }

  #harnessError(phase: RunPhase, cause: Error, run: RunState): HarnessError {
    return new HarnessError({
      message: `${phase} failed: ${cause.message}`,
      context: {
        browser: this.browser,
        payloadContext: run.input.payloadContext,
        phase,
      },
      cause,
    });
  }
}

/** Opens a SignalSession on the given launcher. */
export function openSignalSession(
  browser: BrowserName,
  options: SignalSessionOptions
): Promise<SignalSession> {
  return SignalSession.open(browser, options);
}
