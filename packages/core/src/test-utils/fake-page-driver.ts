import type { BrowserName } from '@sinkbench/shared';

import {
  OK,
  ok,
  type DangerousUrlHit,
  type DialogEvent,
  type HookState,
  type PageCallResult,
  type PageDriver,
  type RouteHandler,
} from '../harness/driver.js';

type FailureKind = 'timeout' | 'context-destroyed' | 'failed';

type FailingCall = 'goto' | 'triggerEvents' | 'wait';

/** Page-side view handed to behaviors when a document loads. */
export interface FakeDocument {
  readonly html: string;
  callHook(kind: 'alert' | 'confirm' | 'prompt', message: string): void;
  openDialog(type: string, message: string): void;
  navigate(url: string): void;
  request(url: string, resourceType: string): void;
  addJavascriptUrl(hit: DangerousUrlHit): void;
  setAnchorHref(url: string): void;
  onEvents(handler: () => void): void;
  onClick(selector: string, handler: () => void): void;
  onLeakGesture(handler: () => void): void;
  setInterval(handler: () => void, everyMs: number): void;
  setTimeout(handler: () => void, afterMs: number): void;
  fail(call: FailingCall, kind: FailureKind): void;
}

export type FakeBehavior = (doc: FakeDocument) => void;

export interface FakePageDriverOptions {
  browser?: BrowserName;
  behaviors?: FakeBehavior[];
  /** When false, cleanup() leaves timers running (models a missing cleanup hook). */
  cleanupCancelsTimers?: boolean;
  /** Simulated time spent inside goto, during which timers fire. */
  gotoDurationMs?: number;
}

interface FakeTimer {
  id: number;
  dueAt: number;
  everyMs: number | null;
  handler: () => void;
}

interface DocumentState {
  html: string;
  hook: HookState;
  javascriptUrls: DangerousUrlHit[];
  anchorHref: string;
  eventHandlers: Array<() => void>;
  clickHandlers: Map<string, Array<() => void>>;
  leakHandlers: Array<() => void>;
  failures: Map<FailingCall, FailureKind>;
}

function failure(kind: FailureKind, call: string): PageCallResult<never> {
  if (kind === 'failed') {
    return { kind: 'failed', error: new Error(`fake ${call} failure`) };
  }
  return { kind };
}

/**
 * In-process PageDriver for tests. Behaviors inspect the served document and
 * script what the "page" does; timers live on the driver so they survive
 * navigation the way leaked work can in a reused page.
 */
export class FakePageDriver implements PageDriver {
  readonly browser: BrowserName;
  readonly initScripts: string[] = [];
  readonly calls: string[] = [];
  now = 0;
  closed = false;

  readonly #behaviors: FakeBehavior[];
  readonly #cleanupCancelsTimers: boolean;
  readonly #gotoDurationMs: number;
  #dialogListeners: Array<(dialog: DialogEvent) => void> = [];
  #navigationListeners: Array<(url: string) => void> = [];
  #routeHandler: RouteHandler | null = null;
  #timers: FakeTimer[] = [];
  #nextTimerId = 1;
  #doc: DocumentState | null = null;

  constructor(options: FakePageDriverOptions = {}) {
    this.browser = options.browser ?? 'chromium';
    this.#behaviors = options.behaviors ?? [];
    this.#cleanupCancelsTimers = options.cleanupCancelsTimers ?? true;
    this.#gotoDurationMs = options.gotoDurationMs ?? 10;
  }

  get pendingTimers(): number {
    return this.#timers.length;
  }

  async addInitScript(source: string): Promise<void> {
    this.initScripts.push(source);
  }

  onDialog(listener: (dialog: DialogEvent) => void): void {
    this.#dialogListeners.push(listener);
  }

  onFrameNavigated(listener: (url: string) => void): void {
    this.#navigationListeners.push(listener);
  }

  async route(handler: RouteHandler): Promise<void> {
    this.#routeHandler = handler;
  }

  async goto(url: string): Promise<PageCallResult> {
    this.calls.push('goto');
    const decision = this.#dispatchRequest(url, 'document');
    if (decision !== 'fulfilled') {
      this.#emitNavigation('chrome-error://chromewebdata/');
      return { kind: 'failed', error: new Error(`net::ERR_FAILED at ${url}`) };
    }
    const doc = this.#doc;
    this.#advance(this.#gotoDurationMs);
    const failed = doc?.failures.get('goto');
    return failed ? failure(failed, 'goto') : OK;
  }

  async cleanup(): Promise<PageCallResult> {
    this.calls.push('cleanup');
    if (this.#cleanupCancelsTimers) this.#timers = [];
    if (this.#doc) this.#doc.hook = { fired: false, details: '' };
    return OK;
  }

  async readHook(): Promise<PageCallResult<HookState>> {
    return ok(this.#doc ? { ...this.#doc.hook } : { fired: false, details: '' });
  }

  async findJavascriptUrls(): Promise<PageCallResult<DangerousUrlHit[]>> {
    this.calls.push('findJavascriptUrls');
    return ok(this.#doc ? [...this.#doc.javascriptUrls] : []);
  }

  async triggerEvents(): Promise<PageCallResult> {
    this.calls.push('triggerEvents');
    const doc = this.#doc;
    if (!doc) return OK;
    doc.eventHandlers.forEach((handler) => handler());
    const failed = doc.failures.get('triggerEvents');
    return failed ? failure(failed, 'triggerEvents') : OK;
  }

  async clickJavascriptLinks(): Promise<PageCallResult> {
    this.calls.push('clickJavascriptLinks');
    return OK;
  }

  async runLeakGestures(): Promise<PageCallResult> {
    this.calls.push('runLeakGestures');
    this.#doc?.leakHandlers.forEach((handler) => handler());
    return OK;
  }

  async resolveAnchorHref(): Promise<PageCallResult<string>> {
    return ok(this.#doc?.anchorHref ?? '');
  }

  async click(selector: string): Promise<PageCallResult> {
    this.calls.push(`click:${selector}`);
    this.#doc?.clickHandlers.get(selector)?.forEach((handler) => handler());
    return OK;
  }

  async wait(ms: number): Promise<PageCallResult> {
    this.calls.push(`wait:${ms}`);
    const failed = this.#doc?.failures.get('wait');
    if (failed) return failure(failed, 'wait');
    this.#advance(ms);
    return OK;
  }

  async close(): Promise<void> {
    this.closed = true;
    this.#timers = [];
  }

  #dispatchRequest(url: string, resourceType: string): 'fulfilled' | 'aborted' {
    if (!this.#routeHandler) throw new Error('FakePageDriver: route() not installed');
    const decision = this.#routeHandler({ url, resourceType });
    if (decision.action === 'abort') return 'aborted';
    if (resourceType === 'document') this.#load(url, decision.body);
    return 'fulfilled';
  }

  #emitNavigation(url: string): void {
    this.#navigationListeners.forEach((listener) => listener(url));
  }

  #load(url: string, html: string): void {
    const doc: DocumentState = {
      html,
      hook: { fired: false, details: '' },
      javascriptUrls: [],
      anchorHref: '',
      eventHandlers: [],
      clickHandlers: new Map(),
      leakHandlers: [],
      failures: new Map(),
    };
    this.#doc = doc;
    this.#emitNavigation(url);
    const view = this.#view(doc);
    this.#behaviors.forEach((behavior) => behavior(view));
  }

  #view(doc: DocumentState): FakeDocument {
    return {
      html: doc.html,
      callHook: (kind, message) => {
        if (!doc.hook.fired) doc.hook = { fired: true, details: `${kind}:${message}` };
      },
      openDialog: (type, message) => {
        this.#dialogListeners.forEach((listener) => listener({ type, message }));
      },
      navigate: (url) => {
        if (this.#dispatchRequest(url, 'document') === 'aborted') {
          this.#emitNavigation('chrome-error://chromewebdata/');
        }
      },
      request: (url, resourceType) => {
        this.#dispatchRequest(url, resourceType);
      },
      addJavascriptUrl: (hit) => {
        doc.javascriptUrls.push(hit);
      },
      setAnchorHref: (url) => {
        doc.anchorHref = url;
      },
      onEvents: (handler) => {
        doc.eventHandlers.push(handler);
      },
      onClick: (selector, handler) => {
        const handlers = doc.clickHandlers.get(selector) ?? [];
        handlers.push(handler);
        doc.clickHandlers.set(selector, handlers);
      },
      onLeakGesture: (handler) => {
        doc.leakHandlers.push(handler);
      },
      setInterval: (handler, everyMs) => {
        this.#schedule(handler, everyMs, everyMs);
      },
      setTimeout: (handler, afterMs) => {
        this.#schedule(handler, afterMs, null);
      },
      fail: (call, kind) => {
        doc.failures.set(call, kind);
      },
    };
  }

  #schedule(handler: () => void, afterMs: number, everyMs: number | null): void {
    this.#timers.push({
      id: this.#nextTimerId++,
      dueAt: this.now + Math.max(afterMs, 1),
      everyMs,
      handler,
    });
  }

  /** Moves the clock forward, firing due timers in order. */
  #advance(ms: number): void {
    const target = this.now + ms;
    for (;;) {
      const due = this.#timers
        .filter((timer) => timer.dueAt <= target)
        .sort((a, b) => a.dueAt - b.dueAt || a.id - b.id)[0];
      if (!due) break;
      this.now = due.dueAt;
      if (due.everyMs === null) {
        this.#timers = this.#timers.filter((timer) => timer.id !== due.id);
      } else {
        due.dueAt += Math.max(due.everyMs, 1);
      }
      due.handler();
    }
    this.now = target;
  }
}
