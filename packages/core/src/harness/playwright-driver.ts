import {
  chromium,
  errors,
  firefox,
  webkit,
  type Browser,
  type BrowserType,
  type Dialog,
  type Page,
  type Route,
} from 'playwright-core';
import type { BrowserName } from '@sinkbench/shared';

import { MAX_PAGE_TIMEOUT_MS } from './context.js';
import {
  OK,
  looksLikeContextDestroyed,
  ok,
  type DangerousUrlHit,
  type DialogEvent,
  type HookState,
  type PageCallResult,
  type PageDriver,
  type RouteHandler,
} from './driver.js';
import { loadPageScripts, type PageScripts } from './page-scripts.js';

const BROWSER_TYPES: Record<BrowserName, BrowserType> = {
  chromium,
  firefox,
  webkit,
};

const CHROMIUM_ARGS = [
  '--disable-gpu',
  '--disable-dev-shm-usage',
  '--disable-extensions',
  '--mute-audio',
];

const CLEANUP_EXPRESSION = `(() => {
  const state = window.__sinkbench;
  if (state && typeof state.cleanup === 'function') state.cleanup();
})()`;

const READ_HOOK_EXPRESSION = `(() => {
  const state = window.__sinkbench;
  return state && typeof state.read === 'function' ? state.read() : { fired: false, details: '' };
})()`;

const JAVASCRIPT_LINK_SELECTOR = 'a[href], area[href]';

const JAVASCRIPT_LINK_INDICES_EXPRESSION = `Array.from(document.querySelectorAll(${JSON.stringify(
  JAVASCRIPT_LINK_SELECTOR
)}))
  .map((el, index) => (String(el.href || '').trim().toLowerCase().startsWith('javascript:') ? index : -1))
  .filter((index) => index >= 0)`;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

function toHookState(value: unknown): HookState {
  if (isRecord(value) && typeof value.fired === 'boolean') {
    return { fired: value.fired, details: String(value.details ?? '') };
  }
  return { fired: false, details: '' };
}

function toDangerousUrlHits(value: unknown): DangerousUrlHit[] {
  if (!Array.isArray(value)) return [];
  const hits: DangerousUrlHit[] = [];
  for (const item of value) {
    if (!isRecord(item)) continue;
    hits.push({
      tag: String(item.tag ?? ''),
      attr: String(item.attr ?? ''),
      value: String(item.value ?? ''),
    });
  }
  return hits;
}

function toIndices(value: unknown): number[] {
  return Array.isArray(value)
    ? value.filter((item): item is number => typeof item === 'number')
    : [];
}

function asError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

function isClosedTargetError(error: unknown): boolean {
  const message = asError(error).message;
  return (
    message.includes('Target page, context or browser has been closed') ||
    message.includes('Route is already handled')
  );
}

function headlessFromEnv(): boolean {
  const flag = process.env.SINKBENCH_BROWSER_HEADFUL;
  return !flag || flag === '0' || flag === 'false';
}

/**
 * PageDriver on playwright-core. One browser process, one page; every call is
 * bounded by an explicit timeout and reports races as tagged results.
 */
export class PlaywrightPageDriver implements PageDriver {
  readonly browser: BrowserName;
  readonly #instance: Browser;
  readonly #page: Page;
  readonly #scripts: PageScripts;

  constructor(browser: BrowserName, instance: Browser, page: Page, scripts: PageScripts) {
    this.browser = browser;
    this.#instance = instance;
    this.#page = page;
    this.#scripts = scripts;
  }

  static async launch(browser: BrowserName): Promise<PlaywrightPageDriver> {
    const scripts = loadPageScripts();
    const instance = await BROWSER_TYPES[browser].launch({
      headless: headlessFromEnv(),
      args: browser === 'chromium' ? CHROMIUM_ARGS : undefined,
    });
    try {
      const page = await instance.newPage();
      page.setDefaultTimeout(MAX_PAGE_TIMEOUT_MS);
      page.setDefaultNavigationTimeout(MAX_PAGE_TIMEOUT_MS);
      return new PlaywrightPageDriver(browser, instance, page, scripts);
    } catch (error) {
      await instance.close();
      throw error;
    }
  }

  async addInitScript(source: string): Promise<void> {
    await this.#page.addInitScript({ content: source });
  }

  onDialog(listener: (dialog: DialogEvent) => void): void {
    this.#page.on('dialog', (dialog: Dialog) => {
      listener({ type: dialog.type(), message: dialog.message() });
      void this.#answerDialog(dialog);
    });
  }

  onFrameNavigated(listener: (url: string) => void): void {
    this.#page.on('framenavigated', (frame) => {
      listener(frame.url());
    });
  }

  async route(handler: RouteHandler): Promise<void> {
    await this.#page.route('**/*', async (route: Route) => {
      const request = route.request();
      const decision = handler({
        url: request.url(),
        resourceType: request.resourceType(),
      });
      try {
        if (decision.action === 'fulfill') {
          await route.fulfill({
            status: 200,
            contentType: decision.contentType,
            body: decision.body,
          });
        } else {
          await route.abort();
        }
      } catch (error) {
        if (!isClosedTargetError(error)) throw error;
      }
    });
  }

  goto(url: string, timeoutMs: number): Promise<PageCallResult> {
    return this.#call(async () => {
      await this.#page.goto(url, { waitUntil: 'domcontentloaded', timeout: timeoutMs });
    });
  }

  async cleanup(): Promise<PageCallResult> {
    const result = await this.#evaluate(CLEANUP_EXPRESSION);
    return result.kind === 'ok' ? OK : result;
  }

  async readHook(): Promise<PageCallResult<HookState>> {
    const result = await this.#evaluate(READ_HOOK_EXPRESSION);
    return result.kind === 'ok' ? ok(toHookState(result.value)) : result;
  }

  async findJavascriptUrls(): Promise<PageCallResult<DangerousUrlHit[]>> {
    const result = await this.#evaluate(this.#scripts.detectJavascriptUrls);
    return result.kind === 'ok' ? ok(toDangerousUrlHits(result.value)) : result;
  }

  async triggerEvents(): Promise<PageCallResult> {
    const result = await this.#evaluate(this.#scripts.triggerEvents);
    return result.kind === 'ok' ? OK : result;
  }

  async clickJavascriptLinks(timeoutMs: number): Promise<PageCallResult> {
    const found = await this.#evaluate(JAVASCRIPT_LINK_INDICES_EXPRESSION);
    if (found.kind !== 'ok') return found;
    const anchors = this.#page.locator(JAVASCRIPT_LINK_SELECTOR);
    for (const index of toIndices(found.value)) {
      const clicked = await this.#call(() =>
        anchors.nth(index).click({ timeout: timeoutMs, force: true, noWaitAfter: true })
      );
      // A link that cannot be clicked is skipped; a teardown ends the sweep.
      if (clicked.kind === 'context-destroyed') return clicked;
    }
    return OK;
  }

  async runLeakGestures(): Promise<PageCallResult> {
    const result = await this.#evaluate(this.#scripts.externalRequestGestures);
    return result.kind === 'ok' ? OK : result;
  }

  async resolveAnchorHref(id: string): Promise<PageCallResult<string>> {
    const result = await this.#evaluate(
      `(() => { const a = document.getElementById(${JSON.stringify(id)}); return a ? String(a.href || '') : ''; })()`
    );
    return result.kind === 'ok' ? ok(String(result.value ?? '')) : result;
  }

  click(selector: string, timeoutMs: number): Promise<PageCallResult> {
    return this.#call(() =>
      this.#page.click(selector, { timeout: timeoutMs, noWaitAfter: true })
    );
  }

  wait(ms: number): Promise<PageCallResult> {
    return this.#call(() => this.#page.waitForTimeout(ms));
  }

  async close(): Promise<void> {
    await this.#instance.close();
  }

  async #answerDialog(dialog: Dialog): Promise<void> {
    try {
      if (dialog.type() === 'beforeunload') {
        await dialog.dismiss();
      } else if (dialog.type() === 'prompt') {
        await dialog.accept(dialog.defaultValue());
      } else {
        await dialog.accept();
      }
    } catch (error) {
      if (!isClosedTargetError(error)) {
        await dialog.dismiss().catch((dismissError: unknown) => {
          process.stderr.write(
            `[sinkbench] ${this.browser}: dialog left unanswered: ${asError(dismissError).message}\n`
          );
        });
      }
    }
  }

  /**
   * page.evaluate has no timeout of its own; a payload spinning the main
   * thread would block it forever.
   */
  #evaluate(expression: string): Promise<PageCallResult<unknown>> {
    return this.#call(async () => {
      let timer: NodeJS.Timeout | undefined;
      const deadline = new Promise<never>((_, reject) => {
        timer = setTimeout(
          () => reject(new errors.TimeoutError(`evaluate exceeded ${MAX_PAGE_TIMEOUT_MS}ms`)),
          MAX_PAGE_TIMEOUT_MS
        );
      });
      const evaluation = this.#page.evaluate(expression);
      // Settles after the race when the deadline wins; the outcome is already reported.
      void evaluation.catch(() => undefined);
      try {
        const value: unknown = await Promise.race([evaluation, deadline]);
        return value;
      } finally {
        clearTimeout(timer);
      }
    });
  }

  async #call<T>(fn: () => Promise<T>): Promise<PageCallResult<T>> {
    try {
      return ok(await fn());
    } catch (error) {
      if (error instanceof errors.TimeoutError) return { kind: 'timeout' };
      const failure = asError(error);
      if (looksLikeContextDestroyed(failure.message)) {
        return { kind: 'context-destroyed' };
      }
      return { kind: 'failed', error: failure };
    }
  }
}

export function launchPlaywrightDriver(browser: BrowserName): Promise<PageDriver> {
  return PlaywrightPageDriver.launch(browser);
}
