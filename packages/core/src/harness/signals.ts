import type { PayloadContext } from '@sinkbench/shared';

import { BASE_URL } from './context.js';
import type {
  DangerousUrlHit,
  DialogEvent,
  HookState,
  InterceptedRequest,
} from './driver.js';

export interface NetworkAttempt {
  resourceType: string;
  url: string;
}

/** Everything observed for one run, as handed to the classifier. */
export interface SignalSnapshot {
  javascriptUrls: readonly DangerousUrlHit[];
  hook: HookState;
  dialogs: readonly string[];
  navigations: readonly string[];
  externalScripts: readonly string[];
  externalNetwork: readonly NetworkAttempt[];
}

export type RequestDisposition = 'serve-document' | 'abort';

export const NO_HOOK: HookState = { fired: false, details: '' };

function isIgnorableNavigation(url: string): boolean {
  return (
    url.startsWith('chrome-error://') ||
    url === 'about:blank' ||
    url.startsWith('about:srcdoc')
  );
}

function parseHttpUrl(raw: string): URL | null {
  try {
    const url = new URL(raw);
    return url.protocol === 'http:' || url.protocol === 'https:' ? url : null;
  } catch {
    return null;
  }
}

/**
 * Per-session accumulator for dialogs, navigations and intercepted requests.
 * Single writer: the session's listeners; cleared at the start of every run.
 */
export class SignalBuffer {
  readonly #baseUrl: string;
  readonly #baseOrigin: string;
  #dialogs: string[] = [];
  #navigations: string[] = [];
  #externalScripts: string[] = [];
  #externalNetwork: NetworkAttempt[] = [];
  #baseNavigationCount = 0;

  constructor(baseUrl: string = BASE_URL) {
    this.#baseUrl = baseUrl;
    this.#baseOrigin = new URL(baseUrl).origin;
  }

  reset(): void {
    this.#dialogs = [];
    this.#navigations = [];
    this.#externalScripts = [];
    this.#externalNetwork = [];
    this.#baseNavigationCount = 0;
  }

  recordDialog(dialog: DialogEvent): void {
    this.#dialogs.push(`dialog:${dialog.type}:${dialog.message}`);
  }

  recordFrameNavigation(url: string): void {
    if (!url || url.startsWith(`${this.#baseUrl}#`)) return;
    if (url === this.#baseUrl) {
      // The first load is ours; any later one is a reload the payload caused.
      this.#baseNavigationCount += 1;
      if (this.#baseNavigationCount > 1) this.#navigations.push(url);
      return;
    }
    this.#navigations.push(url);
  }

  /**
   * Records what a request says about the payload and decides its fate: only
   * the synthetic document itself is ever served.
   */
  recordRequest(request: InterceptedRequest): RequestDisposition {
    const { url, resourceType } = request;
    if (resourceType === 'document' && url === this.#baseUrl) {
      return 'serve-document';
    }
    if (resourceType === 'document') {
      this.#navigations.push(url);
      return 'abort';
    }
    const parsed = parseHttpUrl(url);
    if (!parsed) return 'abort';
    if (resourceType === 'script') {
      this.#externalScripts.push(url);
    } else if (parsed.origin !== this.#baseOrigin) {
      this.#externalNetwork.push({ resourceType, url });
    }
    return 'abort';
  }

  /**
   * Called once the run's own navigation settled: a reload still in flight
   * from the previous case may have reported the base URL during it.
   */
  acknowledgeInitialLoad(): void {
    this.#navigations = this.#navigations.filter((url) => url !== this.#baseUrl);
    this.#baseNavigationCount = Math.max(this.#baseNavigationCount, 1);
  }

  executionNavigations(
    context: PayloadContext,
    expectedClickUrl: string | null
  ): string[] {
    return this.#navigations.filter((url) => {
      if (!url || isIgnorableNavigation(url)) return false;
      if (url.startsWith(`${this.#baseUrl}#`)) return false;
      // Following the href the harness clicked on purpose only proves the URL survived.
      if (context === 'href' && expectedClickUrl && url === expectedClickUrl) {
        return false;
      }
      return true;
    });
  }

  snapshot(
    context: PayloadContext,
    expectedClickUrl: string | null,
    observed: { hook: HookState; javascriptUrls: readonly DangerousUrlHit[] }
  ): SignalSnapshot {
    return {
      javascriptUrls: observed.javascriptUrls,
      hook: observed.hook,
      dialogs: [...this.#dialogs],
      navigations: this.executionNavigations(context, expectedClickUrl),
      externalScripts: [...this.#externalScripts],
      externalNetwork: [...this.#externalNetwork],
    };
  }
}
