import type { BrowserName } from '@sinkbench/shared';

/**
 * Host capability interface the signal session drives. Any browser
 * automation layer that can satisfy it is substitutable; tests use an
 * in-process fake.
 */

/** Outcome of a page call. Races surface as tagged values, never as throws. */
export type PageCallResult<T = void> =
  | { kind: 'ok'; value: T }
  | { kind: 'timeout' }
  | { kind: 'context-destroyed' }
  | { kind: 'failed'; error: Error };

export interface InterceptedRequest {
  url: string;
  /** Engine resource type: document, script, image, stylesheet, fetch, … */
  resourceType: string;
}

export type RouteDecision =
  | { action: 'fulfill'; contentType: string; body: string }
  | { action: 'abort' };

export type RouteHandler = (request: InterceptedRequest) => RouteDecision;

export interface DialogEvent {
  type: string;
  message: string;
}

/** Per-run record of the page-level alert/confirm/prompt hook. */
export interface HookState {
  fired: boolean;
  details: string;
}

export interface DangerousUrlHit {
  tag: string;
  attr: string;
  value: string;
}

export interface PageDriver {
  readonly browser: BrowserName;
  addInitScript(source: string): Promise<void>;
  /** The driver answers every dialog itself so the page never blocks. */
  onDialog(listener: (dialog: DialogEvent) => void): void;
  onFrameNavigated(listener: (url: string) => void): void;
  route(handler: RouteHandler): Promise<void>;
  /** Navigates and resolves once the DOM is parsed (not on full load). */
  goto(url: string, timeoutMs: number): Promise<PageCallResult>;
  /** Cancels timers left by the previous document and resets the hook record. */
  cleanup(): Promise<PageCallResult>;
  readHook(): Promise<PageCallResult<HookState>>;
  findJavascriptUrls(): Promise<PageCallResult<DangerousUrlHit[]>>;
  triggerEvents(): Promise<PageCallResult>;
  /** Real (trusted) clicks on anchors whose resolved href is a javascript: URL. */
  clickJavascriptLinks(timeoutMs: number): Promise<PageCallResult>;
  runLeakGestures(): Promise<PageCallResult>;
  /** Absolute, browser-resolved href of the anchor with the given id. */
  resolveAnchorHref(id: string): Promise<PageCallResult<string>>;
  click(selector: string, timeoutMs: number): Promise<PageCallResult>;
  wait(ms: number): Promise<PageCallResult>;
  close(): Promise<void>;
}

export type DriverLauncher = (browser: BrowserName) => Promise<PageDriver>;

export const ok = <T>(value: T): PageCallResult<T> => ({ kind: 'ok', value });

export const OK: PageCallResult = { kind: 'ok', value: undefined };

const CONTEXT_DESTROYED_MARKERS = [
  'Execution context was destroyed',
  'most likely because of a navigation',
] as const;

export function looksLikeContextDestroyed(message: string): boolean {
  return CONTEXT_DESTROYED_MARKERS.some((marker) => message.includes(marker));
}
