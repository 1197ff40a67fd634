import { existsSync, readFileSync } from 'node:fs';
import { dirname, join } from 'node:path';
import { fileURLToPath } from 'node:url';

export type PageScriptName =
  | 'prelude.js'
  | 'detect-javascript-urls.js'
  | 'trigger-events.js'
  | 'external-request-gestures.js'
  | 'event-types.json';

export interface EventCatalogue {
  legacyInlineHandlers: string[];
  mouse: string[];
  focus: string[];
  keyboard: string[];
  clipboard: string[];
  drag: string[];
  plain: string[];
  direct: string[];
  window: string[];
}

const CATALOGUE_KEYS = [
  'legacyInlineHandlers',
  'mouse',
  'focus',
  'keyboard',
  'clipboard',
  'drag',
  'plain',
  'direct',
  'window',
] as const satisfies readonly (keyof EventCatalogue)[];

const cache = new Map<PageScriptName, string>();

/** Walks up from this module until a `page-scripts/<name>` sibling is found. */
export function locatePageScript(name: PageScriptName): string {
  let dir = dirname(fileURLToPath(import.meta.url));
  for (;;) {
    const candidate = join(dir, 'page-scripts', name);
    if (existsSync(candidate)) return candidate;
    const parent = dirname(dir);
    if (parent === dir) {
      throw new Error(`Page script not found: ${name}`);
    }
    dir = parent;
  }
}

export function readPageScript(name: PageScriptName): string {
  const cached = cache.get(name);
  if (cached !== undefined) return cached;
  const source = readFileSync(locatePageScript(name), 'utf8');
  cache.set(name, source);
  return source;
}

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((item) => typeof item === 'string');
}

export function parseEventCatalogue(raw: unknown): EventCatalogue {
  if (!raw || typeof raw !== 'object') {
    throw new Error('event-types.json must contain an object');
  }
  const entries = new Map(Object.entries(raw));
  const pick = (key: (typeof CATALOGUE_KEYS)[number]): string[] => {
    const value = entries.get(key);
    if (!isStringArray(value)) {
      throw new Error(`event-types.json: "${key}" must be a list of event names`);
    }
    return value;
  };
  return {
    legacyInlineHandlers: pick('legacyInlineHandlers'),
    mouse: pick('mouse'),
    focus: pick('focus'),
    keyboard: pick('keyboard'),
    clipboard: pick('clipboard'),
    drag: pick('drag'),
    plain: pick('plain'),
    direct: pick('direct'),
    window: pick('window'),
  };
}

export function loadEventCatalogue(): EventCatalogue {
  return parseEventCatalogue(JSON.parse(readPageScript('event-types.json')));
}

/** Wraps a function-source page script into a self-invoking expression. */
export function invocation(source: string, ...args: unknown[]): string {
  const serialized = args.map((arg) => JSON.stringify(arg)).join(', ');
  return `(${source.trim()})(${serialized})`;
}

/** Page script sources paired with their call expressions, read once per process. */
export interface PageScripts {
  prelude: string;
  detectJavascriptUrls: string;
  triggerEvents: string;
  externalRequestGestures: string;
}

export function loadPageScripts(): PageScripts {
  return {
    prelude: readPageScript('prelude.js'),
    detectJavascriptUrls: invocation(readPageScript('detect-javascript-urls.js')),
    triggerEvents: invocation(readPageScript('trigger-events.js'), loadEventCatalogue()),
    externalRequestGestures: invocation(
      readPageScript('external-request-gestures.js')
    ),
  };
}
