import type { PayloadContext } from '@sinkbench/shared';
import { describe, test, expect, vi } from 'vitest';

import type { Vector } from '../../corpus/types.js';
import { noopSanitizer } from '../../sanitizers/noop.js';
import type { Sanitizer } from '../../sanitizers/types.js';
import { ScriptedSession, executesWhenPresent } from '../../test-utils/scripted-session.js';
import { HarnessError } from '../../types/errors.js';
import { adaptPayload, foldOutcome, runCase } from '../case.js';

function vector(overrides: Partial<Vector> = {}): Vector {
  return {
    id: 'v1',
    description: 'test vector',
    payloadHtml: '<b>x</b>',
    payloadContext: 'html',
    expectedTags: null,
    ...overrides,
  };
}

function sanitizer(overrides: Partial<Sanitizer> = {}): Sanitizer {
  return {
    name: 'test',
    description: 'test sanitizer',
    sanitize: (html) => html,
    supportedContexts: null,
    ...overrides,
  };
}

describe('adaptPayload', () => {
  test('wraps href values unless href is listed explicitly', () => {
    const href = vector({ payloadHtml: 'javascript:alert(1)', payloadContext: 'href' });
    expect(adaptPayload(href, sanitizer())).toEqual({
      sanitizerInputHtml: '<a href="javascript:alert(1)">x</a>',
      runPayloadContext: 'html',
    });
    expect(adaptPayload(href, sanitizer({ supportedContexts: new Set<PayloadContext>(['href']) }))).toEqual({
      sanitizerInputHtml: 'javascript:alert(1)',
      runPayloadContext: 'href',
    });
  });

  test('wraps onerror bodies unless onerror_attr is listed explicitly', () => {
    const body = vector({ payloadHtml: 'alert(1)', payloadContext: 'onerror_attr' });
    expect(adaptPayload(body, sanitizer())).toEqual({
      sanitizerInputHtml: '<img src="nonexistent://x" onerror="alert(1)">',
      runPayloadContext: 'html',
    });
    expect(adaptPayload(body, noopSanitizer)).toEqual({
      sanitizerInputHtml: 'alert(1)',
      runPayloadContext: 'onerror_attr',
    });
  });

  test('leaves other contexts alone', () => {
    expect(adaptPayload(vector({ payloadContext: 'js_arg', payloadHtml: '1' }), sanitizer())).toEqual(
      { sanitizerInputHtml: '1', runPayloadContext: 'js_arg' }
    );
  });
});

describe('foldOutcome', () => {
  test('execution outranks leaks, leaks outrank lossiness', () => {
    expect(foldOutcome({ executed: true, signal: 'http_leak', details: '' }, true)).toBe('xss');
    expect(foldOutcome({ executed: false, signal: 'http_leak', details: '' }, true)).toBe(
      'http_leak'
    );
    expect(foldOutcome({ executed: false, signal: 'none', details: '' }, true)).toBe('lossy');
    expect(foldOutcome({ executed: false, signal: 'none', details: '' }, false)).toBe('pass');
  });
});

describe('runCase', () => {
  test('unsupported contexts are skipped without sanitizing', async () => {
    const sanitize = vi.fn((html: string) => html);
    const session = new ScriptedSession('chromium');
    const result = await runCase({
      sanitizer: sanitizer({ name: 'only-html', sanitize, supportedContexts: new Set<PayloadContext>(['html']) }),
      browser: 'chromium',
      vector: vector({ payloadContext: 'js' }),
      session,
    });
    expect(result.outcome).toBe('skip');
    expect(result.details).toBe('Skipped: only-html does not support context js');
    expect(sanitize).not.toHaveBeenCalled();
    expect(session.inputs).toHaveLength(0);
  });

  test('a throwing sanitizer yields an error outcome', async () => {
    const session = new ScriptedSession('chromium');
    const result = await runCase({
      sanitizer: sanitizer({
        sanitize: () => {
          throw new Error('boom');
        },
      }),
      browser: 'chromium',
      vector: vector(),
      session,
    });
    expect(result.outcome).toBe('error');
    expect(result.details).toBe('Sanitizer error: boom');
    expect(result.sanitizerInputHtml).toBe('<b>x</b>');
    expect(session.inputs).toHaveLength(0);
  });

  test('a harness failure keeps the rendered document', async () => {
    const session = new ScriptedSession('webkit', () => {
      throw new HarnessError({ message: 'navigating failed: net::ERR_FAILED' });
    });
    const result = await runCase({
      sanitizer: sanitizer(),
      browser: 'webkit',
      vector: vector(),
      session,
    });
    expect(result.outcome).toBe('error');
    expect(result.details).toBe('Harness error: navigating failed: net::ERR_FAILED');
    expect(result.renderedHtml).toContain('<div id="root"><b>x</b></div>');
  });

  test('passes the raw payload, the adapted context and the inferred timeout', async () => {
    const session = new ScriptedSession('chromium');
    await runCase({
      sanitizer: sanitizer({ sanitize: (html) => html.replace(' onerror="f()"', '') }),
      browser: 'chromium',
      vector: vector({ payloadHtml: 'f()', payloadContext: 'onerror_attr' }),
      session,
    });
    expect(session.inputs).toEqual([
      {
        payloadHtml: 'f()',
        sanitizedHtml: '<img src="nonexistent://x">',
        payloadContext: 'html',
        timeoutMs: 0,
      },
    ]);
  });

  test('a fixed timeout overrides inference', async () => {
    const session = new ScriptedSession('chromium');
    await runCase({
      sanitizer: sanitizer(),
      browser: 'chromium',
      vector: vector({ payloadHtml: '<svg onload=f()>' }),
      session,
      timeoutMs: 900,
    });
    expect(session.inputs[0]?.timeoutMs).toBe(900);
  });

  test('xss and lossy are independent', async () => {
    const result = await runCase({
      sanitizer: sanitizer(),
      browser: 'chromium',
      vector: vector({ payloadHtml: '<img src=x onerror=f()>', expectedTags: [] }),
      session: new ScriptedSession('chromium', executesWhenPresent('onerror')),
    });
    expect(result.outcome).toBe('xss');
    expect(result.executed).toBe(true);
    expect(result.lossy).toBe(true);
    expect(result.lossyDetails).toBe(
      'Expected no tags after sanitization, but found: img[onerror,src]'
    );
  });

  test('a lossy case that neither executed nor leaked is reported as lossy', async () => {
    const result = await runCase({
      sanitizer: sanitizer({ sanitize: () => 'x' }),
      browser: 'chromium',
      vector: vector({ expectedTags: [{ tag: 'b', attrs: [] }] }),
      session: new ScriptedSession('chromium'),
    });
    expect(result.outcome).toBe('lossy');
    expect(result.lossyDetails).toBe(
      'Missing expected tags after sanitization: position 1: expected b, got nothing'
    );
  });
});
