import { describe, test, expect } from 'vitest';

import {
  FakePageDriver,
  type FakeBehavior,
  type FakeDocument,
  type FakePageDriverOptions,
} from '../../test-utils/fake-page-driver.js';
import { HarnessError } from '../../types/errors.js';
import { BASE_URL } from '../context.js';
import { SignalSession, type CaseInput } from '../session.js';

function when(marker: string, act: (doc: FakeDocument) => void): FakeBehavior {
  return (doc) => {
    if (doc.html.includes(marker)) act(doc);
  };
}

async function openOn(
  options: FakePageDriverOptions
): Promise<{ driver: FakePageDriver; session: SignalSession }> {
  const driver = new FakePageDriver(options);
  const session = await SignalSession.open('chromium', {
    launcher: async () => driver,
    clock: () => driver.now,
    prelude: '/* prelude */',
  });
  return { driver, session };
}

function input(sanitizedHtml: string, overrides: Partial<CaseInput> = {}): CaseInput {
  return {
    payloadHtml: sanitizedHtml,
    sanitizedHtml,
    payloadContext: 'html',
    timeoutMs: 0,
    ...overrides,
  };
}

describe('SignalSession', () => {
  test('launch installs the prelude and leaves the session idle', async () => {
    const { driver, session } = await openOn({});
    expect(driver.initScripts).toEqual(['/* prelude */']);
    expect(session.state).toBe('idle');
    await session.close();
    expect(session.state).toBe('closed');
    expect(driver.closed).toBe(true);
  });

  test('a benign document is not executed', async () => {
    const { driver, session } = await openOn({});
    const result = await session.run(input('<b>hello</b>'));
    expect(result).toEqual({
      executed: false,
      signal: 'none',
      details: 'No execution detected',
    });
    expect(driver.calls).toEqual([
      'cleanup',
      'goto',
      'findJavascriptUrls',
      'triggerEvents',
      'clickJavascriptLinks',
    ]);
  });

  test('a hook fired during load is caught before events are triggered', async () => {
    const { driver, session } = await openOn({
      behaviors: [when('<svg', (doc) => doc.callHook('alert', '1'))],
    });
    const result = await session.run(input('<svg onload=alert(1)>'));
    expect(result).toEqual({
      executed: true,
      signal: 'none',
      details: 'Executed: hook:alert:1; payload="<svg onload=alert(1)>"',
    });
    expect(driver.calls).not.toContain('triggerEvents');
  });

  test('a dialog opened by a triggered event is execution', async () => {
    const { session } = await openOn({
      behaviors: [when('onmouseover', (doc) => doc.onEvents(() => doc.openDialog('confirm', 'x')))],
    });
    const result = await session.run(input('<p onmouseover=confirm("x")>p</p>'));
    expect(result.executed).toBe(true);
    expect(result.details).toBe(
      'Executed: dialog:confirm:x; payload="<p onmouseover=confirm(\\"x\\")>p</p>"'
    );
  });

  test('delayed navigation is caught while polling', async () => {
    const { driver, session } = await openOn({
      behaviors: [
        when('later', (doc) => doc.setTimeout(() => doc.navigate('http://evil.test/'), 100)),
      ],
    });
    const result = await session.run(input('<i>later</i>', { timeoutMs: 250 }));
    expect(result.details).toBe('Executed: navigation:http://evil.test/; payload="<i>later</i>"');
    expect(driver.calls.filter((call) => call === 'wait:50')).toHaveLength(2);
  });

  test('polling ends at the deadline without a signal', async () => {
    const { driver, session } = await openOn({});
    const result = await session.run(input('<i>quiet</i>', { timeoutMs: 120 }));
    expect(result.executed).toBe(false);
    expect(driver.calls.slice(-3)).toEqual(['wait:50', 'wait:50', 'wait:20']);
  });

  test('a passive fetch is only judged in the final check outside leak contexts', async () => {
    const { session } = await openOn({
      behaviors: [when('<img', (doc) => doc.request('http://img.test/p.png', 'image'))],
    });
    const result = await session.run(input('<img src="http://img.test/p.png">'));
    expect(result).toEqual({
      executed: false,
      signal: 'http_leak',
      details:
        'External fetch: image:http://img.test/p.png; payload="<img src=\\"http://img.test/p.png\\">"',
    });
  });

  test('leak contexts run the gestures and report navigations as leaks', async () => {
    const { driver, session } = await openOn({
      behaviors: [
        when('ping', (doc) => doc.onLeakGesture(() => doc.navigate('http://leak.test/ping'))),
      ],
    });
    const result = await session.run(
      input('<a ping="http://leak.test/ping">ping</a>', { payloadContext: 'http_leak' })
    );
    expect(driver.calls).toContain('runLeakGestures');
    expect(result.signal).toBe('http_leak');
    expect(result.details.startsWith('External fetch: document:http://leak.test/ping;')).toBe(
      true
    );
  });

  test('a handler beside a passive fetch in a leak context is execution', async () => {
    const { driver, session } = await openOn({
      behaviors: [
        when('onmouseover', (doc) => {
          doc.request('http://img.test/x.png', 'image');
          doc.onEvents(() => doc.callHook('alert', '1'));
        }),
      ],
    });
    const result = await session.run(
      input('<img src="http://img.test/x.png" onmouseover=alert(1)>', {
        payloadContext: 'http_leak',
      })
    );
    expect(driver.calls).toContain('triggerEvents');
    expect(result.executed).toBe(true);
    expect(result.signal).toBe('none');
    expect(result.details.startsWith('Executed: hook:alert:1;')).toBe(true);
  });

  test('a passive fetch in a leak context is reported once events have run', async () => {
    const { driver, session } = await openOn({
      behaviors: [when('<img', (doc) => doc.request('http://img.test/x.png', 'image'))],
    });
    const result = await session.run(
      input('<img src="http://img.test/x.png">', { payloadContext: 'http_leak' })
    );
    expect(driver.calls).toEqual([
      'cleanup',
      'goto',
      'findJavascriptUrls',
      'triggerEvents',
      'clickJavascriptLinks',
      'runLeakGestures',
    ]);
    expect(result.signal).toBe('http_leak');
  });

  test('href context clicks the link and ignores the expected navigation', async () => {
    const { driver, session } = await openOn({
      behaviors: [
        (doc) => {
          doc.setAnchorHref('http://safe.test/');
          doc.onClick('#sinkbench-link', () => doc.navigate('http://safe.test/'));
        },
      ],
    });
    const result = await session.run(
      input('http://safe.test/', { payloadContext: 'href' })
    );
    expect(result.executed).toBe(false);
    expect(driver.calls).toContain('click:#sinkbench-link');
    expect(driver.calls).not.toContain('triggerEvents');
  });

  test('href context reports a javascript: click', async () => {
    const { session } = await openOn({
      behaviors: [
        when('javascript:', (doc) =>
          doc.onClick('#sinkbench-link', () => doc.callHook('alert', 'href'))
        ),
      ],
    });
    const result = await session.run(
      input('javascript:alert("href")', { payloadContext: 'href' })
    );
    expect(result.executed).toBe(true);
    expect(result.details.startsWith('Executed: hook:alert:href;')).toBe(true);
  });

  test('a goto that never settles counts as execution', async () => {
    const { session } = await openOn({
      behaviors: [when('hang', (doc) => doc.fail('goto', 'timeout'))],
    });
    const result = await session.run(input('<i>hang</i>'));
    expect(result.details).toBe('Executed: navigation:goto-timeout; payload="<i>hang</i>"');
  });

  test('a destroyed context during events counts as execution', async () => {
    const { session } = await openOn({
      behaviors: [when('boom', (doc) => doc.fail('triggerEvents', 'context-destroyed'))],
    });
    const result = await session.run(input('<i>boom</i>'));
    expect(result.details).toBe(
      'Executed: navigation:context-destroyed; payload="<i>boom</i>"'
    );
  });

  test('an unexplained page failure raises a harness error and frees the session', async () => {
    const { session } = await openOn({
      behaviors: [when('broken', (doc) => doc.fail('triggerEvents', 'failed'))],
    });
    await expect(session.run(input('<i>broken</i>'))).rejects.toThrow(HarnessError);
    await expect(session.run(input('<i>broken</i>'))).rejects.toThrow(
      'event-trigger failed: fake triggerEvents failure'
    );
    expect(session.state).toBe('idle');
  });

  test('run requires an open session', async () => {
    const session = new SignalSession('firefox', {
      launcher: async () => new FakePageDriver({ browser: 'firefox' }),
    });
    await expect(session.run(input('<b>x</b>'))).rejects.toThrow(
      'Session is not idle (state=closed)'
    );
  });

  test('only the synthetic document is served', async () => {
    const { driver, session } = await openOn({
      behaviors: [when('frame', (doc) => doc.request(`${BASE_URL}other`, 'document'))],
    });
    const result = await session.run(input('<iframe src="other">frame</iframe>'));
    expect(result.details).toBe(
      `Executed: navigation:${BASE_URL}other; payload="<iframe src=\\"other\\">frame</iframe>"`
    );
    expect(driver.calls[1]).toBe('goto');
  });
});

describe('SignalSession timer isolation', () => {
  const leakyTimer = when('evil-timer', (doc) =>
    doc.setInterval(() => doc.navigate('https://evil.example/next'), 5)
  );

  test('timers left by one case do not fire into the next', async () => {
    const { driver, session } = await openOn({ behaviors: [leakyTimer] });

    const first = await session.run(input('<i>evil-timer</i>'));
    expect(first.details.startsWith('Executed: navigation:https://evil.example/next')).toBe(
      true
    );

    const second = await session.run(input('<b>benign</b>'));
    expect(second.executed).toBe(false);
    expect(driver.pendingTimers).toBe(0);
  });

  test('without cleanup the next case is misclassified', async () => {
    const { session } = await openOn({
      behaviors: [leakyTimer],
      cleanupCancelsTimers: false,
    });
    await session.run(input('<i>evil-timer</i>'));
    const second = await session.run(input('<b>benign</b>'));
    expect(second.executed).toBe(true);
  });
});
