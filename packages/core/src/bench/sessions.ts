import {
  describeError,
  logLine,
  type BenchCaseResult,
  type BrowserName,
} from '@sinkbench/shared';

import type { CaseSession } from '../harness/session.js';
import { supportsContext } from '../sanitizers/types.js';
import { BrowserLaunchError } from '../types/errors.js';
import {
  harnessErrorResult,
  runCase,
  skippedResult,
  type CaseIdentity,
} from './case.js';

export type SessionProvider = (browser: BrowserName) => Promise<CaseSession>;

export type LaunchOutcome =
  | { browser: BrowserName; session: CaseSession }
  | { browser: BrowserName; error: unknown };

/** Opens one session per browser, in order; a failure is recorded, not thrown. */
export async function launchSessions(
  browsers: readonly BrowserName[],
  openSession: SessionProvider
): Promise<LaunchOutcome[]> {
  const outcomes: LaunchOutcome[] = [];
  for (const browser of browsers) {
    try {
      outcomes.push({ browser, session: await openSession(browser) });
    } catch (error) {
      logLine(`failed to launch ${browser}: ${describeError(error)}`);
      outcomes.push({ browser, error });
    }
  }
  return outcomes;
}

/** Throws when not a single browser came up. */
export function assertAnyLaunched(outcomes: readonly LaunchOutcome[]): void {
  if (outcomes.length === 0 || outcomes.some((outcome) => 'session' in outcome)) return;
  const [first] = outcomes;
  throw new BrowserLaunchError({
    message: `No browser could be launched (${outcomes.map((o) => o.browser).join(', ')})`,
    context: { browser: outcomes.map((o) => o.browser).join(',') },
    cause: first && 'error' in first ? first.error : undefined,
  });
}

export async function closeSessions(outcomes: readonly LaunchOutcome[]): Promise<void> {
  for (const outcome of outcomes) {
    if (!('session' in outcome)) continue;
    try {
      await outcome.session.close();
    } catch (error) {
      logLine(`failed to close ${outcome.browser}: ${describeError(error)}`);
    }
  }
}

/** Runs a case on a launched browser, or accounts for it when the launch failed. */
export function runCaseOn(
  outcome: LaunchOutcome,
  identity: CaseIdentity,
  timeoutMs: number | undefined
): Promise<BenchCaseResult> {
  if ('session' in outcome) {
    return runCase({ ...identity, session: outcome.session, timeoutMs });
  }
  if (!supportsContext(identity.sanitizer, identity.vector.payloadContext)) {
    return Promise.resolve(skippedResult(identity));
  }
  return Promise.resolve(
    harnessErrorResult(
      identity,
      `${outcome.browser} failed to launch: ${describeError(outcome.error)}`
    )
  );
}
