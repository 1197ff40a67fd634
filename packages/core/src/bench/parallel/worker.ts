import type { BrowserName } from '@sinkbench/shared';

import { ErrorCode } from '../../errors/codes.js';

import { getSanitizer } from '../../sanitizers/registry.js';
import type { Sanitizer } from '../../sanitizers/types.js';
import { toSinkbenchError } from '../../types/errors.js';
import { defaultSessionProvider } from '../orchestrator.js';
import {
  closeSessions,
  launchSessions,
  runCaseOn,
  type LaunchOutcome,
  type SessionProvider,
} from '../sessions.js';
import { caseIndex } from './batching.js';
import type { IndexedResult, ParentMessage, TaskRange, WorkerConfig } from './protocol.js';
import type { WorkerPort } from './transport.js';

export interface BenchWorkerOptions {
  openSession?: SessionProvider;
  resolveSanitizer?: (name: string) => Sanitizer;
}

interface Prepared {
  config: WorkerConfig;
  sanitizers: Sanitizer[];
  sessions: LaunchOutcome[];
}

/**
 * Worker side of the parallel pool: one session per browser, tasks run one
 * at a time as they arrive. `stop` is honoured between cases.
 */
export class BenchWorker {
  readonly #port: WorkerPort;
  readonly #options: BenchWorkerOptions;
  #prepared: Prepared | null = null;
  #stopped = false;
  #work: Promise<void> = Promise.resolve();

  constructor(port: WorkerPort, options: BenchWorkerOptions = {}) {
    this.#port = port;
    this.#options = options;
  }

  start(): void {
    this.#port.onMessage((message) => this.#receive(message));
  }

  #receive(message: ParentMessage): void {
    switch (message.type) {
      case 'init':
        this.#enqueue(() => this.#init(message.config));
        return;
      case 'task':
        this.#enqueue(() => this.#runTask(message.task));
        return;
      case 'stop':
        this.#stopped = true;
        return;
      case 'shutdown':
        this.#stopped = true;
        this.#enqueue(() => this.#shutdown());
        return;
    }
  }

  #enqueue(job: () => Promise<void>): void {
    this.#work = this.#work.then(job).catch((error: unknown) => {
      const failure = toSinkbenchError(error);
      this.#port.send({
        type: 'fatal',
        errorCode: failure.errorCode,
        message: failure.message,
        context: failure.context,
      });
    });
  }

  async #init(config: WorkerConfig): Promise<void> {
    const resolve = this.#options.resolveSanitizer ?? getSanitizer;
    const sanitizers = config.sanitizers.map(resolve);
    const sessions = await launchSessions(
      config.browsers,
      this.#options.openSession ?? defaultSessionProvider
    );
    this.#prepared = { config, sanitizers, sessions };
    if (!sessions.some((outcome) => 'session' in outcome)) {
      this.#port.send({
        type: 'fatal',
        errorCode: ErrorCode.BROWSER_LAUNCH_FAILED,
        message: `No browser could be launched (${config.browsers.join(', ')})`,
        context: { phase: 'worker-init', browser: config.browsers.join(',') },
      });
      return;
    }
    this.#port.send({ type: 'request' });
  }

  async #runTask(task: TaskRange): Promise<void> {
    const prepared = this.#prepared;
    if (!prepared) throw new Error('task received before init');
    const { config, sanitizers, sessions } = prepared;
    const shape = { vectors: config.vectors.length, sanitizers: sanitizers.length };
    const results: IndexedResult[] = [];
    let hitXss = false;

    matrix: for (const [browserIndex, outcome] of sessions.entries()) {
      for (const [sanitizerIndex, sanitizer] of sanitizers.entries()) {
        for (let vectorIndex = task.start; vectorIndex < task.end; vectorIndex += 1) {
          const vector = config.vectors[vectorIndex];
          if (this.#stopped || !vector) break matrix;
          const browser: BrowserName = outcome.browser;
          const result = await runCaseOn(
            outcome,
            { sanitizer, browser, vector },
            config.timeoutMs ?? undefined
          );
          results.push({
            index: caseIndex(shape, browserIndex, sanitizerIndex, vectorIndex),
            result,
          });
          this.#port.send({ type: 'heartbeat', taskId: task.taskId });
          if (config.failFast && result.outcome === 'xss') {
            hitXss = true;
            break matrix;
          }
        }
      }
    }

    this.#port.send({ type: 'result', taskId: task.taskId, results, hitXss });
    if (!this.#stopped) this.#port.send({ type: 'request' });
  }

  async #shutdown(): Promise<void> {
    const sessions = this.#prepared?.sessions ?? [];
    this.#prepared = null;
    await closeSessions(sessions);
    this.#port.close();
  }
}
