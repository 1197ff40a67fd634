import {
  logLine,
  type BenchCaseResult,
  type BenchSummary,
  type BrowserName,
} from '@sinkbench/shared';

import { supportsContext } from '../../sanitizers/types.js';
import {
  errorFromCode,
  stallTimeoutMessage,
  workerCrashMessage,
  type SinkbenchError,
} from '../../types/errors.js';
import { errorResult, skippedResult } from '../case.js';
import { DEFAULT_BROWSERS, plannedCaseCount, type BenchOptions } from '../orchestrator.js';
import { summarizeResults } from '../summary.js';
import { caseIndex, planTasks, vectorsPerTask } from './batching.js';
import type { IndexedResult, TaskRange, WorkerConfig, WorkerMessage } from './protocol.js';
import { BoundedTaskQueue } from './task-queue.js';
import { forkSpawner, type WorkerHandle, type WorkerSpawner } from './transport.js';

export const DEFAULT_STALL_TIMEOUT_S = 3600;
export const DEFAULT_TEARDOWN_GRACE_MS = 2000;
/** Queue slots per worker. */
export const QUEUE_DEPTH_PER_WORKER = 4;

export interface ParallelBenchOptions extends Omit<BenchOptions, 'openSession'> {
  workers: number;
  /** Seconds without a heartbeat or result before remaining work is abandoned; 0 disables. */
  stallTimeoutS?: number;
  /** Cases per progress line; also sizes the tasks handed to workers. */
  progressEvery?: number;
  spawner?: WorkerSpawner;
  teardownGraceMs?: number;
}

interface WorkerSlot {
  handle: WorkerHandle;
  alive: boolean;
  /** Reported `fatal`; no further work goes to it. */
  failed: boolean;
  exited: Promise<void>;
}

interface InFlight {
  task: TaskRange;
  workerId: number;
}

type RunState = 'running' | 'finishing';

/** Worker count actually spawned: never more workers than vectors. */
export function effectiveWorkerCount(workers: number, vectorCount: number): number {
  return Math.max(1, Math.min(Math.floor(workers), vectorCount));
}

/**
 * Parallel mode. Vector ranges are pulled by forked workers; results come
 * back tagged with their sequential index and are reordered before summary.
 */
export async function runBenchParallel(options: ParallelBenchOptions): Promise<BenchSummary> {
  if (options.vectors.length === 0 || options.sanitizers.length === 0) {
    return summarizeResults([]);
  }
  const run = new ParallelRun(options);
  const indexed = await run.execute();
  return summarizeResults(orderResults(indexed, options.failFast ?? false));
}

/** Sequential order; with fail-fast, everything after the first `xss` is dropped. */
export function orderResults(
  indexed: readonly IndexedResult[],
  failFast: boolean
): BenchCaseResult[] {
  const ordered = [...indexed].sort((a, b) => a.index - b.index).map((entry) => entry.result);
  if (!failFast) return ordered;
  const hit = ordered.findIndex((result) => result.outcome === 'xss');
  return hit === -1 ? ordered : ordered.slice(0, hit + 1);
}

class ParallelRun {
  readonly #options: ParallelBenchOptions;
  readonly #browsers: readonly BrowserName[];
  readonly #total: number;
  readonly #queue: BoundedTaskQueue;
  readonly #inFlight = new Map<number, InFlight>();
  readonly #slots = new Map<number, WorkerSlot>();
  readonly #collected: IndexedResult[] = [];
  readonly #controller = new AbortController();
  readonly #workerCount: number;

  #state: RunState = 'running';
  #failure: SinkbenchError | null = null;
  #lastProgress = Date.now();
  #watchdog: ReturnType<typeof setInterval> | undefined;
  #settle: () => void = () => undefined;

  constructor(options: ParallelBenchOptions) {
    this.#options = options;
    this.#browsers = options.browsers ?? DEFAULT_BROWSERS;
    this.#total = plannedCaseCount(options);
    this.#workerCount = effectiveWorkerCount(options.workers, options.vectors.length);

    const perTask = vectorsPerTask({
      progressEvery: options.progressEvery ?? 0,
      casesPerVector: options.sanitizers.length * this.#browsers.length,
      timeoutMs: options.timeoutMs,
    });
    this.#queue = new BoundedTaskQueue(
      planTasks(options.vectors.length, perTask),
      this.#workerCount * QUEUE_DEPTH_PER_WORKER
    );
  }

  async execute(): Promise<IndexedResult[]> {
    const finished = new Promise<void>((resolve) => {
      this.#settle = resolve;
    });

    this.#controller.signal.addEventListener('abort', () => this.#stopWorkers(), { once: true });
    this.#linkExternalSignal();
    if (this.#state === 'running') {
      this.#spawnWorkers();
      this.#startWatchdog();
    }

    await finished;
    await this.#teardown();

    if (this.#failure) throw this.#failure;
    return this.#collected;
  }

  #linkExternalSignal(): void {
    const external = this.#options.signal;
    if (!external) return;
    if (external.aborted) {
      this.#finish();
      return;
    }
    external.addEventListener('abort', () => this.#finish(), { once: true });
  }

  #spawnWorkers(): void {
    const spawner = this.#options.spawner ?? forkSpawner();
    const config: WorkerConfig = {
      vectors: [...this.#options.vectors],
      sanitizers: this.#options.sanitizers.map((sanitizer) => sanitizer.name),
      browsers: [...this.#browsers],
      timeoutMs: this.#options.timeoutMs ?? null,
      failFast: this.#options.failFast ?? false,
    };

    for (let id = 0; id < this.#workerCount; id += 1) {
      const handle = spawner(id);
      let markExited: () => void = () => undefined;
      const slot: WorkerSlot = {
        handle,
        alive: true,
        failed: false,
        exited: new Promise<void>((resolve) => {
          markExited = resolve;
        }),
      };
      this.#slots.set(id, slot);
      handle.onMessage((message) => this.#receive(id, message));
      handle.onExit((code, signal) => {
        slot.alive = false;
        markExited();
        this.#workerExited(id, code, signal);
      });
      handle.send({ type: 'init', config });
    }
    logLine(`started ${this.#workerCount} worker(s)`);
  }

  #startWatchdog(): void {
    const stallS = this.#options.stallTimeoutS ?? DEFAULT_STALL_TIMEOUT_S;
    if (stallS <= 0) return;
    const stallMs = stallS * 1000;
    this.#watchdog = setInterval(
      () => {
        if (this.#state !== 'running') return;
        if (Date.now() - this.#lastProgress <= stallMs) return;
        logLine(`no completed chunks for ${stallS}s; marking remaining work as errors`);
        this.#abandon(stallTimeoutMessage(stallS));
      },
      Math.min(1000, stallMs / 2)
    );
  }

  #receive(workerId: number, message: WorkerMessage): void {
    if (this.#state !== 'running') return;
    switch (message.type) {
      case 'request':
        this.#dispatch(workerId);
        return;
      case 'heartbeat':
        this.#lastProgress = Date.now();
        return;
      case 'result':
        this.#lastProgress = Date.now();
        this.#inFlight.delete(message.taskId);
        for (const entry of message.results) this.#record(entry);
        if (this.#options.failFast && message.hitXss) {
          this.#finish();
          return;
        }
        this.#finishIfComplete();
        return;
      case 'fatal':
        this.#workerFailed(workerId, message);
        return;
    }
  }

  #dispatch(workerId: number): void {
    const slot = this.#slots.get(workerId);
    if (!slot) return;
    const task = this.#queue.take();
    if (!task) return;
    this.#inFlight.set(task.taskId, { task, workerId });
    slot.handle.send({ type: 'task', task });
  }

  /**
   * A worker that cannot go on is retired and its in-flight work becomes
   * errors; the others keep pulling tasks. The run fails outright only when
   * every worker failed before any result came back.
   */
  #workerFailed(workerId: number, fatal: Extract<WorkerMessage, { type: 'fatal' }>): void {
    const slot = this.#slots.get(workerId);
    if (!slot || slot.failed) return;
    slot.failed = true;
    if (slot.alive) slot.handle.send({ type: 'shutdown' });

    const error = errorFromCode(fatal.errorCode, {
      message: fatal.message,
      context: { ...fatal.context, phase: `worker ${workerId}` },
    });
    const slots = [...this.#slots.values()];
    if (this.#collected.length === 0 && slots.every((entry) => entry.failed)) {
      this.#failure = error;
      this.#finish();
      return;
    }

    logLine(
      `worker ${workerId} failed (${error.errorCode}: ${error.message}); continuing without it`
    );
    const held = this.#takeInFlight((entry) => entry.workerId === workerId);
    this.#failRanges(held, error.message);
    if (!slots.some((entry) => entry.alive && !entry.failed)) {
      this.#abandon(error.message);
      return;
    }
    this.#finishIfComplete();
  }

  #record(entry: IndexedResult): void {
    this.#collected.push(entry);
    this.#options.onProgress?.(this.#collected.length, this.#total, entry.result);
  }

  #workerExited(workerId: number, code: number | null, signal: string | null): void {
    if (this.#state !== 'running') return;
    const holdsWork = [...this.#inFlight.values()].some((entry) => entry.workerId === workerId);
    const noneLeft = [...this.#slots.values()].every((slot) => !slot.alive || slot.failed);
    if (code === 0 && !holdsWork && !noneLeft) return;

    logLine(`worker ${workerId} exited (${code ?? signal}); marking remaining work as errors`);
    this.#abandon(workerCrashMessage(code, signal));
  }

  /** Every range not yet reported becomes error results carrying `details`. */
  #abandon(details: string): void {
    this.#failRanges([...this.#takeInFlight(() => true), ...this.#queue.drain()], details);
    this.#finish();
  }

  #takeInFlight(predicate: (entry: InFlight) => boolean): TaskRange[] {
    const taken: TaskRange[] = [];
    for (const [taskId, entry] of this.#inFlight) {
      if (!predicate(entry)) continue;
      this.#inFlight.delete(taskId);
      taken.push(entry.task);
    }
    return taken;
  }

  #failRanges(ranges: TaskRange[], details: string): void {
    ranges.sort((a, b) => a.start - b.start);
    const { vectors, sanitizers } = this.#options;
    const shape = { vectors: vectors.length, sanitizers: sanitizers.length };
    for (const [browserIndex, browser] of this.#browsers.entries()) {
      for (const [sanitizerIndex, sanitizer] of sanitizers.entries()) {
        for (const range of ranges) {
          for (let vectorIndex = range.start; vectorIndex < range.end; vectorIndex += 1) {
            const vector = vectors[vectorIndex];
            if (!vector) continue;
            const identity = { sanitizer, browser, vector };
            this.#record({
              index: caseIndex(shape, browserIndex, sanitizerIndex, vectorIndex),
              result: supportsContext(sanitizer, vector.payloadContext)
                ? errorResult(identity, details)
                : skippedResult(identity),
            });
          }
        }
      }
    }
  }

  #finishIfComplete(): void {
    if (this.#queue.isEmpty && this.#inFlight.size === 0) this.#finish();
  }

  #finish(): void {
    if (this.#state !== 'running') return;
    this.#state = 'finishing';
    if (this.#watchdog) clearInterval(this.#watchdog);
    this.#controller.abort();
    this.#settle();
  }

  #stopWorkers(): void {
    for (const slot of this.#slots.values()) {
      if (slot.alive) slot.handle.send({ type: 'stop' });
    }
  }

  async #teardown(): Promise<void> {
    const live = [...this.#slots.values()].filter((slot) => slot.alive);
    if (live.length === 0) return;
    for (const slot of live) slot.handle.send({ type: 'shutdown' });

    let timer: ReturnType<typeof setTimeout> | undefined;
    const grace = new Promise<void>((resolve) => {
      timer = setTimeout(resolve, this.#options.teardownGraceMs ?? DEFAULT_TEARDOWN_GRACE_MS);
    });
    await Promise.race([Promise.all(live.map((slot) => slot.exited)), grace]);
    clearTimeout(timer);

    for (const slot of live) {
      if (!slot.alive) continue;
      logLine(`worker ${slot.handle.id} did not shut down; killing it`);
      slot.handle.kill();
    }
  }
}
