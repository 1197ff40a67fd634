import type { ParentMessage, TaskRange, WorkerMessage } from '../bench/parallel/protocol.js';
import type { WorkerHandle, WorkerPort, WorkerSpawner } from '../bench/parallel/transport.js';
import { BenchWorker, type BenchWorkerOptions } from '../bench/parallel/worker.js';

/** What a fake worker does with a task: run it, swallow it, or exit with the given code. */
export type TaskAction = 'run' | 'hang' | number;

export interface InProcessSpawnerOptions extends BenchWorkerOptions {
  taskHook?: (workerId: number, task: TaskRange) => TaskAction;
  /** Ignore `shutdown` so that teardown has to kill. */
  dropShutdown?: boolean;
}

export interface InProcessWorkerRecord {
  id: number;
  received: ParentMessage[];
  exit: { code: number | null; signal: string | null } | null;
  killed: boolean;
}

/**
 * Runs BenchWorker instances inside the test process. Messages hop through
 * setImmediate in both directions, as they would over IPC.
 */
export class InProcessSpawner {
  readonly workers: InProcessWorkerRecord[] = [];
  readonly #options: InProcessSpawnerOptions;

  constructor(options: InProcessSpawnerOptions = {}) {
    this.#options = options;
  }

  readonly spawn: WorkerSpawner = (id) => {
    const options = this.#options;
    const record: InProcessWorkerRecord = { id, received: [], exit: null, killed: false };
    this.workers.push(record);

    const toParent: Array<(message: WorkerMessage) => void> = [];
    const toWorker: Array<(message: ParentMessage) => void> = [];
    const exitListeners: Array<(code: number | null, signal: string | null) => void> = [];

    const exit = (code: number | null, signal: string | null): void => {
      if (record.exit) return;
      record.exit = { code, signal };
      setImmediate(() => {
        for (const listener of exitListeners) listener(code, signal);
      });
    };

    const port: WorkerPort = {
      send: (message) => {
        setImmediate(() => {
          if (record.exit) return;
          for (const listener of toParent) listener(message);
        });
      },
      onMessage: (listener) => {
        toWorker.push(listener);
      },
      close: () => exit(0, null),
    };
    new BenchWorker(port, options).start();

    const deliver = (message: ParentMessage): void => {
      if (record.exit) return;
      record.received.push(message);
      if (message.type === 'shutdown' && options.dropShutdown) return;
      if (message.type === 'task' && options.taskHook) {
        const action = options.taskHook(id, message.task);
        if (action === 'hang') return;
        if (typeof action === 'number') {
          exit(action, null);
          return;
        }
      }
      for (const listener of toWorker) listener(message);
    };

    const handle: WorkerHandle = {
      id,
      send: (message) => {
        setImmediate(() => deliver(message));
      },
      onMessage: (listener) => {
        toParent.push(listener);
      },
      onExit: (listener) => {
        exitListeners.push(listener);
      },
      kill: () => {
        record.killed = true;
        exit(null, 'SIGKILL');
      },
    };
    return handle;
  };
}
