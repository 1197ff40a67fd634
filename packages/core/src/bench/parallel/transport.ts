import { fork } from 'node:child_process';
import { dirname, extname, join } from 'node:path';
import { fileURLToPath } from 'node:url';

import { describeError, logLine } from '@sinkbench/shared';

import { isWorkerMessage, type ParentMessage, type WorkerMessage } from './protocol.js';

/** Parent-side view of one worker process. */
export interface WorkerHandle {
  readonly id: number;
  send(message: ParentMessage): void;
  onMessage(listener: (message: WorkerMessage) => void): void;
  onExit(listener: (code: number | null, signal: string | null) => void): void;
  kill(): void;
}

export type WorkerSpawner = (id: number) => WorkerHandle;

/** Worker-side view of the channel to the parent. */
export interface WorkerPort {
  send(message: WorkerMessage): void;
  onMessage(listener: (message: ParentMessage) => void): void;
  close(): void;
}

/** The worker entry beside this module, `.ts` when running from sources. */
export function defaultWorkerEntry(): string {
  const here = fileURLToPath(import.meta.url);
  return join(dirname(here), `worker-entry${extname(here)}`);
}

/** Forks real worker processes over Node IPC. */
export function forkSpawner(entry: string = defaultWorkerEntry()): WorkerSpawner {
  const execArgv = entry.endsWith('.ts')
    ? [...process.execArgv, '--import', 'tsx']
    : [...process.execArgv];

  return (id) => {
    const child = fork(entry, [], {
      execArgv,
      serialization: 'advanced',
      stdio: ['ignore', 'inherit', 'inherit', 'ipc'],
    });
    child.on('error', (error) => {
      logLine(`worker ${id}: ${describeError(error)}`);
    });
    return {
      id,
      send: (message) => {
        if (child.connected) child.send(message);
      },
      onMessage: (listener) => {
        child.on('message', (raw: unknown) => {
          if (isWorkerMessage(raw)) listener(raw);
        });
      },
      onExit: (listener) => {
        child.on('exit', (code, signal) => listener(code, signal));
      },
      kill: () => {
        child.kill('SIGKILL');
      },
    };
  };
}
