import type { TaskRange } from './protocol.js';

/**
 * Bounded hand-off between planning and dispatch. Feeding never blocks:
 * whatever does not fit stays deferred until a slot frees up.
 */
export class BoundedTaskQueue {
  readonly capacity: number;
  readonly #queued: TaskRange[] = [];
  readonly #deferred: TaskRange[];

  constructor(tasks: readonly TaskRange[], capacity: number) {
    this.capacity = Math.max(1, capacity);
    this.#deferred = [...tasks];
    this.feed();
  }

  get queued(): number {
    return this.#queued.length;
  }

  get deferred(): number {
    return this.#deferred.length;
  }

  get isEmpty(): boolean {
    return this.#queued.length === 0 && this.#deferred.length === 0;
  }

  /** Moves deferred tasks into the queue until it is full. */
  feed(): void {
    while (this.#queued.length < this.capacity) {
      const next = this.#deferred.shift();
      if (!next) return;
      this.#queued.push(next);
    }
  }

  take(): TaskRange | undefined {
    const task = this.#queued.shift();
    this.feed();
    return task;
  }

  /** Empties both stages and returns what was left, queued first. */
  drain(): TaskRange[] {
    const rest = [...this.#queued, ...this.#deferred];
    this.#queued.length = 0;
    this.#deferred.length = 0;
    return rest;
  }
}
