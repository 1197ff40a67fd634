import type { TaskRange } from './protocol.js';

/** Work a single task aims for when per-case timeouts are long. */
export const TARGET_TASK_MS = 2000;

/** Rough fixed cost of one case on top of its wait window. */
export const CASE_OVERHEAD_MS = 50;

export interface BatchSizing {
  progressEvery: number;
  /** sanitizers × browsers */
  casesPerVector: number;
  timeoutMs?: number;
}

/**
 * One task should yield roughly one progress line; with long per-case
 * timeouts it shrinks so a single task stays near TARGET_TASK_MS.
 */
export function vectorsPerTask({ progressEvery, casesPerVector, timeoutMs }: BatchSizing): number {
  const cases = Math.max(1, casesPerVector);
  let size = progressEvery > 0 ? Math.max(1, Math.ceil(progressEvery / cases)) : 1;
  if (timeoutMs !== undefined && timeoutMs > 0) {
    const perVectorMs = cases * (timeoutMs + CASE_OVERHEAD_MS);
    size = Math.min(size, Math.max(1, Math.floor(TARGET_TASK_MS / perVectorMs)));
  }
  return size;
}

export function planTasks(vectorCount: number, perTask: number): TaskRange[] {
  const tasks: TaskRange[] = [];
  const step = Math.max(1, perTask);
  for (let start = 0; start < vectorCount; start += step) {
    tasks.push({ taskId: tasks.length, start, end: Math.min(vectorCount, start + step) });
  }
  return tasks;
}

export interface MatrixShape {
  vectors: number;
  sanitizers: number;
}

/** Position of a case in sequential browser → sanitizer → vector order. */
export function caseIndex(
  shape: MatrixShape,
  browserIndex: number,
  sanitizerIndex: number,
  vectorIndex: number
): number {
  return (browserIndex * shape.sanitizers + sanitizerIndex) * shape.vectors + vectorIndex;
}
