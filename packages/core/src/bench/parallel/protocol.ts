import type { BenchCaseResult, BrowserName } from '@sinkbench/shared';

import type { Vector } from '../../corpus/types.js';
import { isErrorCode, type ErrorCode } from '../../errors/codes.js';
import type { ErrorContext } from '../../types/errors.js';

/** A contiguous slice of the vector list, `[start, end)`. */
export interface TaskRange {
  taskId: number;
  start: number;
  end: number;
}

/** Everything a worker needs to rebuild the case matrix on its side. */
export interface WorkerConfig {
  vectors: Vector[];
  sanitizers: string[];
  browsers: BrowserName[];
  timeoutMs: number | null;
  failFast: boolean;
}

/** A case result tagged with its position in sequential matrix order. */
export interface IndexedResult {
  index: number;
  result: BenchCaseResult;
}

export type ParentMessage =
  | { type: 'init'; config: WorkerConfig }
  | { type: 'task'; task: TaskRange }
  | { type: 'stop' }
  | { type: 'shutdown' };

export type WorkerMessage =
  | { type: 'request' }
  | { type: 'heartbeat'; taskId: number }
  | { type: 'result'; taskId: number; results: IndexedResult[]; hitXss: boolean }
  /** The worker cannot go on; the error travels as its code, message and context. */
  | { type: 'fatal'; errorCode: ErrorCode; message: string; context?: ErrorContext };

function hasType(value: unknown): value is { type: unknown } & Record<string, unknown> {
  return typeof value === 'object' && value !== null && 'type' in value;
}

function isTaskRange(value: unknown): value is TaskRange {
  return (
    typeof value === 'object' &&
    value !== null &&
    'taskId' in value &&
    typeof value.taskId === 'number' &&
    'start' in value &&
    typeof value.start === 'number' &&
    'end' in value &&
    typeof value.end === 'number'
  );
}

function isWorkerConfig(value: unknown): value is WorkerConfig {
  return (
    typeof value === 'object' &&
    value !== null &&
    'vectors' in value &&
    Array.isArray(value.vectors) &&
    'sanitizers' in value &&
    Array.isArray(value.sanitizers) &&
    'browsers' in value &&
    Array.isArray(value.browsers)
  );
}

/** Narrows an IPC payload arriving in a worker. */
export function isParentMessage(value: unknown): value is ParentMessage {
  if (!hasType(value)) return false;
  switch (value.type) {
    case 'init':
      return isWorkerConfig(value.config);
    case 'task':
      return isTaskRange(value.task);
    case 'stop':
    case 'shutdown':
      return true;
    default:
      return false;
  }
}

/** Narrows an IPC payload arriving in the parent. */
export function isWorkerMessage(value: unknown): value is WorkerMessage {
  if (!hasType(value)) return false;
  switch (value.type) {
    case 'request':
      return true;
    case 'heartbeat':
      return typeof value.taskId === 'number';
    case 'result':
      return typeof value.taskId === 'number' && Array.isArray(value.results);
    case 'fatal':
      return (
        isErrorCode(value.errorCode) &&
        typeof value.message === 'string' &&
        (value.context === undefined ||
          (typeof value.context === 'object' && value.context !== null))
      );
    default:
      return false;
  }
}
