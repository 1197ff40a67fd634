import { formatCaseLabel, logLine, type BenchCaseResult } from '@sinkbench/shared';

export interface ProgressReporterOptions {
  /** Report every N cases; 1 switches to one character per case. */
  every: number;
  clock?: () => number;
}

function caseMark(result: BenchCaseResult): string {
  if (result.outcome === 'error') return 'E';
  if (result.outcome === 'lossy') return 'L';
  if (result.executed) return 'X';
  return '.';
}

/** Stderr progress for both orchestrators. */
export class ProgressReporter {
  readonly #every: number;
  readonly #clock: () => number;
  readonly #started: number;
  #xss = 0;
  #errors = 0;

  constructor(options: ProgressReporterOptions) {
    this.#every = options.every;
    this.#clock = options.clock ?? Date.now;
    this.#started = this.#clock();
  }

  #elapsed(): string {
    return `${((this.#clock() - this.#started) / 1000).toFixed(1)}s`;
  }

  starting(total: number, workers: number, vectorsPerTask: number, casesPerVector: number): void {
    logLine(
      `[0/${total}] starting ${workers} workers (vectors_per_task=${vectorsPerTask}, cases_per_vector=${casesPerVector})`
    );
  }

  readonly onCase = (done: number, total: number, result: BenchCaseResult): void => {
    if (result.outcome === 'error') this.#errors += 1;
    else if (result.executed) this.#xss += 1;

    if (this.#every === 1) {
      process.stderr.write(done === total ? `${caseMark(result)}\n` : caseMark(result));
      return;
    }
    if (done !== 1 && done !== total && done % this.#every !== 0) return;
    logLine(
      `[${done}/${total}] ${this.#elapsed()}  xss=${this.#xss}  errors=${this.#errors}  ${formatCaseLabel(result)}`
    );
  };
}
