#!/usr/bin/env node

// CLI entry point
// - `sinkbench run` (default command) loads vector files, runs them through the
//   selected sanitizers in real browsers and prints a table on stdout.
// - `sinkbench sanitizers` lists the registered sanitizers.
// Progress and diagnostics go to stderr; exit codes are the verdict (see verdict.ts).

import { Command } from 'commander';
import fs from 'node:fs';
import { fileURLToPath } from 'node:url';
import {
  ErrorPresenter,
  effectiveWorkerCount,
  listSanitizers,
  loadVectors,
  runBench,
  runBenchParallel,
  selectVectorsById,
  toSinkbenchError,
  vectorsPerTask,
  type BenchOptions,
  type ParallelBenchOptions,
} from '@sinkbench/core';
import { quoteHtml, renderJsonReport, renderMarkdownReport, renderTextReport } from '@sinkbench/reporter';
import {
  formatCaseLabel,
  logLine,
  type BenchCaseResult,
  type BenchSummary,
} from '@sinkbench/shared';

import { resolveBenchOptions, type BenchCliOptions } from './flags.js';
import { resolveJsonOutPath, writeReportFile } from './output.js';
import { ProgressReporter } from './progress.js';
import { renderCLIView } from './render.js';
import { EXIT_XSS, exitCodeFor } from './verdict.js';

const FAIL_FAST_HTML_LIMIT = 2000;

export interface RunDependencies {
  runBench: (options: BenchOptions) => Promise<BenchSummary>;
  runBenchParallel: (options: ParallelBenchOptions) => Promise<BenchSummary>;
  cwd: string;
  clock: () => number;
}

function printFailFast(hit: BenchCaseResult): void {
  logLine(`FAIL-FAST: ${formatCaseLabel(hit)}: ${hit.details}`);
  if (hit.sanitizedHtml) {
    logLine(`sanitized=${quoteHtml(hit.sanitizedHtml, FAIL_FAST_HTML_LIMIT)}`);
  }
  if (hit.sanitizerInputHtml) {
    logLine(`input=${quoteHtml(hit.sanitizerInputHtml, FAIL_FAST_HTML_LIMIT)}`);
  }
}

/** Runs the benchmark and returns the process exit code. */
export async function runCommand(
  options: BenchCliOptions,
  deps: Partial<RunDependencies> = {}
): Promise<number> {
  const resolved = resolveBenchOptions(options, deps.cwd ?? process.cwd());
  const loaded = loadVectors(resolved.vectorPaths);
  const vectors = resolved.ids.length > 0 ? selectVectorsById(loaded, resolved.ids) : loaded;
  const progress =
    resolved.progressEvery > 0
      ? new ProgressReporter({ every: resolved.progressEvery, clock: deps.clock })
      : undefined;

  const benchOptions: BenchOptions = {
    vectors,
    sanitizers: resolved.sanitizers,
    browsers: resolved.browsers,
    timeoutMs: resolved.timeoutMs,
    failFast: resolved.failFast,
    onProgress: progress?.onCase,
  };

  let summary: BenchSummary;
  if (resolved.workers > 1) {
    const casesPerVector = resolved.sanitizers.length * resolved.browsers.length;
    progress?.starting(
      vectors.length * casesPerVector,
      effectiveWorkerCount(resolved.workers, vectors.length),
      vectorsPerTask({
        progressEvery: resolved.progressEvery,
        casesPerVector,
        timeoutMs: resolved.timeoutMs,
      }),
      casesPerVector
    );
    summary = await (deps.runBenchParallel ?? runBenchParallel)({
      ...benchOptions,
      workers: resolved.workers,
      stallTimeoutS: resolved.stallTimeoutS,
      progressEvery: resolved.progressEvery,
    });
  } else {
    summary = await (deps.runBench ?? runBench)(benchOptions);
  }

  if (resolved.failFast) {
    const hit = summary.results.find((result) => result.outcome === 'xss');
    if (hit) {
      printFailFast(hit);
      return EXIT_XSS;
    }
  }

  process.stdout.write(renderTextReport(summary));

  if (resolved.jsonOut) {
    const file = resolveJsonOutPath(resolved.jsonOut);
    writeReportFile(file, renderJsonReport(summary));
    logLine(`wrote ${file}`);
  }
  if (resolved.markdownOut) {
    writeReportFile(resolved.markdownOut, renderMarkdownReport(summary));
    logLine(`wrote ${resolved.markdownOut}`);
  }

  return exitCodeFor(summary);
}

export function renderSanitizerList(): string {
  return listSanitizers()
    .sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0))
    .map((sanitizer) => `${sanitizer.name}: ${sanitizer.description}\n`)
    .join('');
}

const program = new Command();

program
  .name('sinkbench')
  .description('Run XSS vectors through HTML sanitizers in real browsers')
  .version('0.1.0');

program
  .command('run', { isDefault: true })
  .description('Run the benchmark and print a summary table')
  .option('--vectors <paths...>', 'Vector JSON files (default: vectors/*.json)')
  .option('--sanitizers <names...>', 'Sanitizer names, space or comma separated (default: noop, dompurify)')
  .option('--browser <name>', 'chromium|firefox|webkit|all', 'chromium')
  .option('--timeout-ms <n>', 'Fixed post-trigger wait per case (default: adaptive)')
  .option('--workers <n>', 'Worker processes; 1 runs sequentially', '1')
  .option(
    '--worker-stall-timeout-s <n>',
    'Parallel mode: seconds without progress before pending work becomes errors (0 disables)',
    '3600'
  )
  .option('--fail-fast', 'Stop at the first xss and print it', false)
  .option('--json-out <path>', 'Write full results as JSON (a directory gets results.json)')
  .option('--markdown-out <file>', 'Write a Markdown report')
  .option('--progress-every <n>', 'Progress line every N cases; 1 prints one mark per case; 0 disables', '25')
  .option('--no-progress', 'Disable progress output')
  .option('--ids <ids...>', 'Only run these vector ids, space or comma separated')
  .action(async (options: BenchCliOptions) => {
    try {
      process.exitCode = await runCommand(options);
    } catch (err) {
      await handleCliError(err);
    }
  });

program
  .command('sanitizers')
  .description('List the registered sanitizers')
  .action(() => {
    process.stdout.write(renderSanitizerList());
  });

async function handleCliError(err: unknown): Promise<never> {
  const env = process.env.NODE_ENV === 'production' ? 'prod' : 'dev';
  const presenter = new ErrorPresenter(env, { colors: true });

  const error = toSinkbenchError(err);
  const view = presenter.formatForCLI(error);
  console.error(renderCLIView(view));

  process.exit(error.getExitCode());
}

export async function main(argv: string[] = process.argv): Promise<void> {
  await program.parseAsync(argv).catch(handleCliError);
}

export { program };

const entryFile =
  typeof process.argv[1] === 'string' ? fs.realpathSync(process.argv[1]) : '';
const moduleFile = fileURLToPath(import.meta.url);
const isDirectExecution = entryFile === moduleFile;

if (isDirectExecution) {
  await main();
}
