import { existsSync, mkdirSync, mkdtempSync, readFileSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import path from 'node:path';

import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import {
  CorpusError,
  summarizeResults,
  type BenchOptions,
  type ParallelBenchOptions,
} from '@sinkbench/core';
import { renderTextReport } from '@sinkbench/reporter';
import type { BenchCaseResult, BenchSummary } from '@sinkbench/shared';

import { renderSanitizerList, runCommand } from './index.js';
import { caseResult } from './test-utils/results.js';

const VECTORS = [
  { id: 'one', description: 'first', payload_html: '<b>x</b>' },
  { id: 'two', description: 'second', payload_html: '<i>y</i>' },
];

function fakeRunner(
  outcome: (vectorId: string) => Partial<BenchCaseResult> = () => ({})
): (options: BenchOptions) => Promise<BenchSummary> {
  return async (options) =>
    summarizeResults(
      options.vectors.map((vector) =>
        caseResult({ vectorId: vector.id, ...outcome(vector.id) })
      )
    );
}

describe('runCommand', () => {
  let dir: string;
  let stdout: string[];
  let stderr: string[];

  beforeEach(() => {
    dir = mkdtempSync(path.join(tmpdir(), 'sinkbench-cli-'));
    mkdirSync(path.join(dir, 'vectors'));
    writeFileSync(path.join(dir, 'vectors', 'sample.json'), JSON.stringify(VECTORS));
    stdout = [];
    stderr = [];
    vi.spyOn(process.stdout, 'write').mockImplementation((chunk) => {
      stdout.push(String(chunk));
      return true;
    });
    vi.spyOn(process.stderr, 'write').mockImplementation((chunk) => {
      stderr.push(String(chunk));
      return true;
    });
  });

  afterEach(() => {
    vi.restoreAllMocks();
    rmSync(dir, { recursive: true, force: true });
  });

  it('runs the default vectors sequentially and prints the text report', async () => {
    const runBench = vi.fn(fakeRunner());
    const runBenchParallel = vi.fn(async (_options: ParallelBenchOptions) => summarizeResults([]));

    const code = await runCommand({ progress: false }, { cwd: dir, runBench, runBenchParallel });

    expect(code).toBe(0);
    expect(runBenchParallel).not.toHaveBeenCalled();
    expect(runBench).toHaveBeenCalledTimes(1);
    const options = runBench.mock.calls[0]?.[0];
    expect(options?.vectors.map((vector) => vector.id)).toEqual(['one', 'two']);
    expect(options?.sanitizers.map((sanitizer) => sanitizer.name)).toEqual(['noop', 'dompurify']);
    expect(options?.browsers).toEqual(['chromium']);
    expect(options?.onProgress).toBeUndefined();

    const expected = renderTextReport(
      summarizeResults([caseResult({ vectorId: 'one' }), caseResult({ vectorId: 'two' })])
    );
    expect(stdout).toEqual([expected]);
  });

  it('filters by --ids', async () => {
    const runBench = vi.fn(fakeRunner());
    await runCommand({ progress: false, ids: ['two'] }, { cwd: dir, runBench });
    expect(runBench.mock.calls[0]?.[0].vectors.map((vector) => vector.id)).toEqual(['two']);
  });

  it('rejects unknown ids before running anything', async () => {
    const runBench = vi.fn(fakeRunner());
    await expect(
      runCommand({ progress: false, ids: ['three'] }, { cwd: dir, runBench })
    ).rejects.toThrow(CorpusError);
    expect(runBench).not.toHaveBeenCalled();
  });

  it('wires progress reporting when enabled', async () => {
    const runBench = vi.fn(fakeRunner());
    await runCommand({ progressEvery: '1' }, { cwd: dir, runBench });
    expect(runBench.mock.calls[0]?.[0].onProgress).toBeTypeOf('function');
  });

  it('exits 1 when a payload executed', async () => {
    const runBench = vi.fn(
      fakeRunner((id) => (id === 'two' ? { outcome: 'xss', executed: true } : {}))
    );
    expect(await runCommand({ progress: false }, { cwd: dir, runBench })).toBe(1);
  });

  it('exits 2 when output was lossy, even with executions', async () => {
    const runBench = vi.fn(
      fakeRunner((id) =>
        id === 'one'
          ? { outcome: 'lossy', lossy: true, lossyDetails: 'position 1: expected b, got nothing' }
          : { outcome: 'xss', executed: true }
      )
    );
    expect(await runCommand({ progress: false }, { cwd: dir, runBench })).toBe(2);
  });

  it('prints only the first execution under --fail-fast', async () => {
    const runBench = vi.fn(
      fakeRunner((id) =>
        id === 'one'
          ? {
              outcome: 'xss',
              executed: true,
              details: 'Executed: hook:alert:1',
              sanitizedHtml: '<img onerror=x>',
            }
          : {}
      )
    );

    const code = await runCommand({ progress: false, failFast: true }, { cwd: dir, runBench });

    expect(code).toBe(1);
    expect(runBench.mock.calls[0]?.[0].failFast).toBe(true);
    expect(stdout).toEqual([]);
    expect(stderr).toEqual([
      '[sinkbench] FAIL-FAST: noop / chromium / one (html): Executed: hook:alert:1\n',
      '[sinkbench] sanitized="<img onerror=x>"\n',
    ]);
  });

  it('hands parallel runs to the worker pool', async () => {
    const runBench = vi.fn(fakeRunner());
    const runBenchParallel = vi.fn(async (options: ParallelBenchOptions) => fakeRunner()(options));

    const code = await runCommand(
      { progress: false, workers: '3', workerStallTimeoutS: '60' },
      { cwd: dir, runBench, runBenchParallel }
    );

    expect(code).toBe(0);
    expect(runBench).not.toHaveBeenCalled();
    expect(runBenchParallel).toHaveBeenCalledWith(
      expect.objectContaining({ workers: 3, stallTimeoutS: 60, progressEvery: 0 })
    );
  });

  it('writes the JSON and Markdown artifacts', async () => {
    const runBench = vi.fn(fakeRunner());
    const jsonDir = path.join(dir, 'out');
    const markdown = path.join(dir, 'report.md');

    await runCommand(
      { progress: false, jsonOut: jsonDir, markdownOut: markdown },
      { cwd: dir, runBench }
    );

    const jsonFile = path.join(jsonDir, 'results.json');
    const artifact = JSON.parse(readFileSync(jsonFile, 'utf8'));
    expect(artifact.totalCases).toBe(2);
    expect(artifact.results[1].vectorId).toBe('two');
    expect(readFileSync(markdown, 'utf8').startsWith('# Sanitizer benchmark\n')).toBe(true);
    expect(stderr).toEqual([
      `[sinkbench] wrote ${jsonFile}\n`,
      `[sinkbench] wrote ${markdown}\n`,
    ]);
  });

  it('reports a missing vector directory as a configuration error', async () => {
    rmSync(path.join(dir, 'vectors'), { recursive: true });
    await expect(runCommand({}, { cwd: dir })).rejects.toThrow('No vector files found');
    expect(existsSync(path.join(dir, 'results.json'))).toBe(false);
  });
});

describe('renderSanitizerList', () => {
  it('lists sanitizers by name', () => {
    expect(renderSanitizerList()).toBe(
      'dompurify: DOMPurify on a jsdom window with the shared allow-list\n' +
        'noop: Baseline: returns HTML unchanged\n'
    );
  });
});
