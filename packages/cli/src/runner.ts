import { debuglog } from 'node:util';
import { Status, timer } from '@microbench/base';
import { Benchmark, BenchmarkResult, Options, Sampler } from '@microbench/core';

import type { Output } from './cli/util.js';
import { withHiddenCursor } from './cursor.js';
import { writeResult } from './consoleWriter.js';
import { ProgressBar } from './progressBar.js';

const dbg = debuglog('microbench:runner');

export interface SuiteOptions {
  sampler?: Partial<Options>;

  /** Progress is drawn here */
  progress?: Output;

  /** Results are summarized here */
  out?: Output;

  /** Creates the time source of each benchmark */
  timeSource?: () => timer.TimeSource;

  signal?: AbortSignal;
}

/**
 * Sample each benchmark in turn. The first failure stops the suite and
 * is returned; the results of the benchmarks before it are discarded.
 */
export function runSuite(
  benchmarks: readonly Benchmark[],
  opts: SuiteOptions = {},
): Status<BenchmarkResult[]> {
  const progress = opts.progress ?? process.stderr;
  const out = opts.out ?? process.stdout;
  const results: BenchmarkResult[] = [];

  for (const b of benchmarks) {
    dbg('running %s', b.name);

    const bar = new ProgressBar(b.name, progress);
    const sampler = new Sampler(b.name, b.fn, opts.sampler, {
      progress: bar,
      timeSource: opts.timeSource?.(),
      signal: opts.signal,
    });

    const s = withHiddenCursor(progress, () => {
      try {
        return sampler.run();
      } finally {
        bar.done();
      }
    });

    if (Status.isErr(s)) {
      return Status.err(new Error(`Benchmark "${b.name}" failed: ${s[1].message}`, { cause: s[1] }));
    }

    writeResult(s[0], out);
    results.push(s[0]);
  }

  return Status.value(results);
}
