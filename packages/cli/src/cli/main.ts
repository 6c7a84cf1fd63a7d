import { debuglog } from 'node:util';
import { assignDeep } from '@microbench/base';
import { Registry, registry as defaultRegistry } from '@microbench/core';
import type { BenchmarkResult } from '@microbench/core';

import * as config from '../config.js';
import { exportResults } from '../exporters.js';
import { runSuite, SuiteOptions } from '../runner.js';
import { parseArgs } from './args.js';
import { orPanic, println } from './util.js';

const dbg = debuglog('microbench:cli');

/**
 * Run the benchmarks of a registry (by default, those registered with
 * benchmark()) and export the results if requested.
 * Sampler options given in the suite options override the configuration.
 * Any failure exits the process with status 1.
 */
export async function main(
  argv: string[] = process.argv,
  registry: Registry = defaultRegistry,
  suite: SuiteOptions = {},
): Promise<BenchmarkResult[]> {
  const args = orPanic(parseArgs(argv));
  const cfg = orPanic(await config.load(process.cwd()));
  const benchmarks = orPanic(registry.benchmarks());

  dbg('%d benchmarks', benchmarks.length);

  const results = orPanic(
    runSuite(benchmarks, { ...suite, sampler: assignDeep({ ...cfg.sampler }, suite.sampler ?? {}) }),
  );

  if (args.export !== void 0) {
    const { format, filename } = args.export;
    orPanic(await exportResults(format, results, filename));
    println(`Exported ${results.length} results to ${filename}`);
  }

  return results;
}
