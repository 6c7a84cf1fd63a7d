import type { BenchmarkResult } from '@microbench/core';
import { toRecord } from './record.js';

/** Non-finite numbers are written as null */
export function serialize(results: readonly BenchmarkResult[]): string {
  return JSON.stringify({ benchmarks: results.map(toRecord) }, null, 2) + '\n';
}
