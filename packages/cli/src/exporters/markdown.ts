import { quantity as q } from '@microbench/base';
import type { BenchmarkResult } from '@microbench/core';

const time = q.formatter('time', { maximumFractionDigits: 2 });
const int = new Intl.NumberFormat('en-US', { maximumFractionDigits: 0 });

const ns = (x: number) => time.format(q.create('nanosecond', x));

function escape(s: string) {
  return s.replace(/\|/g, '\\|');
}

// prettier-ignore
const HEADER = [
  '| Name | Runs | Iterations | Mean | Fastest | Slowest | RSD | Average (ops/s) |',
  '|------|-----:|-----------:|-----:|--------:|--------:|----:|----------------:|',
];

export function serialize(results: readonly BenchmarkResult[]): string {
  const rows = results.map(r =>
    '| ' +
    [
      escape(r.name),
      r.numRuns,
      r.numIterations,
      ns(r.meanExecutionTime),
      ns(r.fastestExecutionTime),
      ns(r.slowestExecutionTime),
      r.lowestRsd.toFixed(2) + '%',
      int.format(r.averageIterationPerformance),
    ].join(' | ') +
    ' |',
  );

  return [...HEADER, ...rows].join('\n') + '\n';
}
