import chalk from 'chalk';
import { quantity as q } from '@microbench/base';
import type { BenchmarkResult } from '@microbench/core';

import { Output, padStart } from './cli/util.js';

const duration = q.formatter('time', { maximumFractionDigits: 0, separator: ' ' });
const delta = q.formatter('time', { maximumFractionDigits: 0, separator: ' ', signed: true });
const perSecond = new Intl.NumberFormat('en-US', { maximumFractionDigits: 0 });

const ns = (x: number) => q.create('nanosecond', x);

/** 1st, 2nd, 3rd, 4th, ... 11th, 12th, 13th, ... 21st */
export function ordinal(n: number): string {
  const ends = ['th', 'st', 'nd', 'rd', 'th', 'th', 'th', 'th', 'th', 'th'];
  const mod100 = n % 100;

  if (mod100 >= 11 && mod100 <= 13) {
    return n + 'th';
  }
  return n + ends[n % 10];
}

/** Difference from the mean, as a duration and a percentage */
function fromMean(x: number, mean: number) {
  const d = x - mean;
  const pct = mean === 0 ? 0 : (d / mean) * 100;
  return `${delta.format(ns(d))} / ${pct.toFixed(1)} %`;
}

/** The console summary of one result */
export function formatResult(r: BenchmarkResult): string[] {
  const col = (s: string) => padStart(s, 10);
  const heading = (s: string) => '    ' + chalk.bold.underline(s);
  const mean = r.meanExecutionTime;

  return [
    chalk.bold.green('✓ ' + r.name),
    heading('Configuration'),
    `      ${r.numRuns} runs, ${r.numIterations} iterations per run`,
    heading('Execution Time'),
    '      Average    ' + col(duration.format(ns(mean))),
    '      Fastest    ' + col(duration.format(ns(r.fastestExecutionTime))) +
      ' (' + chalk.green(fromMean(r.fastestExecutionTime, mean)) + ')',
    '      Slowest    ' + col(duration.format(ns(r.slowestExecutionTime))) +
      ' (' + chalk.red(fromMean(r.slowestExecutionTime, mean)) + ')',
    chalk.bold.white(
      '      Best Run   ' + col(duration.format(ns(mean))) +
        ` ± ${r.lowestRsd.toFixed(2)}% (${ordinal(r.lowestRsdIndex + 1)} run)`,
    ),
    heading('Performance'),
    '      Average    ' + col(perSecond.format(r.averageIterationPerformance)) + ' iterations/s',
    '      Fastest    ' + col(perSecond.format(r.fastestIterationPerformance)) + ' iterations/s',
    '      Slowest    ' + col(perSecond.format(r.slowestIterationPerformance)) + ' iterations/s',
    '',
  ];
}

export function writeResult(r: BenchmarkResult, stream: Output): void {
  stream.write(formatResult(r).join('\n') + '\n');
}
