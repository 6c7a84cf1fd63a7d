import { assert, timer } from '@microbench/base';

/** Number of calls used to estimate the latency of a function */
export const WARMUP_RUNS = 10;

/**
 * Rough single-call latency (ns) of fn: the fastest of `runs` calls,
 * ignoring the first. Exceptions thrown by fn are not caught.
 */
export function estimate(
  fn: () => unknown,
  timeSource: timer.TimeSource,
  runs = WARMUP_RUNS,
): number {
  assert.gte(runs, 1);

  const first = timer.time(timeSource, fn);
  if (runs === 1) return first;

  let fastest = Infinity;
  for (let i = 1; i < runs; i++) {
    fastest = Math.min(fastest, timer.time(timeSource, fn));
  }

  return fastest;
}
