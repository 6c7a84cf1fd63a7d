import { quantity as q, timer } from '@microbench/base';

export interface ScriptedTimeSource extends timer.TimeSource {
  /** Number of durations reported so far */
  readonly count: number;
}

/**
 * A TimeSource which reports durations from a script instead of a clock.
 * The i-th call to current() reports script(i) nanoseconds.
 */
export function scripted(script: readonly number[] | ((i: number) => number)): ScriptedTimeSource {
  const at = typeof script === 'function' ? script : (i: number) => script[i % script.length];
  let i = 0;

  const source: ScriptedTimeSource = {
    get count() {
      return i;
    },
    start() {},
    current() {
      return timer.HrTime.from(q.create('nanosecond', at(i++)));
    },
  };

  return source;
}
