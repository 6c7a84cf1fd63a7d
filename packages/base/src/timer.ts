import * as q from './quantity.js';
import { As } from './util.js';

/** A measure of time in nanoseconds */
export type HrTime = As<bigint>;

/**
 * Raw source of timing data
 */
export interface TimeSource {
  /** Begin or restart the timer */
  start(): void;

  /** Get the elapsed time since the last call to start() */
  current(): HrTime;
}

export const HrTime = {
  toNanoseconds(time: HrTime): number {
    return Number(time);
  },
  from(quantity: q.Quantity): HrTime {
    const ns = q.convert(quantity[q.UnitTag]).to(quantity.scalar, 'nanosecond').scalar;
    return brand(BigInt(Math.round(ns)));
  },
};

/** Returns a high-resolution timer for the current runtime */
export function create(): TimeSource {
  if (typeof process !== 'object' || typeof process.hrtime?.bigint !== 'function') {
    throw new Error('Runtime not supported');
  }
  return nodeJSTimer();
}

/** Time a single synchronous call of fn, in nanoseconds */
export function time(timer: TimeSource, fn: () => unknown): number {
  timer.start();
  fn();
  return HrTime.toNanoseconds(timer.current());
}

function brand(t: bigint): HrTime {
  return t as HrTime;
}

function nodeJSTimer(): TimeSource {
  let now = process.hrtime.bigint();

  return {
    start() {
      now = process.hrtime.bigint();
    },
    current() {
      return brand(process.hrtime.bigint() - now);
    },
  };
}
