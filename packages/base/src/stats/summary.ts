import { ArrayView } from '../array.js';
import { gt } from '../assert.js';

/** Dispersion of a sample of durations */
export interface Summary {
  readonly n: number;
  readonly mean: number;
  /** Population variance (divides by n) */
  readonly variance: number;
  readonly std: number;
  /**
   * Relative standard deviation, std as a percentage of the mean.
   * Defined as 0 when the mean is 0.
   */
  readonly rsd: number;
  readonly min: number;
  readonly max: number;
}

/** Relative standard deviation (%) */
export function rsd(std: number, mean: number): number {
  return mean === 0 ? 0 : (std * 100) / mean;
}

/**
 * Two-pass summary of the first n values of a sample
 */
export function summarize(sample: ArrayView<number>, n = sample.length): Summary {
  gt(n, 0);

  let sum = 0;
  let min = Infinity;
  let max = -Infinity;

  for (let i = 0; i < n; i++) {
    const x = sample[i];
    sum += x;
    if (x < min) min = x;
    if (x > max) max = x;
  }

  const mean = sum / n;

  let E = 0;
  for (let i = 0; i < n; i++) {
    const d = sample[i] - mean;
    E += d * d;
  }

  const variance = E / n;
  const std = Math.sqrt(variance);

  return { n, mean, variance, std, rsd: rsd(std, mean), min, max };
}
