import { array, assert, Status } from '@microbench/base';

/**
 * A latency classification. Estimates below upperBound (and not below
 * the previous bucket's bound) are sampled with this policy
 */
export interface LatencyBucket {
  /** Exclusive upper bound of the single-call estimate (ns) */
  readonly upperBound: number;

  /** Timed calls per round */
  readonly iterations: number;

  /** Round budget */
  readonly maxRounds: number;
}

/** The sampling policy for one round */
export type Policy = Pick<LatencyBucket, 'iterations' | 'maxRounds'>;

/**
 * How often the planner is consulted: before every round, so that a
 * change in the cost of the function can reclassify it, or once before
 * the first round.
 */
export type ReplanCadence = 'every-round' | 'once';

const bucket = (upperBound: number, iterations: number, maxRounds: number): LatencyBucket =>
  Object.freeze({ upperBound, iterations, maxRounds });

export const LATENCY_BUCKETS: readonly LatencyBucket[] = Object.freeze([
  // tens of nanoseconds
  bucket(100, 128_000, 10_000),
  // hundreds of nanoseconds
  bucket(1_000, 64_000, 5_000),
  // microseconds
  bucket(1_000_000, 32_000, 1_000),
  // milliseconds
  bucket(1_000_000_000, 4_000, 100),
  // seconds
  bucket(Infinity, 1_000, 10),
]);

/**
 * Select the policy of the first bucket whose bound is strictly
 * greater than the estimate
 * @param estimate Single-call latency (ns)
 */
export function plan(estimate: number, buckets: readonly LatencyBucket[] = LATENCY_BUCKETS): Policy {
  assert.gt(buckets.length, 0);

  const idx = array.lowerBound(buckets, estimate, (b, e: number) => b.upperBound <= e);
  const { iterations, maxRounds } = buckets[Math.min(idx, buckets.length - 1)];

  return { iterations, maxRounds };
}

/** Check the buckets partition [0, Infinity) */
export function validateBuckets(
  buckets: readonly LatencyBucket[],
): Status<readonly LatencyBucket[]> {
  if (buckets.length === 0) {
    return Status.err('Latency buckets must not be empty');
  }

  for (let i = 0; i < buckets.length; i++) {
    const b = buckets[i];

    if (!Number.isInteger(b.iterations) || b.iterations < 1) {
      return Status.err(`Bucket ${i}: iterations must be a positive integer, got ${b.iterations}`);
    }

    if (!Number.isInteger(b.maxRounds) || b.maxRounds < 1) {
      return Status.err(`Bucket ${i}: maxRounds must be a positive integer, got ${b.maxRounds}`);
    }

    if (!(b.upperBound > 0)) {
      return Status.err(`Bucket ${i}: upperBound must be greater than 0, got ${b.upperBound}`);
    }

    if (i > 0 && b.upperBound <= buckets[i - 1].upperBound) {
      return Status.err(`Bucket ${i}: upper bounds must be strictly ascending`);
    }
  }

  if (buckets[buckets.length - 1].upperBound !== Infinity) {
    return Status.err('The last bucket must be unbounded (upperBound = Infinity)');
  }

  return Status.value(buckets);
}
