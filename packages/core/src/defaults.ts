import { LATENCY_BUCKETS } from './planner.js';
import { WARMUP_RUNS } from './estimator.js';

/** Sampler defaults */
export const SAMPLER = {
  warmupRuns: WARMUP_RUNS,
  replan: 'every-round',
  buckets: LATENCY_BUCKETS,
} as const satisfies import('./sampler.js').Options;
