import type { stats } from '@microbench/base';
import type { Convergence } from './convergence.js';

/** The summary of one benchmark execution */
export interface BenchmarkResult {
  readonly name: string;

  /** Rounds executed */
  readonly numRuns: number;

  /** Timed calls per round, in the final round's policy */
  readonly numIterations: number;

  /** Timed calls across all rounds */
  readonly totalIterations: number;

  /** Mean duration (ns) of the round with the lowest RSD */
  readonly meanExecutionTime: number;
  readonly fastestExecutionTime: number;
  readonly slowestExecutionTime: number;

  readonly lowestRsd: number;
  readonly lowestRsdIndex: number;

  /** Calls per second */
  readonly averageIterationPerformance: number;
  readonly fastestIterationPerformance: number;
  readonly slowestIterationPerformance: number;
}

export interface Reduction {
  convergence: Convergence;

  /** Whether any round beat the convergence sentinel */
  accepted: boolean;

  /** Statistics of the first round */
  firstRound: stats.Summary;

  /** Every timed call of every round */
  observations: stats.online.SimpleSummary<number>;

  numRuns: number;
  numIterations: number;
}

/** Operations per second for the given duration (ns) */
export function throughput(ns: number): number {
  return 1e9 / ns;
}

/**
 * Produce the result of an execution. If no round was more stable than
 * the sentinel, the first round stands in for the best round.
 */
export function reduce(name: string, r: Reduction): BenchmarkResult {
  const [fastest, slowest] = r.observations.range();

  const best = r.accepted
    ? { mean: r.convergence.lowestRsdMean, rsd: r.convergence.lowestRsd, index: r.convergence.lowestRsdIndex }
    : { mean: r.firstRound.mean, rsd: r.firstRound.rsd, index: 0 };

  return Object.freeze({
    name,
    numRuns: r.numRuns,
    numIterations: r.numIterations,
    totalIterations: r.observations.N(),
    meanExecutionTime: best.mean,
    fastestExecutionTime: fastest,
    slowestExecutionTime: slowest,
    lowestRsd: best.rsd,
    lowestRsdIndex: best.index,
    averageIterationPerformance: throughput(best.mean),
    fastestIterationPerformance: throughput(fastest),
    slowestIterationPerformance: throughput(slowest),
  });
}
