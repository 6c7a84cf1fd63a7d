import type { BenchmarkResult } from '@microbench/core';

/** The exported fields of a result, in column order */
export interface ResultRecord {
  name: string;
  num_runs: number;
  num_iterations: number;
  mean_execution_time: number;
  fastest_execution_time: number;
  slowest_execution_time: number;
  lowest_rsd: number;
  lowest_rsd_index: number;
  average_iteration_performance: number;
  fastest_iteration_performance: number;
  slowest_iteration_performance: number;
}

export const COLUMNS = [
  'name',
  'num_runs',
  'num_iterations',
  'mean_execution_time',
  'fastest_execution_time',
  'slowest_execution_time',
  'lowest_rsd',
  'lowest_rsd_index',
  'average_iteration_performance',
  'fastest_iteration_performance',
  'slowest_iteration_performance',
] as const satisfies readonly (keyof ResultRecord)[];

export function toRecord(r: BenchmarkResult): ResultRecord {
  return {
    name: r.name,
    num_runs: r.numRuns,
    num_iterations: r.numIterations,
    mean_execution_time: r.meanExecutionTime,
    fastest_execution_time: r.fastestExecutionTime,
    slowest_execution_time: r.slowestExecutionTime,
    lowest_rsd: r.lowestRsd,
    lowest_rsd_index: r.lowestRsdIndex,
    average_iteration_performance: r.averageIterationPerformance,
    fastest_iteration_performance: r.fastestIterationPerformance,
    slowest_iteration_performance: r.slowestIterationPerformance,
  };
}
