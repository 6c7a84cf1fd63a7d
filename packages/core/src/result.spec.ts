import { stats } from '@microbench/base';
import { ConvergenceState } from './convergence.js';
import { reduce, throughput } from './result.js';

describe('reduce', () => {
  const summary = (xs: number[]) => stats.summarize(xs);

  test('combines the best round with the extremes of every round', () => {
    const rounds = [
      [90, 110, 95, 105],
      [99, 101, 100, 100],
      [40, 160, 100, 100],
    ];

    const convergence = new ConvergenceState();
    const observations = new stats.online.RunningSummary();

    rounds.forEach((r, i) => {
      convergence.observe(i, summary(r), r.length);
      observations.pushAll(r);
    });

    const result = reduce('bench', {
      convergence: convergence.freeze(),
      accepted: convergence.accepted,
      firstRound: summary(rounds[0]),
      observations,
      numRuns: 3,
      numIterations: 4,
    });

    expect(result.name).toBe('bench');
    expect(result.numRuns).toBe(3);
    expect(result.numIterations).toBe(4);
    expect(result.totalIterations).toBe(12);
    expect(result.lowestRsdIndex).toBe(1);
    expect(result.meanExecutionTime).toBe(100);
    expect(result.lowestRsd).toBeCloseTo(Math.sqrt(0.5), 10);
    expect(result.fastestExecutionTime).toBe(40);
    expect(result.slowestExecutionTime).toBe(160);
    expect(result.averageIterationPerformance).toBe(1e7);
    expect(result.fastestIterationPerformance).toBe(2.5e7);
    expect(result.slowestIterationPerformance).toBe(6.25e6);
    expect(Object.isFrozen(result)).toBe(true);
  });
});

describe('throughput', () => {
  test('operations per second', () => {
    expect(throughput(1e9)).toBe(1);
    expect(throughput(250)).toBe(4e6);
    expect(throughput(0)).toBe(Infinity);
  });
});
