import { stats } from '@microbench/base';
import { ConvergenceState, SENTINEL_RSD } from './convergence.js';

const round = (mean: number, rsd: number): stats.Summary => ({
  n: 2,
  mean,
  variance: 0,
  std: (rsd * mean) / 100,
  rsd,
  min: mean,
  max: mean,
});

describe('ConvergenceState', () => {
  test('starts at the sentinel', () => {
    const state = new ConvergenceState();

    expect(state.lowestRsd).toBe(SENTINEL_RSD);
    expect(state.lowestRsdIndex).toBe(0);
    expect(state.lowestRsdMean).toBe(0);
    expect(state.lowestRsdIterations).toBe(0);
    expect(state.accepted).toBe(false);
  });

  test('records a strictly lower rsd', () => {
    const state = new ConvergenceState();

    expect(state.observe(0, round(120, 8), 64)).toBe(true);
    expect(state.observe(1, round(110, 3), 32)).toBe(true);
    expect(state.observe(2, round(100, 5), 32)).toBe(false);

    expect(state.toJson()).toEqual({
      lowestRsd: 3,
      lowestRsdIndex: 1,
      lowestRsdMean: 110,
      lowestRsdIterations: 32,
    });
  });

  test('the earliest of equal rounds is kept', () => {
    const state = new ConvergenceState();

    state.observe(0, round(100, 0), 8);
    state.observe(1, round(90, 0), 8);

    expect(state.lowestRsdIndex).toBe(0);
    expect(state.lowestRsdMean).toBe(100);
  });

  test('rounds no better than the sentinel are ignored', () => {
    const state = new ConvergenceState();

    expect(state.observe(0, round(75, 173), 4)).toBe(false);
    expect(state.observe(1, round(75, SENTINEL_RSD), 4)).toBe(false);
    expect(state.accepted).toBe(false);
    expect(state.lowestRsd).toBe(SENTINEL_RSD);
  });

  test('lowest rsd never increases', () => {
    const state = new ConvergenceState();
    const rsds = [40, 55, 12, 12.5, 90, 3, 3, 150, 0.5, 7];
    let previous = state.lowestRsd;

    rsds.forEach((rsd, i) => {
      state.observe(i, round(100, rsd), 10);

      expect(state.lowestRsd).toBeLessThanOrEqual(previous);
      expect(state.lowestRsd).toBe(Math.min(SENTINEL_RSD, ...rsds.slice(0, i + 1)));
      previous = state.lowestRsd;
    });

    expect(state.lowestRsdIndex).toBe(8);
  });

  test('a frozen state rejects rounds', () => {
    const state = new ConvergenceState();
    state.observe(0, round(100, 10), 10);

    const frozen = state.freeze();

    expect(Object.isFrozen(frozen)).toBe(true);
    expect(frozen.lowestRsd).toBe(10);
    expect(() => state.observe(1, round(100, 1), 10)).toThrow('Convergence state is frozen');
  });
});
