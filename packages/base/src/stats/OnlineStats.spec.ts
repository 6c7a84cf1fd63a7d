import { RunningSummary } from './OnlineStats.js';

describe('OnlineStats', () => {
  test('3 values', () => {
    const stats = new RunningSummary();
    expect(stats.N()).toBe(0);
    expect(stats.mean()).toBeNaN();

    stats.push(1);
    expect(stats.N()).toBe(1);
    expect(stats.mean()).toBe(1);
    expect(stats.range()).toEqual([1, 1]);

    stats.push(2);
    expect(stats.N()).toBe(2);
    expect(stats.mean()).toBe(1.5);
    expect(stats.range()).toEqual([1, 2]);

    stats.push(3);
    expect(stats.N()).toBe(3);
    expect(stats.mean()).toBe(2);
    expect(stats.range()).toEqual([1, 3]);
  });

  test('pushAll', () => {
    const stats = new RunningSummary();
    stats.pushAll(new Float64Array([5, 1, 9, 100]), 3);

    expect(stats.N()).toBe(3);
    expect(stats.mean()).toBe(5);
    expect(stats.range()).toEqual([1, 9]);
  });
});
