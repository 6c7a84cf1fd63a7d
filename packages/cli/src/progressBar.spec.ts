import type { RoundProgress } from '@microbench/core';
import { ProgressBar, renderBar, renderStatus } from './progressBar.js';
import { stripAnsi } from './cli/util.js';

const progress = (roundIndex: number, maxRounds: number): RoundProgress => ({
  name: 'bench',
  roundIndex,
  maxRounds,
  lowestRsdMean: 123_456,
  lowestRsd: 12.3456,
  lowestRsdIterations: 32_000,
});

describe('renderBar', () => {
  test('fills in eighths of a cell', () => {
    expect(renderBar(0, 4)).toBe('    ');
    expect(renderBar(0.3, 4)).toBe('█▎  ');
    expect(renderBar(0.5, 4)).toBe('██  ');
    expect(renderBar(1, 4)).toBe('████');
  });

  test('clamps the fraction', () => {
    expect(renderBar(2, 2)).toBe('██');
    expect(renderBar(-1, 2)).toBe('  ');
  });
});

describe('renderStatus', () => {
  test('round, best mean, rsd and iterations', () => {
    expect(renderStatus(progress(0, 1000))).toBe('1/1000 μ = 123us ± 12.3%, N = 32000');
  });
});

describe('ProgressBar', () => {
  test('redraws the line of a terminal', () => {
    const chunks: string[] = [];
    const bar = new ProgressBar('bench', { isTTY: true, write: (s: string) => chunks.push(s) });
    bar.width = 4;

    bar.onRound(progress(0, 2));
    bar.onRound(progress(1, 2));
    bar.done();

    expect(chunks.map(stripAnsi)).toEqual([
      '\rbench [██  ] 1/2 μ = 123us ± 12.3%, N = 32000',
      '\rbench [████] 2/2 μ = 123us ± 12.3%, N = 32000',
      '\n',
    ]);
  });

  test('writes only the final round to other streams', () => {
    const chunks: string[] = [];
    const bar = new ProgressBar('bench', { write: (s: string) => chunks.push(s) });
    bar.width = 4;

    bar.onRound(progress(0, 2));
    bar.onRound(progress(1, 2));
    bar.done();

    expect(chunks.map(stripAnsi)).toEqual(['bench [████] 2/2 μ = 123us ± 12.3%, N = 32000\n']);
  });
});
