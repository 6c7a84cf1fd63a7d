import chalk from 'chalk';
import { quantity as q } from '@microbench/base';
import type { ProgressSink, RoundProgress } from '@microbench/core';

import type { Output } from './cli/util.js';

const BLOCKS = [' ', '▏', '▎', '▍', '▌', '▋', '▊', '▉', '█'];

const time = q.formatter('time', { maximumSignificantDigits: 3 });
const sig3 = new Intl.NumberFormat('en-US', { maximumSignificantDigits: 3 });

/** Render a bar of the given width filled to the given fraction, in eighths of a cell */
export function renderBar(fraction: number, width: number): string {
  const eighths = Math.round(Math.min(Math.max(fraction, 0), 1) * width * 8);
  const full = Math.floor(eighths / 8);
  const partial = eighths % 8;

  let bar = BLOCKS[8].repeat(full);
  if (full < width) {
    bar += BLOCKS[partial] + ' '.repeat(width - full - 1);
  }

  return bar;
}

/** The text following the bar */
export function renderStatus(p: RoundProgress): string {
  const mean = time.format(q.create('nanosecond', p.lowestRsdMean));
  return `${p.roundIndex + 1}/${p.maxRounds} μ = ${mean} ± ${sig3.format(p.lowestRsd)}%, N = ${p.lowestRsdIterations}`;
}

/**
 * Draws the progress of a sampler on one line of a terminal, redrawing
 * the line after each round
 */
export class ProgressBar implements ProgressSink {
  width = 20;
  #drawn = false;

  constructor(
    readonly name: string,
    private readonly stream: Output,
  ) {}

  onRound(p: RoundProgress): void {
    const fraction = (p.roundIndex + 1) / p.maxRounds;
    const line =
      chalk.bold(this.name) + ' ' +
      chalk.white('[' + renderBar(fraction, this.width) + ']') + ' ' +
      renderStatus(p);

    // only terminals can redraw a line
    if (this.stream.isTTY) {
      this.stream.write('\r\x1b[K' + line);
      this.#drawn = true;
    } else if (p.roundIndex + 1 >= p.maxRounds) {
      this.stream.write(line + '\n');
    }
  }

  /** Move past the bar once sampling has finished */
  done(): void {
    if (this.#drawn) {
      this.stream.write('\n');
      this.#drawn = false;
    }
  }
}
