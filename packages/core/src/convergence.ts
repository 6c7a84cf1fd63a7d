import type { stats } from '@microbench/base';

/** The best (lowest RSD) round observed */
export interface Convergence {
  readonly lowestRsd: number;
  readonly lowestRsdIndex: number;
  readonly lowestRsdMean: number;
  readonly lowestRsdIterations: number;
}

/** RSD (%) a round must beat to be recorded */
export const SENTINEL_RSD = 100;

/**
 * Running record of the best round of one benchmark execution.
 * Only a strictly lower RSD replaces the current best, so the
 * earliest of equally stable rounds is kept.
 */
export class ConvergenceState implements Convergence {
  #lowestRsd = SENTINEL_RSD;
  #index = 0;
  #mean = 0;
  #iterations = 0;
  #accepted = false;
  #frozen = false;

  get lowestRsd() {
    return this.#lowestRsd;
  }

  get lowestRsdIndex() {
    return this.#index;
  }

  get lowestRsdMean() {
    return this.#mean;
  }

  get lowestRsdIterations() {
    return this.#iterations;
  }

  /** Whether any round has beaten the sentinel */
  get accepted() {
    return this.#accepted;
  }

  /**
   * Record the statistics of a completed round
   * @returns true if the round is the new best
   */
  observe(index: number, round: stats.Summary, iterations: number): boolean {
    if (this.#frozen) {
      throw new Error('Convergence state is frozen');
    }

    if (round.rsd < this.#lowestRsd) {
      this.#lowestRsd = round.rsd;
      this.#index = index;
      this.#mean = round.mean;
      this.#iterations = iterations;
      this.#accepted = true;

      return true;
    }

    return false;
  }

  /** Stop accepting rounds and return the final state */
  freeze(): Convergence {
    this.#frozen = true;
    return this.toJson();
  }

  toJson(): Convergence {
    return Object.freeze({
      lowestRsd: this.#lowestRsd,
      lowestRsdIndex: this.#index,
      lowestRsdMean: this.#mean,
      lowestRsdIterations: this.#iterations,
    });
  }
}
