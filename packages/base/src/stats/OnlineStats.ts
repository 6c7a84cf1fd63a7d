export interface SimpleSummary<T> {
  N(): T;

  mean(): T;

  range(): [T, T];
}

/** Running mean and extremes */
export class RunningSummary implements SimpleSummary<number> {
  #min = Infinity;
  #max = -Infinity;
  #n = 0;
  #M1 = 0;

  N() {
    return this.#n;
  }

  mean() {
    return this.#n === 0 ? NaN : this.#M1;
  }

  range(): [number, number] {
    return [this.#min, this.#max];
  }

  push(x: number) {
    const n = ++this.#n;

    this.#min = Math.min(this.#min, x);
    this.#max = Math.max(this.#max, x);

    this.#M1 += (x - this.#M1) / n;

    return n;
  }

  /** Push the first n values of the given sample */
  pushAll(xs: ArrayLike<number>, n = xs.length) {
    for (let i = 0; i < n; i++) this.push(xs[i]);
  }
}
