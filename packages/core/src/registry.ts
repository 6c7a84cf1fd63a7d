import { assert, Status } from '@microbench/base';
import type { BenchmarkFn } from './sampler.js';

/** A named unit of work to be sampled */
export interface Benchmark {
  readonly name: string;
  readonly fn: BenchmarkFn;
}

/**
 * A registered function. Each call to args() adds an instance named by
 * appending its label to the builder's name; without any, the function
 * is sampled once, called without arguments.
 */
export class Builder<Args extends unknown[]> {
  #instances: { label: string; args: Args }[] = [];

  constructor(
    readonly name: string,
    private readonly fn: (...args: Args) => unknown,
  ) {}

  args(label: string, ...values: Args): this {
    this.#instances.push({ label, args: values });
    return this;
  }

  build(): Benchmark[] {
    const fn = this.fn;

    if (this.#instances.length === 0) {
      return [{ name: this.name, fn: () => Reflect.apply(fn, undefined, []) }];
    }

    return this.#instances.map(({ label, args }) => ({
      name: this.name + label,
      fn: () => fn(...args),
    }));
  }
}

/** An ordered collection of benchmarks */
export class Registry {
  #builders: { build(): Benchmark[] }[] = [];

  /** Register a function, returning a builder to parameterize it with */
  add<Args extends unknown[]>(name: string, fn: (...args: Args) => unknown): Builder<Args> {
    assert.is(typeof fn === 'function');
    const builder = new Builder(name, fn);
    this.#builders.push(builder);
    return builder;
  }

  get size() {
    return this.#builders.length;
  }

  /** All benchmarks, in registration order */
  benchmarks(): Status<Benchmark[]> {
    const result: Benchmark[] = [];
    const names = new Set<string>();

    for (const builder of this.#builders) {
      for (const b of builder.build()) {
        if (names.has(b.name)) {
          return Status.err(`Duplicate benchmark "${b.name}"`);
        }
        names.add(b.name);
        result.push(b);
      }
    }

    return Status.value(result);
  }

  clear() {
    this.#builders = [];
  }
}

/** The default registry */
export const registry = new Registry();

/** Register a function in the default registry */
export function benchmark<Args extends unknown[]>(
  name: string,
  fn: (...args: Args) => unknown,
): Builder<Args> {
  return registry.add(name, fn);
}
