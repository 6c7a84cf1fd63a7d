import { debuglog } from 'node:util';
import { assignDeep, stats, Status, timer, toError } from '@microbench/base';

import * as estimator from './estimator.js';
import * as defaults from './defaults.js';
import { ConvergenceState } from './convergence.js';
import { LatencyBucket, Policy, ReplanCadence, plan, validateBuckets } from './planner.js';
import { BenchmarkResult, reduce } from './result.js';

const dbg = debuglog('microbench:sampler');

/** A synchronous unit of work. Its return value is ignored */
export type BenchmarkFn = () => unknown;

export interface Options {
  /** Calls made to estimate the latency of the function before planning */
  warmupRuns: number;

  /** When to re-estimate the latency and re-plan the round */
  replan: ReplanCadence;

  /** Latency classification table */
  buckets: readonly LatencyBucket[];
}

/** Reported after each round */
export interface RoundProgress {
  readonly name: string;
  /** 0-based index of the round just completed */
  readonly roundIndex: number;
  readonly maxRounds: number;
  readonly lowestRsdMean: number;
  readonly lowestRsd: number;
  readonly lowestRsdIterations: number;
}

/** Consumer of sampler progress */
export interface ProgressSink {
  onRound(progress: RoundProgress): void;
}

/** Collaborators of a sampler */
export interface Environment {
  timeSource?: timer.TimeSource;
  progress?: ProgressSink;

  /** Checked before each round is planned */
  signal?: AbortSignal;
}

const enum Phase {
  Ready = 0,
  Planning = 1,
  Measuring = 2,
  Reducing = 3,
  Complete = 4,
}

const NoopSink: ProgressSink = { onRound() {} };

/**
 * Adaptive sampler. Each round is planned from a fresh latency estimate,
 * timed call by call and reduced to its RSD; the round with the lowest RSD
 * supplies the mean of the result.
 */
export class Sampler {
  readonly opts: Options;
  readonly convergence = new ConvergenceState();

  /** Every timed call of every round */
  readonly observations = new stats.online.RunningSummary();

  phase = Phase.Ready;

  #timeSource: timer.TimeSource;
  #progress: ProgressSink;
  #signal: AbortSignal | undefined;

  #policy: Policy | undefined;
  #sample = new Float64Array(0);
  #firstRound: stats.Summary | undefined;
  /** Rounds completed */
  #rounds = 0;

  constructor(
    readonly name: string,
    private readonly fn: BenchmarkFn,
    opts?: Partial<Options>,
    env: Environment = {},
  ) {
    const base: Options = { ...defaults.SAMPLER };
    this.opts = assignDeep(base, opts ?? {});
    this.#timeSource = env.timeSource ?? timer.create();
    this.#progress = env.progress ?? NoopSink;
    this.#signal = env.signal;
  }

  /**
   * Run the sampler to completion. An exception thrown by the function
   * ends the run and is returned as an error; no partial result is produced.
   */
  run(): Status<BenchmarkResult> {
    if (this.phase !== Phase.Ready) { throw new Error('The sampler has already run'); }

    const valid = validateBuckets(this.opts.buckets);
    if (Status.isErr(valid)) {
      this.phase = Phase.Complete;
      return Status.err(valid[1]);
    }

    this.phase = Phase.Planning;

    try {
      while (this.phase !== Phase.Complete) {
        this.phase = this.#step(this.phase);
      }
    } catch (e) {
      this.phase = Phase.Complete;
      dbg('%s: aborted after %d rounds: %s', this.name, this.#rounds, e);
      return Status.err(toError(e));
    }

    return Status.value(this.#result());
  }

  /** Run one state of the sampling loop and return the next */
  #step(phase: Phase): Phase {
    switch (phase) {
      case Phase.Planning:
        this.#plan();
        return Phase.Measuring;

      case Phase.Measuring:
        this.#measure();
        return Phase.Reducing;

      case Phase.Reducing: {
        const { maxRounds } = this.#reduce();
        return this.#rounds >= maxRounds ? Phase.Complete : Phase.Planning;
      }

      default:
        return Phase.Complete;
    }
  }

  #plan() {
    this.#signal?.throwIfAborted();

    if (this.#policy !== void 0 && this.opts.replan === 'once') return;

    const latency = estimator.estimate(this.fn, this.#timeSource, this.opts.warmupRuns);
    const policy = plan(latency, this.opts.buckets);

    // A budget below the completed rounds ends the run after this round
    const maxRounds = Math.max(policy.maxRounds, this.#rounds + 1);

    const previous = this.#policy;
    if (
      previous === void 0
      || previous.maxRounds !== maxRounds
      || previous.iterations !== policy.iterations
    ) {
      dbg('%s: estimate %dns, %d iterations, %d rounds', this.name, latency, policy.iterations, maxRounds);
    }

    this.#policy = { iterations: policy.iterations, maxRounds };

    if (this.#sample.length !== policy.iterations) {
      this.#sample = new Float64Array(policy.iterations);
    }
  }

  #measure() {
    const { fn } = this;
    const timeSource = this.#timeSource;
    const sample = this.#sample;
    const n = this.#current().iterations;

    for (let i = 0; i < n; i++) {
      timeSource.start();
      fn();
      sample[i] = Number(timeSource.current());
    }
  }

  #reduce(): Policy {
    const policy = this.#current();
    const summary = stats.summarize(this.#sample, policy.iterations);
    const index = this.#rounds++;

    this.#firstRound ??= summary;
    this.observations.pushAll(this.#sample, policy.iterations);
    this.convergence.observe(index, summary, policy.iterations);

    const c = this.convergence;
    this.#progress.onRound({
      name: this.name,
      roundIndex: index,
      maxRounds: policy.maxRounds,
      lowestRsdMean: c.lowestRsdMean,
      lowestRsd: c.lowestRsd,
      lowestRsdIterations: c.lowestRsdIterations,
    });

    return policy;
  }

  #result(): BenchmarkResult {
    const policy = this.#current();

    if (this.#firstRound === void 0) {
      throw new Error('No rounds were completed');
    }

    dbg('%s: %d calls in %d rounds, mean %dns', this.name, this.observations.N(), this.#rounds, this.observations.mean());

    return reduce(this.name, {
      convergence: this.convergence.freeze(),
      accepted: this.convergence.accepted,
      firstRound: this.#firstRound,
      observations: this.observations,
      numRuns: this.#rounds,
      numIterations: policy.iterations,
    });
  }

  #current(): Policy {
    if (this.#policy === void 0) {
      throw new Error('The round has not been planned');
    }
    return this.#policy;
  }
}
