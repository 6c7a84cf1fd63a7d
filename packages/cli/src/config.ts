import { debuglog } from 'node:util';
import { lilconfig } from 'lilconfig';
import { assignDeep, isObject, Status, toError } from '@microbench/base';
import { defaults, planner } from '@microbench/core';
import type { Options } from '@microbench/core';

const dbg = debuglog('microbench:config');

export interface MicrobenchConfig {
  sampler: Options;
}

/**
 * Configuration as written in a config file. In JSON an unbounded bucket
 * is written with "upperBound": null.
 */
export interface ConfigFile {
  sampler?: {
    warmupRuns?: number;
    replan?: planner.ReplanCadence;
    buckets?: { upperBound: number | null; iterations: number; maxRounds: number }[];
  };
}

const REPLAN_CADENCES: readonly planner.ReplanCadence[] = ['every-round', 'once'];

const explorer = lilconfig('microbench');

/** Map of rootDir to config */
const sessionConfigs = new Map<string, MicrobenchConfig>();

export function defaultConfig(): MicrobenchConfig {
  return { sampler: { ...defaults.SAMPLER } };
}

function parseBucket(raw: unknown, i: number): Status<planner.LatencyBucket> {
  if (!isObject(raw)) {
    return Status.err(`sampler.buckets[${i}] must be an object`);
  }

  const { upperBound, iterations, maxRounds } = raw;

  if (upperBound !== null && typeof upperBound !== 'number') {
    return Status.err(`sampler.buckets[${i}].upperBound must be a number or null`);
  }

  if (typeof iterations !== 'number' || typeof maxRounds !== 'number') {
    return Status.err(`sampler.buckets[${i}] must have numeric iterations and maxRounds`);
  }

  return Status.value({ upperBound: upperBound ?? Infinity, iterations, maxRounds });
}

/** Validate the contents of a config file */
export function parse(raw: unknown): Status<MicrobenchConfig> {
  const config = defaultConfig();

  if (raw === void 0 || raw === null) {
    return Status.value(config);
  }

  if (!isObject(raw)) {
    return Status.err('Configuration must be an object');
  }

  const sampler = raw.sampler;

  if (sampler === void 0) {
    return Status.value(config);
  }

  if (!isObject(sampler)) {
    return Status.err('sampler must be an object');
  }

  const partial: Partial<Options> = {};
  const { warmupRuns, replan, buckets } = sampler;

  if (warmupRuns !== void 0) {
    if (typeof warmupRuns !== 'number' || !Number.isInteger(warmupRuns) || warmupRuns < 1) {
      return Status.err('sampler.warmupRuns must be a positive integer');
    }
    partial.warmupRuns = warmupRuns;
  }

  if (replan !== void 0) {
    const cadence = REPLAN_CADENCES.find(c => c === replan);
    if (cadence === void 0) {
      return Status.err(`sampler.replan must be one of ${REPLAN_CADENCES.join(', ')}`);
    }
    partial.replan = cadence;
  }

  if (buckets !== void 0) {
    if (!Array.isArray(buckets)) {
      return Status.err('sampler.buckets must be an array');
    }

    const table: planner.LatencyBucket[] = [];
    for (let i = 0; i < buckets.length; i++) {
      const b = parseBucket(buckets[i], i);
      if (Status.isErr(b)) return Status.err(b[1]);
      table.push(b[0]);
    }

    const valid = planner.validateBuckets(table);
    if (Status.isErr(valid)) {
      return Status.err(`sampler.buckets: ${valid[1].message}`);
    }
    partial.buckets = table;
  }

  return Status.value(assignDeep(config, { sampler: partial }));
}

/** Find and load the configuration for the given directory */
export async function load(rootDir: string): Promise<Status<MicrobenchConfig>> {
  const cached = sessionConfigs.get(rootDir);
  if (cached !== void 0) {
    return Status.value(cached);
  }

  let found: Awaited<ReturnType<typeof explorer.search>>;
  try {
    found = await explorer.search(rootDir);
  } catch (e) {
    return Status.err(toError(e));
  }

  if (found === null || found.isEmpty) {
    dbg('Config file not found');
  } else {
    dbg('Loading (%s)', found.filepath);
  }

  const config: unknown = found?.isEmpty ? void 0 : found?.config;
  const result = parse(config);

  if (Status.isErr(result)) {
    const where = found?.filepath ?? rootDir;
    return Status.err(new Error(`Invalid configuration (${where}): ${result[1].message}`));
  }

  dbg('%o', result[0]);
  sessionConfigs.set(rootDir, result[0]);

  return result;
}
