import { writeFile } from 'node:fs/promises';
import { debuglog } from 'node:util';

import { Status, toError } from '@microbench/base';
import type { BenchmarkResult } from '@microbench/core';

import * as csv from './exporters/csv.js';
import * as json from './exporters/json.js';
import * as markdown from './exporters/markdown.js';

const dbg = debuglog('microbench:export');

export const FORMATS = ['csv', 'json', 'md'] as const;

export type Format = (typeof FORMATS)[number];

const serializers: Record<Format, (results: readonly BenchmarkResult[]) => string> = {
  csv: csv.serialize,
  json: json.serialize,
  md: markdown.serialize,
};

export function isFormat(s: string): s is Format {
  return FORMATS.some(f => f === s);
}

export function serialize(format: Format, results: readonly BenchmarkResult[]): string {
  return serializers[format](results);
}

/** Write the results to a file in the given format */
export async function exportResults(
  format: Format,
  results: readonly BenchmarkResult[],
  filename: string,
): Promise<Status<void>> {
  try {
    await writeFile(filename, serialize(format, results), 'utf8');
  } catch (e) {
    return Status.err(toError(e));
  }

  dbg('wrote %d results to %s (%s)', results.length, filename, format);
  return Status.ok;
}
