import type { BenchmarkResult } from '@microbench/core';
import { COLUMNS, toRecord } from './record.js';

function quote(s: string) {
  return '"' + s.replace(/"/g, '""') + '"';
}

/** Non-finite values are left empty */
function cell(x: string | number) {
  if (typeof x === 'string') return quote(x);
  return Number.isFinite(x) ? String(x) : '';
}

export function serialize(results: readonly BenchmarkResult[]): string {
  const lines = [COLUMNS.join(',')];

  for (const r of results) {
    const record = toRecord(r);
    lines.push(COLUMNS.map(c => cell(record[c])).join(','));
  }

  return lines.join('\n') + '\n';
}
