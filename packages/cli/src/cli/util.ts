import * as util from 'node:util';

import chalk from 'chalk';
import { Status } from '@microbench/base';

/** Somewhere to write text: process.stdout, process.stderr or a test double */
export interface Output {
  write(chunk: string): unknown;
  readonly isTTY?: boolean;
}

export function println(...lines: string[]): void {
  if (lines.length === 0) {
    process.stdout.write('\n');
  } else {
    for (const line of lines) {
      process.stdout.write(line + '\n');
    }
  }
}

export function eprintf(fmt: string, ...args: unknown[]) {
  process.stderr.write(chalk.red(util.format(fmt, ...args)));
}

export function panic(s: Error): never {
  eprintf('%O\n', s);
  process.exit(1);
}

/** The status value, or process.exit(1) if given an error status */
export function orPanic<T>(s: Status<T>): T {
  if (Status.isErr(s)) {
    panic(s[1]);
  }
  return s[0];
}

const ansiMatch = [
  '[\\u001B\\u009B][[\\]()#;?]*(?:(?:(?:(?:;[-a-zA-Z\\d\\/#&.:=?%@~_]+)*|[a-zA-Z\\d]+(?:;[-a-zA-Z\\d\\/#&.:=?%@~_]*)*)?\\u0007)',
  '(?:(?:\\d{1,4}(?:;\\d{0,4})*)?[\\dA-PR-TZcf-nq-uy=><~]))',
].join('|');

export function ansiRegex(onlyFirst?: boolean) {
  return new RegExp(ansiMatch, onlyFirst ? undefined : 'g');
}

export function stripAnsi(str: string) {
  return str.replace(ansiRegex(), '');
}

export function visibleWidth(str: string) {
  return stripAnsi(str).length;
}

/** Right-align text to the given visible width */
export function padStart(str: string, width: number) {
  const w = visibleWidth(str);
  return w < width ? ' '.repeat(width - w) + str : str;
}
