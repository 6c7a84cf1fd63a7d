const enabled = process.env.NODE_ENV !== 'production';

type Ordered = number | bigint;

function err(msg: string): never {
  throw new Error('[Failed assertion] ' + msg);
}

export function is(val: unknown, msg?: string): void {
  if (enabled) {
    if (!val) err(msg ?? `Expected ${String(val)} to be truthy`);
  }
}

export function le(a: Ordered, b: Ordered, msg?: string): void {
  if (enabled) {
    if (a > b) err(msg ?? `Expected ${a} to be <= ${b}`);
  }
}

export function gt(a: Ordered, b: Ordered, msg?: string): void {
  if (enabled) {
    if (a <= b) err(msg ?? `Expected ${a} to be > ${b}`);
  }
}

export function gte(a: Ordered, b: Ordered, msg?: string): void {
  if (enabled) {
    if (a < b) err(msg ?? `Expected ${a} to be >= ${b}`);
  }
}
