import { isObject, RecursivePartial } from './util.js';

const assignDeepImpl = (target: Record<string, unknown>, source: Record<string, unknown>) => {
  for (const key of Object.keys(source)) {
    const value = source[key];
    const existing = target[key];

    if (value === void 0) continue;

    if (!isObject(value)) {
      target[key] = value;
    } else if (isObject(existing)) {
      assignDeepImpl(existing, value);
    } else {
      // copy, so later sources don't write through to this one
      const copy: Record<string, unknown> = {};
      assignDeepImpl(copy, value);
      target[key] = copy;
    }
  }
};

/**
 * Merge each source in to the target, recursing in to plain objects.
 * Arrays and other values are replaced, never merged.
 */
export function assignDeep<T extends object>(target: T, ...sources: RecursivePartial<T>[]): T {
  for (const object of sources) {
    if (isObject(target) && isObject(object)) {
      assignDeepImpl(target, object);
    }
  }

  return target;
}
