import * as assert from './assert.js';

/* A read-only view over an array */
export interface ArrayView<T> {
  readonly length: number;
  readonly [n: number]: T;
}

type BinaryPredicate<T, T2 = T> = (a: T, b: T2) => boolean;

/**
 * Returns the index of the first element in the range for which
 * cmp(element, value) is false, or last if no such element is found.
 * @param arr A sorted array with respect to @param cmp
 */
export function lowerBound<T, T2 = T>(
  arr: ArrayView<T>,
  value: T2,
  cmp: BinaryPredicate<T, T2>,
  first = 0,
  count = arr.length - first,
): number {
  assert.le(first + count, arr.length);
  first |= 0;

  let step = 0;

  while (count > 0) {
    let it = first;

    step = count >>> 1;
    it += step;

    if (cmp(arr[it], value)) {
      first = it + 1;
      count -= step + 1;
    } else {
      count = step;
    }
  }

  return first;
}

