//
// Common types
//

export type RecursivePartial<T> = {
  [P in keyof T]?:
    T[P] extends (infer U)[] ? RecursivePartial<U>[] :
    T[P] extends object ? RecursivePartial<T[P]> :
    T[P];
};

//
// Error codes, status, results
//

export type Status<T = unknown> = readonly [null, Error] | readonly [T];

export namespace Status {
  export const ok: Status<void> = Object.freeze([undefined] as const);

  /** Create an error */
  export function err<T = never>(msg: string | Error): Status<T> {
    return typeof msg === 'string'
        ? [null, new Error(msg)]
        : [null, msg];
  }

  /** Check the given status is an error */
  export function isErr<T>(s: Status<T>): s is readonly [null, Error] {
    return s.length === 2;
  }

  export function value<T>(val: T): Status<T> {
    return [val];
  }

  /** Get the status value or throw an exception */
  export function get<T>(s: Status<T>): T {
    if (isErr(s)) { throw s[1]; }
    return s[0];
  }
}

/** Normalize a thrown value to an Error */
export function toError(e: unknown): Error {
  return e instanceof Error ? e : new Error(String(e));
}

//
// Opaque types
//

/** Opaque data type for typescript */
export type As<T> = T & { readonly '': unique symbol };

//
// Helpers
//

export function isObject(item: unknown): item is Record<string, unknown> {
  return item !== null
    && typeof item === 'object'
    && Object.prototype.toString.call(item) === '[object Object]';
}
