import type { Output } from './cli/util.js';

export const HIDE_CURSOR = '\x1b[?25l';
export const SHOW_CURSOR = '\x1b[?25h';

/**
 * Hide the cursor of a terminal while fn runs. The cursor is shown again
 * however fn exits. Streams which aren't terminals are left alone.
 */
export function withHiddenCursor<T>(stream: Output, fn: () => T): T {
  if (!stream.isTTY) {
    return fn();
  }

  stream.write(HIDE_CURSOR);
  try {
    return fn();
  } finally {
    stream.write(SHOW_CURSOR);
  }
}
