import { HIDE_CURSOR, SHOW_CURSOR, withHiddenCursor } from './cursor.js';

function terminal(isTTY = true) {
  const chunks: string[] = [];
  return { chunks, isTTY, write: (s: string) => chunks.push(s) };
}

describe('withHiddenCursor', () => {
  test('hides the cursor while the function runs', () => {
    const t = terminal();
    const result = withHiddenCursor(t, () => {
      t.write('working');
      return 42;
    });

    expect(result).toBe(42);
    expect(t.chunks).toEqual([HIDE_CURSOR, 'working', SHOW_CURSOR]);
  });

  test('shows the cursor when the function throws', () => {
    const t = terminal();

    expect(() =>
      withHiddenCursor(t, () => {
        throw new Error('oops');
      }),
    ).toThrow('oops');

    expect(t.chunks).toEqual([HIDE_CURSOR, SHOW_CURSOR]);
  });

  test('leaves other streams alone', () => {
    const t = terminal(false);
    withHiddenCursor(t, () => 1);

    expect(t.chunks).toEqual([]);
  });
});
