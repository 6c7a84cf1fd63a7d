import chalk from 'chalk';
import { padStart, stripAnsi, visibleWidth } from './util.js';

describe('ansi', () => {
  test('stripAnsi removes styling', () => {
    expect(stripAnsi('\x1b[1m\x1b[32mok\x1b[39m\x1b[22m')).toBe('ok');
    expect(stripAnsi('\x1b[?25l')).toBe('');
  });

  test('visibleWidth ignores styling', () => {
    const c = new chalk.Instance({ level: 1 });
    expect(visibleWidth(c.bold.red('abc'))).toBe(3);
  });

  test('padStart pads by visible width', () => {
    expect(padStart('\x1b[1mab\x1b[22m', 4)).toBe('  \x1b[1mab\x1b[22m');
    expect(padStart('abcdef', 4)).toBe('abcdef');
  });
});
