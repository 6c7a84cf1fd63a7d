import { Status } from '@microbench/base';
import { createProgram, parseArgs } from './args.js';

const argv = (...args: string[]) => ['node', 'microbench', ...args];

function program() {
  const out: string[] = [];
  const p = createProgram()
    .exitOverride()
    .configureOutput({ writeOut: s => out.push(s), writeErr: s => out.push(s) });

  return { p, out };
}

describe('parseArgs', () => {
  test('no arguments', () => {
    expect(Status.get(parseArgs(argv(), program().p))).toEqual({});
  });

  test.each([
    [['-e', 'csv', 'out.csv'], { format: 'csv', filename: 'out.csv' }],
    [['--export_results', 'md', 'results.md'], { format: 'md', filename: 'results.md' }],
  ])('export %j', (args, expected) => {
    expect(Status.get(parseArgs(argv(...args), program().p))).toEqual({ export: expected });
  });

  test('rejects an unknown format', () => {
    const s = parseArgs(argv('-e', 'xml', 'out.xml'), program().p);
    expect(Status.isErr(s) && s[1].message).toBe(
      'Unknown export format "xml", expected one of csv, json, md',
    );
  });

  test('rejects a missing filename', () => {
    const s = parseArgs(argv('-e', 'csv'), program().p);
    expect(Status.isErr(s) && s[1].message).toBe('--export_results expects a format and a filename');
  });

  test('rejects values after the filename', () => {
    const s = parseArgs(argv('-e', 'csv', 'out.csv', 'extra'), program().p);
    expect(Status.isErr(s) && s[1].message).toBe('--export_results expects a format and a filename');
  });

  test('help lists the export option and formats', () => {
    const { p, out } = program();

    expect(() => parseArgs(argv('-h'), p)).toThrow();

    const help = out.join('');
    expect(help).toContain('-e, --export_results <format> <filename...>');
    expect(help.split('\n')).toContain('  md    Markdown (md) text file');
  });
});
