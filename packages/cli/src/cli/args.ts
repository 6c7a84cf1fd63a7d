import { Command } from 'commander';
import { Status } from '@microbench/base';

import { FORMATS, Format, isFormat } from '../exporters.js';

export interface CliOptions {
  /** Where to export the results, if anywhere */
  export?: { format: Format; filename: string };
}

export function createProgram(): Command {
  return new Command()
    .name('microbench')
    .description(
      'Repeatedly executes a list of registered functions,\n' +
        'statistically analyzing the temporal behavior of code',
    )
    .option(
      '-e, --export_results <format> <filename...>',
      `export benchmark results to <filename>, <format> one of {${FORMATS.join(',')}}`,
    )
    .helpOption('-h, --help', 'print this help message')
    .addHelpText(
      'after',
      [
        '',
        'Export formats:',
        '  csv   comma separated values (CSV) delimited text file',
        '  json  JavaScript Object Notation (JSON) text file',
        '  md    Markdown (md) text file',
      ].join('\n'),
    );
}

/** Parse the command line (including the node executable and script) */
export function parseArgs(argv: string[], program = createProgram()): Status<CliOptions> {
  program.parse(argv);

  const opts = program.opts<{ export_results?: string[] }>();
  const exportArgs = opts.export_results;

  if (exportArgs === void 0) {
    return Status.value({});
  }

  if (exportArgs.length !== 2) {
    return Status.err('--export_results expects a format and a filename');
  }

  const [format, filename] = exportArgs;

  if (!isFormat(format)) {
    return Status.err(`Unknown export format "${format}", expected one of ${FORMATS.join(', ')}`);
  }

  return Status.value({ export: { format, filename } });
}
