import { benchmark, main } from '@microbench/cli';

/** Split on every occurrence of the delimiter, keeping empty fields */
export function split(text: string, delimiter: string): string[] {
  const fields: string[] = [];
  let start = 0;
  let end = text.indexOf(delimiter);

  while (end !== -1) {
    fields.push(text.slice(start, end));
    start = end + delimiter.length;
    end = text.indexOf(delimiter, start);
  }

  fields.push(text.slice(start));
  return fields;
}

const CSV = 'Year,Make,Model,Description,Price\n1997,Ford,E350,"ac, abs, moon",3000.00';

benchmark('StringSplit', (text: string, delimiter: string) => split(text, delimiter))
  .args('/csv', CSV, ',')
  .args('/lines', CSV, '\n');

benchmark('StringSplit/builtin', () => CSV.split(','));

if (require.main === module) {
  main().catch(e => {
    console.error(e);
    process.exitCode = 1;
  });
}
