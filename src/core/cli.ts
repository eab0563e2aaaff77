/**
 * core/cli.ts
 *
 * getopt-style parsing of "bf:hi": flags may be clustered (-bi), the -f
 * argument may be attached (-fSans) or separate (-f Sans), "--" ends the
 * options and positional arguments are ignored.
 */

import { ReportOptions } from './types';
import { HelpRequestedError, UsageError } from './errors';

export function usage(program: string): string {
  return [
    `Usage: ${program} [options]`,
    '',
    'Options:',
    '  -b       Request bold font from Fontconfig',
    '  -f DESC  Specify Pango font description for Fontconfig',
    '  -i       Request italic font from Fontconfig',
    ''
  ].join('\n');
}

export function parseArgs(argv: string[]): ReportOptions {
  const options: ReportOptions = { bold: false, italic: false };

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg === '--') break;
    if (!arg.startsWith('-') || arg === '-') continue;

    for (let j = 1; j < arg.length; j++) {
      const flag = arg[j];
      switch (flag) {
        case 'b':
          options.bold = true;
          break;
        case 'i':
          options.italic = true;
          break;
        case 'f': {
          const attached = arg.slice(j + 1);
          if (attached !== '') {
            options.fontDescription = attached;
          } else if (i + 1 < argv.length) {
            options.fontDescription = argv[++i];
          } else {
            throw new UsageError('option requires an argument -- \'f\'', { flag });
          }
          j = arg.length; // the rest of this word was the argument
          break;
        }
        case 'h':
          throw new HelpRequestedError();
        default:
          throw new UsageError(`invalid option -- '${flag}'`, { flag });
      }
    }
  }

  return options;
}
