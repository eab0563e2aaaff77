import { parseArgs, usage } from '../core/cli';
import { HelpRequestedError, UsageError } from '../core/errors';

describe('parseArgs', () => {
  it('defaults to a regular, upright request', () => {
    expect(parseArgs([])).toEqual({ bold: false, italic: false });
  });

  it('reads separate and clustered flags', () => {
    expect(parseArgs(['-b', '-i'])).toEqual({ bold: true, italic: true });
    expect(parseArgs(['-ib'])).toEqual({ bold: true, italic: true });
  });

  it('takes the -f argument attached or from the next word', () => {
    expect(parseArgs(['-f', 'Sans 12'])).toEqual({ bold: false, italic: false, fontDescription: 'Sans 12' });
    expect(parseArgs(['-fSans 12'])).toEqual({ bold: false, italic: false, fontDescription: 'Sans 12' });
    expect(parseArgs(['-bf', 'Serif'])).toEqual({ bold: true, italic: false, fontDescription: 'Serif' });
  });

  it('lets a later -f win', () => {
    expect(parseArgs(['-f', 'Sans', '-f', 'Serif']).fontDescription).toBe('Serif');
  });

  it('ignores positional arguments and stops at "--"', () => {
    expect(parseArgs(['extra', '-b', '--', '-i'])).toEqual({ bold: true, italic: false });
  });

  it('rejects -f without an argument', () => {
    expect(() => parseArgs(['-f'])).toThrow("option requires an argument -- 'f'");
  });

  it('treats -h and unknown flags as usage errors', () => {
    expect(() => parseArgs(['-h'])).toThrow(HelpRequestedError);
    expect(() => parseArgs(['-x'])).toThrow(UsageError);
    expect(() => parseArgs(['-x'])).toThrow("invalid option -- 'x'");
  });
});

describe('usage', () => {
  it('lists every option', () => {
    expect(usage('font-config-report').split('\n')).toEqual([
      'Usage: font-config-report [options]',
      '',
      'Options:',
      '  -b       Request bold font from Fontconfig',
      '  -f DESC  Specify Pango font description for Fontconfig',
      '  -i       Request italic font from Fontconfig',
      ''
    ]);
  });
});
