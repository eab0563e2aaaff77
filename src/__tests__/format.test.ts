import {
  describeValue,
  fixed,
  formatCtime,
  formatTriState,
  formatXftDpi,
  renderSection,
  row
} from '../core/format';

describe('format', () => {
  it('pads the label to a 20-character column followed by one space', () => {
    expect(row('gtk-font-name', '"Cantarell 11"')).toBe('gtk-font-name        "Cantarell 11"');
    expect(row('requested size', '10 points')).toBe('requested size       10 points');
  });

  it('does not truncate labels longer than the column', () => {
    expect(row('a-very-long-setting-name', 'x')).toBe('a-very-long-setting-name x');
  });

  it('renders toolkit tri-state integers', () => {
    expect(formatTriState(-1)).toBe('-1 (default)');
    expect(formatTriState(0)).toBe('0 (no)');
    expect(formatTriState(1)).toBe('1 (yes)');
    expect(formatTriState(2)).toBe('2 (yes)');
  });

  it('decodes DPI stored as DPI * 1024', () => {
    expect(formatXftDpi(98304)).toBe('98304 (96.00 DPI)');
    expect(formatXftDpi(147456)).toBe('147456 (144.00 DPI)');
    expect(formatXftDpi(-1)).toBe('-1 (default)');
    expect(formatXftDpi(0)).toBe('0 (default)');
  });

  it('spells non-finite floats as printf does', () => {
    expect(fixed(1.25)).toBe('1.25');
    expect(fixed(2)).toBe('2.00');
    expect(fixed(Infinity)).toBe('inf');
    expect(fixed(-Infinity)).toBe('-inf');
    expect(fixed(NaN)).toBe('nan');
  });

  it('rounds exact halves to the even digit', () => {
    expect(fixed(1.125)).toBe('1.12');
    expect(fixed(0.625)).toBe('0.62');
    expect(fixed(10.125)).toBe('10.12');
    expect(fixed(1.375)).toBe('1.38');
    expect(fixed(-1.125)).toBe('-1.12');
    expect(fixed(2.5, 0)).toBe('2');
    expect(fixed(3.5, 0)).toBe('4');
  });

  it('rounds values that only look halfway by their true value', () => {
    expect(fixed(1.005)).toBe('1.00');
    expect(fixed(1.126)).toBe('1.13');
    expect(fixed(0.015)).toBe('0.01');
  });

  it('describes each value kind', () => {
    expect(describeValue({ kind: 'missing' })).toBe('[unset]');
    expect(describeValue({ kind: 'string', value: 'Sans' })).toBe('"Sans"');
    expect(describeValue({ kind: 'float', value: 1.5 })).toBe('1.50');
    expect(describeValue({ kind: 'int', value: 3 })).toBe('3');
    expect(describeValue({ kind: 'bool', value: true })).toBe('true');
    expect(describeValue({ kind: 'other', text: '@as []' })).toBe('[unknown type]');
  });

  it('ends every section with a blank line', () => {
    expect(renderSection({ title: 'XSETTINGS:', rows: ['a', 'b'] })).toEqual(['XSETTINGS:', 'a', 'b', '']);
    expect(renderSection({ title: 'Empty:', rows: [] })).toEqual(['Empty:', '']);
  });

  it('formats local time in ctime layout', () => {
    expect(formatCtime(new Date(2026, 9, 8, 9, 5, 3))).toBe('Thu Oct  8 09:05:03 2026');
    expect(formatCtime(new Date(2026, 9, 18, 23, 17, 0))).toBe('Sun Oct 18 23:17:00 2026');
  });
});
