/**
 * core/format.ts
 *
 * Line formatting shared by every reporter. A row is a label padded to a
 * fixed column followed by the value; a section is a title, its rows and
 * a blank line.
 */

import { ReportSection, SettingValue } from './types';

export const LABEL_WIDTH = 20;

/** printf("%-20s %s") */
export function row(label: string, value: string): string {
  return `${label.padEnd(LABEL_WIDTH)} ${value}`;
}

export function quoted(value: string): string {
  return `"${value}"`;
}

/** Placeholder tokens are always bracketed so they never read as values. */
export function placeholder(token: string): string {
  return `[${token}]`;
}

/** Extra digits used to see whether a value sits exactly halfway. */
const TIE_PROBE_DIGITS = 30;

/**
 * printf("%.Nf"): values exactly halfway round to the even digit
 * (1.125 → "1.12"), and non-finite values are spelled nan, inf and -inf.
 */
export function fixed(value: number, digits = 2): string {
  if (Number.isNaN(value)) return 'nan';
  if (value === Infinity) return 'inf';
  if (value === -Infinity) return '-inf';

  // toFixed rounds halves away from zero; only exact halves need correcting.
  const rounded = value.toFixed(digits);
  if (Math.abs(value) >= 1e21) return rounded;

  const wide = value.toFixed(digits + TIE_PROBE_DIGITS);
  const cut = wide.length - TIE_PROBE_DIGITS;
  if (!/^50*$/.test(wide.slice(cut))) return rounded;

  const truncated = wide.slice(0, digits === 0 ? cut - 1 : cut);
  const lastDigit = Number(truncated[truncated.length - 1]);
  return lastDigit % 2 === 0 ? truncated : rounded;
}

/** Toolkit booleans are ints: -1 default, 0 false, anything above 0 true. */
export function formatTriState(value: number): string {
  const meaning = value === 0 ? 'no' : value > 0 ? 'yes' : 'default';
  return `${value} (${meaning})`;
}

/** The toolkit stores DPI multiplied by 1024; zero or less means "not set". */
export function formatXftDpi(value: number): string {
  if (value > 0) return `${value} (${fixed(value / 1024)} DPI)`;
  return `${value} (default)`;
}

export function describeValue(value: SettingValue): string {
  switch (value.kind) {
    case 'missing': return placeholder('unset');
    case 'bool':    return value.value ? 'true' : 'false';
    case 'int':     return String(value.value);
    case 'float':   return fixed(value.value);
    case 'string':  return quoted(value.value);
    case 'other':   return placeholder('unknown type');
  }
}

export function renderSection(section: ReportSection): string[] {
  return [section.title, ...section.rows, ''];
}

const WEEKDAYS = ['Sun', 'Mon', 'Tue', 'Wed', 'Thu', 'Fri', 'Sat'];
const MONTHS = ['Jan', 'Feb', 'Mar', 'Apr', 'May', 'Jun', 'Jul', 'Aug', 'Sep', 'Oct', 'Nov', 'Dec'];

function pad2(n: number): string {
  return String(n).padStart(2, '0');
}

/** Local time in ctime(3) layout, without the trailing newline. */
export function formatCtime(date: Date): string {
  const day = String(date.getDate()).padStart(2, ' ');
  const time = `${pad2(date.getHours())}:${pad2(date.getMinutes())}:${pad2(date.getSeconds())}`;
  return `${WEEKDAYS[date.getDay()]} ${MONTHS[date.getMonth()]} ${day} ${time} ${date.getFullYear()}`;
}
