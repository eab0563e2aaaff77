/**
 * core/parser/gvariant_text.ts
 *
 * Scalar values in GVariant text format, as printed by `gsettings get`.
 * Containers (arrays, tuples, dictionaries, maybes) are not decoded;
 * they come back as `other` with their text intact.
 */

import { SettingValue } from '../types';

const INTEGER_PREFIXES = ['byte', 'int16', 'uint16', 'int32', 'uint32', 'int64', 'uint64', 'handle'];

const SIMPLE_ESCAPES: Record<string, string> = {
  n: '\n',
  t: '\t',
  r: '\r',
  b: '\b',
  f: '\f',
  v: '\v',
  a: '\x07'
};

/** Decodes a single- or double-quoted GVariant string literal. Returns null if `text` is not one. */
export function parseStringLiteral(text: string): string | null {
  const quote = text[0];
  if ((quote !== "'" && quote !== '"') || text.length < 2 || text[text.length - 1] !== quote) {
    return null;
  }

  let out = '';
  const body = text.slice(1, -1);
  for (let i = 0; i < body.length; i++) {
    const ch = body[i];
    if (ch === quote) return null; // unescaped closing quote before the end
    if (ch !== '\\') {
      out += ch;
      continue;
    }

    const next = body[i + 1];
    if (next === undefined) return null;
    if (next === 'u' || next === 'U') {
      const width = next === 'u' ? 4 : 8;
      const hex = body.slice(i + 2, i + 2 + width);
      if (!/^[0-9a-fA-F]+$/.test(hex) || hex.length !== width) return null;
      out += String.fromCodePoint(parseInt(hex, 16));
      i += 1 + width;
    } else {
      out += SIMPLE_ESCAPES[next] ?? next;
      i += 1;
    }
  }
  return out;
}

function parseInteger(text: string): number | null {
  if (/^[-+]?0x[0-9a-fA-F]+$/.test(text)) {
    const negative = text.startsWith('-');
    const value = parseInt(text.replace(/^[-+]/, ''), 16);
    return negative ? -value : value;
  }
  if (/^[-+]?\d+$/.test(text)) return parseInt(text, 10);
  return null;
}

function parseDouble(text: string): number | null {
  if (/^[-+]?inf$/.test(text)) return text.startsWith('-') ? -Infinity : Infinity;
  if (/^[-+]?nan$/.test(text)) return NaN;
  if (/^[-+]?(\d+\.\d*|\.\d+|\d+)([eE][-+]?\d+)?$/.test(text) && /[.eE]/.test(text)) {
    return parseFloat(text);
  }
  return null;
}

export function parseGVariantText(raw: string): SettingValue {
  const text = raw.trim();

  const str = parseStringLiteral(text);
  if (str !== null) return { kind: 'string', value: str };

  if (text === 'true' || text === 'false') return { kind: 'bool', value: text === 'true' };

  const typed = /^(\w+)\s+(.+)$/.exec(text);
  if (typed && INTEGER_PREFIXES.includes(typed[1])) {
    const value = parseInteger(typed[2]);
    if (value !== null) return { kind: 'int', value };
  }
  if (typed && typed[1] === 'double') {
    const value = parseDouble(typed[2]) ?? parseInteger(typed[2]);
    if (value !== null) return { kind: 'float', value };
  }

  const double = parseDouble(text);
  if (double !== null) return { kind: 'float', value: double };

  const integer = parseInteger(text);
  if (integer !== null) return { kind: 'int', value: integer };

  return { kind: 'other', text };
}
