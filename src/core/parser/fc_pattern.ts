/**
 * core/parser/fc_pattern.ts
 *
 * Fontconfig patterns in both directions:
 *   - formatFontQuery()  FontQuery → pattern string for `fc-match`
 *   - FcPattern.parse()  `fc-match -v` dump → typed element lookup
 *
 * FcPattern's getters follow FcPatternGet*(): a missing element is
 * "no match", a value of the wrong type is "type mismatch", and the
 * numeric getters convert between integer and double.
 */

import { FontQuery, MatchField, MatchFailure, MatchedFont } from '../types';
import { ParseError } from '../errors';

// Object names (FC_FAMILY, FC_PIXEL_SIZE, ...)
export const FC_FAMILY = 'family';
export const FC_WEIGHT = 'weight';
export const FC_SLANT = 'slant';
export const FC_SIZE = 'size';
export const FC_PIXEL_SIZE = 'pixelsize';
export const FC_ANTIALIAS = 'antialias';
export const FC_HINTING = 'hinting';
export const FC_AUTOHINT = 'autohint';
export const FC_HINT_STYLE = 'hintstyle';
export const FC_RGBA = 'rgba';

export const FC_WEIGHT_BOLD = 200;
export const FC_SLANT_ITALIC = 100;

export const FC_HINT_STYLES = ['none', 'slight', 'medium', 'full'] as const;
export const FC_RGBA_ORDERS = ['unknown', 'rgb', 'bgr', 'vrgb', 'vbgr', 'none'] as const;

/** Integer → symbolic name, "invalid" for anything outside the enumeration. */
export function hintStyleName(value: number): string {
  return FC_HINT_STYLES[value] ?? 'invalid';
}

export function rgbaName(value: number): string {
  return FC_RGBA_ORDERS[value] ?? 'invalid';
}

const FAILURE_TOKENS: Record<MatchFailure, string> = {
  'no-match': 'no match',
  'type-mismatch': 'type mismatch',
  'no-id': 'no id',
  'out-of-memory': 'out of memory',
  'unknown': 'unknown'
};

export function failureToken(reason: MatchFailure): string {
  return FAILURE_TOKENS[reason];
}

// ---------------------------------------------------------------------------
// Query → pattern string
// ---------------------------------------------------------------------------

function escapeFamily(family: string): string {
  return family.replace(/[\\\-:,]/g, ch => `\\${ch}`);
}

/** Renders a query in fontconfig's name syntax, e.g. "DejaVu Sans:weight=200:size=10". */
export function formatFontQuery(query: FontQuery): string {
  const parts = [query.family ? escapeFamily(query.family) : ''];
  if (query.weight !== undefined) parts.push(`${FC_WEIGHT}=${query.weight}`);
  if (query.slant !== undefined) parts.push(`${FC_SLANT}=${query.slant}`);
  if (query.size.unit === 'pixels') parts.push(`${FC_PIXEL_SIZE}=${query.size.value}`);
  else parts.push(`${FC_SIZE}=${query.size.value}`);
  return parts.join(':');
}

// ---------------------------------------------------------------------------
// `fc-match -v` dump → FcPattern
// ---------------------------------------------------------------------------

export type FcValue =
  | { type: 'string'; value: string }
  | { type: 'integer'; value: number }
  | { type: 'double'; value: number }
  | { type: 'bool'; value: number }         // FcFalse 0, FcTrue 1, FcDontCare 2
  | { type: 'other'; text: string };

const BOOL_WORDS: Record<string, number> = { False: 0, True: 1, DontCare: 2 };

const ELEMENT_LINE = /^\t([a-zA-Z]+): ?(.*)$/;
const CHARSET_PAGE = /^([0-9a-f]{8} ?)+$/;

/** Reads the first value of an element line. */
export function parseFirstValue(text: string): FcValue {
  let m = /^"(.*?)"\((?:s|w|=)\)/.exec(text);
  if (m) return { type: 'string', value: m[1] };

  m = /^(-?\d+)\(i\)/.exec(text);
  if (m) return { type: 'integer', value: parseInt(m[1], 10) };

  m = /^(-?(?:\d+\.?\d*(?:e[-+]?\d+)?|inf|nan))\(f\)/i.exec(text);
  if (m) return { type: 'double', value: parseFloat(m[1].replace(/^(-?)inf$/i, '$1Infinity')) };

  m = /^(True|False|DontCare)\((?:s|w|=)\)/.exec(text);
  if (m) return { type: 'bool', value: BOOL_WORDS[m[1]] };

  return { type: 'other', text };
}

export class FcPattern implements MatchedFont {
  private constructor(private readonly elements: Map<string, FcValue>) {}

  static fromValues(values: Record<string, FcValue>): FcPattern {
    return new FcPattern(new Map(Object.entries(values)));
  }

  static parse(dump: string): FcPattern {
    const lines = dump.split('\n');
    if (!lines.some(line => line.startsWith('Pattern has'))) {
      throw new ParseError('fontconfig pattern', 'missing "Pattern has" header', { head: lines[0] });
    }

    const elements = new Map<string, FcValue>();
    for (const line of lines) {
      const m = ELEMENT_LINE.exec(line);
      if (!m) continue;
      // Charset dumps put one "\tpage: bits" line per page; some pages read like names ("\tface: ...").
      if (CHARSET_PAGE.test(m[2])) continue;
      if (!elements.has(m[1])) elements.set(m[1], parseFirstValue(m[2]));
    }
    return new FcPattern(elements);
  }

  has(object: string): boolean {
    return this.elements.has(object);
  }

  private lookup<T>(object: string, convert: (value: FcValue) => T | null): MatchField<T> {
    const value = this.elements.get(object);
    if (!value) return { found: false, reason: 'no-match' };
    const converted = convert(value);
    if (converted === null) return { found: false, reason: 'type-mismatch' };
    return { found: true, value: converted };
  }

  getString(object: string): MatchField<string> {
    return this.lookup(object, v => (v.type === 'string' ? v.value : null));
  }

  getInteger(object: string): MatchField<number> {
    return this.lookup(object, v => {
      if (v.type === 'integer') return v.value;
      if (v.type === 'double') return Math.trunc(v.value);
      return null;
    });
  }

  getDouble(object: string): MatchField<number> {
    return this.lookup(object, v => (v.type === 'double' || v.type === 'integer' ? v.value : null));
  }

  getBool(object: string): MatchField<number> {
    return this.lookup(object, v => (v.type === 'bool' ? v.value : null));
  }
}
