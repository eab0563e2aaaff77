/**
 * core/parser/font_description.ts
 *
 * Pango font description strings, e.g. "Cantarell Bold Italic 11" or
 * "DejaVu Sans, 13px". Grammar, read right to left:
 *
 *   [FAMILY-LIST] [STYLE-WORDS] [SIZE]
 *
 * SIZE is a decimal number, optionally suffixed with "px" for an
 * absolute (device pixel) size. STYLE-WORDS are weight, slant, stretch,
 * variant and gravity names. A word matches a name case-insensitively,
 * and the hyphens in the name are optional: "Semibold" and "semi-bold"
 * both read as Semi-Bold.
 */

import {
  FontDescription,
  FontGravity,
  FontSlant,
  FontStretch,
  FontVariant,
  PANGO_SCALE
} from '../types';

export const WEIGHT_NORMAL = 400;
export const WEIGHT_BOLD = 700;

/** Name → value. Where several names share a value, the first is the one written out. */
type StyleTable<T> = ReadonlyArray<readonly [string, T]>;

const WEIGHT_WORDS: StyleTable<number> = [
  ['Thin', 100],
  ['Ultra-Light', 200],
  ['Extra-Light', 200],
  ['Light', 300],
  ['Semi-Light', 350],
  ['Demi-Light', 350],
  ['Book', 380],
  ['Regular', 400],
  ['Medium', 500],
  ['Semi-Bold', 600],
  ['Demi-Bold', 600],
  ['Bold', 700],
  ['Ultra-Bold', 800],
  ['Extra-Bold', 800],
  ['Heavy', 900],
  ['Black', 900],
  ['Ultra-Heavy', 1000],
  ['Extra-Heavy', 1000]
];

const SLANT_WORDS: StyleTable<FontSlant> = [
  ['Roman', 'normal'],
  ['Oblique', 'oblique'],
  ['Italic', 'italic']
];

const STRETCH_WORDS: StyleTable<FontStretch> = [
  ['Ultra-Condensed', 'ultra-condensed'],
  ['Extra-Condensed', 'extra-condensed'],
  ['Condensed', 'condensed'],
  ['Semi-Condensed', 'semi-condensed'],
  ['Semi-Expanded', 'semi-expanded'],
  ['Expanded', 'expanded'],
  ['Extra-Expanded', 'extra-expanded'],
  ['Ultra-Expanded', 'ultra-expanded']
];

const VARIANT_WORDS: StyleTable<FontVariant> = [
  ['Small-Caps', 'small-caps'],
  ['All-Small-Caps', 'all-small-caps'],
  ['Petite-Caps', 'petite-caps'],
  ['All-Petite-Caps', 'all-petite-caps'],
  ['Unicase', 'unicase'],
  ['Title-Caps', 'title-caps']
];

const GRAVITY_WORDS: StyleTable<FontGravity> = [
  ['Not-Rotated', 'south'],
  ['South', 'south'],
  ['Upside-Down', 'north'],
  ['North', 'north'],
  ['Rotated-Left', 'east'],
  ['East', 'east'],
  ['Rotated-Right', 'west'],
  ['West', 'west']
];

/** Case-insensitive match in which any hyphen of `name` may be left out of `word`. */
export function styleWordMatches(name: string, word: string): boolean {
  const a = name.toLowerCase();
  const b = word.toLowerCase();
  let i = 0;
  let j = 0;
  while (i < a.length && j < b.length) {
    if (a[i] === b[j]) {
      i++;
      j++;
    } else if (a[i] === '-') {
      i++;
    } else {
      return false;
    }
  }
  return i === a.length && j === b.length;
}

function lookup<T>(table: StyleTable<T>, word: string): T | undefined {
  return table.find(([name]) => styleWordMatches(name, word))?.[1];
}

function nameOf<T>(table: StyleTable<T>, value: T): string | undefined {
  return table.find(([, v]) => v === value)?.[0];
}

const SIZE_PATTERN = /^(\d+(?:\.\d*)?|\.\d+)(px)?$/i;

export function emptyDescription(): FontDescription {
  return {
    family: null,
    weight: WEIGHT_NORMAL,
    slant: 'normal',
    stretch: 'normal',
    variant: 'normal',
    gravity: 'south',
    size: 0,
    sizeIsAbsolute: false
  };
}

/** Applies one style word. Returns false when the word is not a style word. */
function applyStyleWord(desc: FontDescription, word: string): boolean {
  if (styleWordMatches('Normal', word)) return true;

  const weight = lookup(WEIGHT_WORDS, word);
  if (weight !== undefined) {
    desc.weight = weight;
    return true;
  }
  const slant = lookup(SLANT_WORDS, word);
  if (slant !== undefined) {
    desc.slant = slant;
    return true;
  }
  const stretch = lookup(STRETCH_WORDS, word);
  if (stretch !== undefined) {
    desc.stretch = stretch;
    return true;
  }
  const variant = lookup(VARIANT_WORDS, word);
  if (variant !== undefined) {
    desc.variant = variant;
    return true;
  }
  const gravity = lookup(GRAVITY_WORDS, word);
  if (gravity !== undefined) {
    desc.gravity = gravity;
    return true;
  }
  return false;
}

/** Splits off the last word, treating both spaces and commas as separators. */
function splitLastWord(text: string): [string, string] {
  const trimmed = text.replace(/[\s,]+$/, '');
  const match = /^(.*?)[\s,]*([^\s,]+)$/s.exec(trimmed);
  if (!match) return ['', ''];
  return [match[1], match[2]];
}

export function parseFontDescription(text: string): FontDescription {
  const desc = emptyDescription();
  let rest = text.trim();

  let [head, word] = splitLastWord(rest);
  const size = SIZE_PATTERN.exec(word);
  if (size) {
    desc.size = Math.round(parseFloat(size[1]) * PANGO_SCALE);
    desc.sizeIsAbsolute = size[2] !== undefined;
    rest = head;
    [head, word] = splitLastWord(rest);
  }

  while (word !== '' && applyStyleWord(desc, word)) {
    rest = head;
    [head, word] = splitLastWord(rest);
  }

  const family = rest.replace(/[\s,]+$/, '').trim();
  desc.family = family === '' ? null : family;
  return desc;
}

function formatSize(size: number): string {
  // Shortest decimal that round-trips, like g_ascii_dtostr.
  return String(size / PANGO_SCALE);
}

/** True when the family's last word would be read back as a style word or size. */
function familyNeedsComma(family: string): boolean {
  const [, last] = splitLastWord(family);
  return SIZE_PATTERN.test(last) || applyStyleWord(emptyDescription(), last);
}

/** Inverse of parseFontDescription, in Pango's word order. */
export function fontDescriptionToString(desc: FontDescription): string {
  const words: string[] = [];
  if (desc.family) {
    words.push(familyNeedsComma(desc.family) ? `${desc.family},` : desc.family);
  }

  if (desc.weight !== WEIGHT_NORMAL) {
    words.push(nameOf(WEIGHT_WORDS, desc.weight) ?? String(desc.weight));
  }
  if (desc.slant !== 'normal') words.push(nameOf(SLANT_WORDS, desc.slant) ?? desc.slant);
  if (desc.stretch !== 'normal') words.push(nameOf(STRETCH_WORDS, desc.stretch) ?? desc.stretch);
  if (desc.variant !== 'normal') words.push(nameOf(VARIANT_WORDS, desc.variant) ?? desc.variant);
  if (desc.gravity !== 'south') words.push(nameOf(GRAVITY_WORDS, desc.gravity) ?? desc.gravity);

  if (words.length === 0) words.push('Normal');

  if (desc.size > 0) {
    words.push(formatSize(desc.size) + (desc.sizeIsAbsolute ? 'px' : ''));
  }
  return words.join(' ');
}
