/**
 * core/parser/xrm_database.ts
 *
 * X resource manager database: the text stored in the root window's
 * RESOURCE_MANAGER property (what `xrdb -query` prints) and lookups
 * against it.
 *
 * Resource specifications bind components tightly ("Xft.dpi") or
 * loosely ("*dpi", "Xft*dpi"); "?" matches any single component.
 * When several entries match a name, precedence is decided level by
 * level from the left:
 *   1. an entry that matches the level explicitly beats one that skips it
 *   2. a name match beats a class match beats "?"
 *   3. a tight binding beats a loose one
 */

type Binding = 'tight' | 'loose';

interface Component {
  binding: Binding;
  name: string;
}

export interface XrmEntry {
  specifier: string;
  components: Component[];
  value: string;
}

/** Per query level: [explicit, kind, tight]. Higher wins. */
type LevelScore = [number, number, number];

const KIND_NAME = 3;
const KIND_CLASS = 2;
const KIND_ANY = 1;

function parseSpecifier(spec: string): Component[] | null {
  const components: Component[] = [];
  let binding: Binding = 'tight';
  let current = '';

  for (const ch of spec.replace(/\s+/g, '')) {
    if (ch === '.' || ch === '*') {
      if (current !== '') {
        components.push({ binding, name: current });
        current = '';
        binding = 'tight';
      }
      if (ch === '*') binding = 'loose';
    } else {
      current += ch;
    }
  }
  if (current === '') return null; // a specifier cannot end in a binding
  components.push({ binding, name: current });
  return components;
}

/** Decodes the escapes allowed in a resource value. */
function unescapeValue(raw: string): string {
  let out = '';
  for (let i = 0; i < raw.length; i++) {
    const ch = raw[i];
    if (ch !== '\\' || i + 1 >= raw.length) {
      out += ch;
      continue;
    }
    const next = raw[i + 1];
    const octal = /^[0-7]{3}/.exec(raw.slice(i + 1));
    if (octal) {
      out += String.fromCharCode(parseInt(octal[0], 8));
      i += 3;
    } else if (next === 'n') {
      out += '\n';
      i += 1;
    } else if (next === '\\' || next === ' ' || next === '\t') {
      out += next;
      i += 1;
    } else {
      out += ch;
    }
  }
  return out;
}

/** Joins physical lines ending in a backslash onto the line that follows. */
function logicalLines(text: string): string[] {
  return text.replace(/\\\r?\n/g, '').split(/\r?\n/);
}

export class XrmDatabase {
  private readonly entries = new Map<string, XrmEntry>();

  static parse(text: string): XrmDatabase {
    const db = new XrmDatabase();
    for (const line of logicalLines(text)) {
      db.putLine(line);
    }
    return db;
  }

  /** Adds one "specifier: value" line. Comments, directives and junk are ignored. */
  putLine(line: string): void {
    const trimmed = line.replace(/^[ \t]+/, '');
    if (trimmed === '' || trimmed.startsWith('!') || trimmed.startsWith('#')) return;

    const colon = trimmed.indexOf(':');
    if (colon < 0) return;

    const components = parseSpecifier(trimmed.slice(0, colon));
    if (!components) return;

    const specifier = components.map((c, i) => (c.binding === 'loose' ? '*' : i === 0 ? '' : '.') + c.name).join('');
    const value = unescapeValue(trimmed.slice(colon + 1).replace(/^[ \t]+/, ''));
    this.entries.set(specifier, { specifier, components, value });
  }

  get size(): number {
    return this.entries.size;
  }

  /**
   * Looks up a fully qualified resource, e.g. get("Xft.dpi").
   * `className` uses the same dotted form; pass "" when there is none.
   */
  get(name: string, className = ''): string | null {
    const names = name.split('.');
    const classes = className === '' ? [] : className.split('.');

    let best: { entry: XrmEntry; score: LevelScore[] } | null = null;
    for (const entry of this.entries.values()) {
      const score = bestMatch(entry.components, 0, names, classes, 0);
      if (score && (!best || compareScores(score, best.score) > 0)) {
        best = { entry, score };
      }
    }
    return best ? best.entry.value : null;
  }
}

function componentKind(component: string, level: number, names: string[], classes: string[]): number {
  if (component === names[level]) return KIND_NAME;
  if (component === classes[level]) return KIND_CLASS;
  if (component === '?') return KIND_ANY;
  return 0;
}

/** Best score for matching components[ci..] against query levels [level..], or null. */
function bestMatch(
  components: Component[],
  ci: number,
  names: string[],
  classes: string[],
  level: number
): LevelScore[] | null {
  if (ci === components.length) return level === names.length ? [] : null;
  if (level === names.length) return null;

  const component = components[ci];
  const candidates: LevelScore[][] = [];

  const kind = componentKind(component.name, level, names, classes);
  if (kind > 0) {
    const rest = bestMatch(components, ci + 1, names, classes, level + 1);
    if (rest) candidates.push([[1, kind, component.binding === 'tight' ? 1 : 0], ...rest]);
  }
  if (component.binding === 'loose') {
    const rest = bestMatch(components, ci, names, classes, level + 1);
    if (rest) candidates.push([[0, 0, 0], ...rest]);
  }

  let best: LevelScore[] | null = null;
  for (const candidate of candidates) {
    if (!best || compareScores(candidate, best) > 0) best = candidate;
  }
  return best;
}

function compareScores(a: LevelScore[], b: LevelScore[]): number {
  for (let level = 0; level < a.length && level < b.length; level++) {
    for (let rule = 0; rule < 3; rule++) {
      const diff = a[level][rule] - b[level][rule];
      if (diff !== 0) return diff;
    }
  }
  return 0;
}

export const XRM_VALUE_MAX_BYTES = 255;

/**
 * Cuts `value` to at most `maxBytes` bytes of UTF-8 without splitting a
 * character.
 */
export function truncateUtf8(value: string, maxBytes = XRM_VALUE_MAX_BYTES): { text: string; truncated: boolean } {
  const bytes = Buffer.from(value, 'utf-8');
  if (bytes.length <= maxBytes) return { text: value, truncated: false };

  let end = maxBytes;
  // Step back over continuation bytes (10xxxxxx) to a character boundary.
  while (end > 0 && (bytes[end] & 0xc0) === 0x80) end--;
  return { text: bytes.subarray(0, end).toString('utf-8'), truncated: true };
}
