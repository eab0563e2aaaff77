/**
 * core/parser/xsettings_dump.ts
 *
 * `dump_xsettings` prints one setting per line, name and value separated
 * by spaces:
 *
 *   Gtk/FontName "Cantarell 11"
 *   Xft/DPI 98304
 *
 * Only the font name and the Xft/ family are of interest here.
 */

const RELEVANT_LINE = /^(Gtk\/FontName |Xft\/)/;

export interface XSettingsEntry {
  name: string;
  value: string;
}

/** Keeps the relevant lines and splits each at its first run of spaces. */
export function filterXSettings(dump: string): XSettingsEntry[] {
  const entries: XSettingsEntry[] = [];
  for (const line of dump.split('\n')) {
    if (!RELEVANT_LINE.test(line)) continue;
    const m = /^(\S*) +(.*)$/.exec(line);
    if (m) entries.push({ name: m[1], value: m[2] });
    else entries.push({ name: line, value: '' });
  }
  return entries;
}
