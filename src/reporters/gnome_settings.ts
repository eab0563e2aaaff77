/**
 * reporters/gnome_settings.ts
 *
 * Desktop-wide interface preferences (GSettings). Strings print quoted,
 * doubles with two decimals; other value types are not decoded.
 */

import { Reporter, ReportContext, ReportSection, SettingValue } from '../core/types';
import { registry } from '../core/registry';
import { PREFERENCE_KEYS, PREFERENCE_SCHEMA } from '../core/catalog';
import { fixed, placeholder, quoted, row } from '../core/format';

export function formatPreference(value: SettingValue): string {
  switch (value.kind) {
    case 'missing': return placeholder('unset');
    case 'string':  return quoted(value.value);
    case 'float':   return fixed(value.value);
    default:        return placeholder('unknown type');
  }
}

const gnomeSettings: Reporter = {
  name: 'gnome_settings',
  order: 30,

  async run(ctx: ReportContext): Promise<ReportSection> {
    const store = ctx.preferences.open(PREFERENCE_SCHEMA);
    const rows = PREFERENCE_KEYS.map(key => row(key, formatPreference(store.get(key))));
    return { title: `GSettings (${store.schema}):`, rows };
  }
};

registry.register(gnomeSettings);

export default gnomeSettings;
