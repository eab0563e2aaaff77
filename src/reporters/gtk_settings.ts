/**
 * reporters/gtk_settings.ts
 *
 * The toolkit's global settings object. Antialiasing and hinting are
 * tri-state ints, the DPI is stored multiplied by 1024.
 */

import { Reporter, ReportContext, ReportSection, SettingValue } from '../core/types';
import { registry } from '../core/registry';
import { TOOLKIT_SETTINGS, ToolkitSettingFormat } from '../core/catalog';
import { describeValue, formatTriState, formatXftDpi, placeholder, quoted, row } from '../core/format';

function formatSetting(value: SettingValue, format: ToolkitSettingFormat): string {
  if (value.kind === 'missing') return placeholder('unset');

  const numeric = value.kind === 'int' || value.kind === 'float' ? value.value
    : value.kind === 'bool' ? Number(value.value)
    : null;

  switch (format) {
    case 'string':
      return value.kind === 'string' ? quoted(value.value) : describeValue(value);
    case 'tristate':
      return numeric === null ? placeholder('unknown type') : formatTriState(numeric);
    case 'dpi':
      return numeric === null ? placeholder('unknown type') : formatXftDpi(numeric);
  }
}

export function toolkitSettingRows(ctx: ReportContext): string[] {
  return TOOLKIT_SETTINGS.map(({ name, format }) => row(name, formatSetting(ctx.toolkit.getSetting(name), format)));
}

const gtkSettings: Reporter = {
  name: 'gtk_settings',
  order: 10,

  async run(ctx: ReportContext): Promise<ReportSection> {
    return { title: 'GtkSettings:', rows: toolkitSettingRows(ctx) };
  }
};

// Self-register
registry.register(gtkSettings);

export default gtkSettings;
