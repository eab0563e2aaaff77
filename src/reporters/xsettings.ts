/**
 * reporters/xsettings.ts
 *
 * Live XSETTINGS as broadcast by the settings daemon, read through the
 * dump_xsettings helper. Without the helper there is nothing to show
 * but a pointer to where it comes from.
 */

import { Reporter, ReportContext, ReportSection } from '../core/types';
import { registry } from '../core/registry';
import { filterXSettings } from '../core/parser/xsettings_dump';
import { row } from '../core/format';

export const INSTALL_HINT: readonly string[] = [
  'Install dump_xsettings from https://code.google.com/p/xsettingsd/',
  'to print this information.'
];

const xSettings: Reporter = {
  name: 'xsettings',
  order: 60,

  async run(ctx: ReportContext): Promise<ReportSection> {
    const title = 'XSETTINGS:';
    const dump = ctx.xsettings.dump();
    if (!dump.ok) {
      return { title, rows: [...INSTALL_HINT] };
    }

    // The helper ran, but an empty filter result is reported the same way.
    const entries = filterXSettings(dump.output);
    if (entries.length === 0) {
      return { title, rows: [...INSTALL_HINT] };
    }
    return { title, rows: entries.map(e => row(e.name, e.value)) };
  }
};

registry.register(xSettings);

export default xSettings;
