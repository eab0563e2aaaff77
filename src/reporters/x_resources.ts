/**
 * reporters/x_resources.ts
 *
 * Xft entries from the legacy X resource database (what `xrdb -query`
 * shows). Values are capped at 255 bytes.
 */

import { Reporter, ReportContext, ReportSection } from '../core/types';
import { registry } from '../core/registry';
import { XRM_RESOURCES } from '../core/catalog';
import { XrmDatabase, truncateUtf8 } from '../core/parser/xrm_database';
import { placeholder, quoted, row } from '../core/format';
import { scopedLogger } from '../core/logger';

const log = scopedLogger('reporters/x_resources');

export function resourceRows(data: string): string[] {
  const db = XrmDatabase.parse(data);
  return XRM_RESOURCES.map(name => {
    const value = db.get(name);
    if (value === null) return row(name, placeholder('unset'));

    const { text, truncated } = truncateUtf8(value);
    if (truncated) {
      log.debug({ name, bytes: Buffer.byteLength(value) }, 'Resource value truncated');
    }
    return row(name, quoted(text));
  });
}

const xResources: Reporter = {
  name: 'x_resources',
  order: 50,

  async run(ctx: ReportContext): Promise<ReportSection> {
    const title = 'X resources (xrdb):';
    const data = ctx.resources.resourceManagerString();
    if (data === null) {
      return { title, rows: [placeholder('failed')] };
    }
    return { title, rows: resourceRows(data) };
  }
};

registry.register(xResources);

export default xResources;
