/**
 * reporters/gtk_styles.ts
 *
 * The font the active theme resolves for a few representative widgets.
 * Each widget is created for the lookup and released straight after.
 */

import { Reporter, ReportContext, ReportSection } from '../core/types';
import { registry } from '../core/registry';
import { WIDGET_KINDS } from '../core/catalog';
import { withWidget } from '../core/context';
import { placeholder, quoted, row } from '../core/format';

const gtkStyles: Reporter = {
  name: 'gtk_styles',
  order: 20,

  async run(ctx: ReportContext): Promise<ReportSection> {
    const rows = WIDGET_KINDS.map(kind =>
      withWidget(ctx.toolkit, kind, widget => {
        const font = widget.fontDescription();
        return row(widget.typeName, font === null ? placeholder('unset') : quoted(font));
      })
    );
    return { title: `${ctx.toolkit.name} styles:`, rows };
  }
};

registry.register(gtkStyles);

export default gtkStyles;
