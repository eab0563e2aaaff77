/**
 * reporters/x_display.ts
 *
 * Default screen size in pixels and millimetres, and the DPI they imply.
 */

import { Reporter, ReportContext, ReportSection, ScreenGeometry } from '../core/types';
import { registry } from '../core/registry';
import { dotsPerInch } from '../core/parser/xdpyinfo';
import { fixed, row } from '../core/format';

export function geometryRows(geometry: ScreenGeometry): string[] {
  const { widthPx, heightPx, widthMm, heightMm } = geometry;
  const xDpi = dotsPerInch(widthPx, widthMm);
  const yDpi = dotsPerInch(heightPx, heightMm);
  return [
    row('screen pixels', `${widthPx}x${heightPx}`),
    row('screen size', `${widthMm}x${heightMm} mm (${fixed(xDpi)}x${fixed(yDpi)} DPI)`)
  ];
}

const xDisplay: Reporter = {
  name: 'x_display',
  order: 40,

  async run(ctx: ReportContext): Promise<ReportSection> {
    return { title: 'X11 display info:', rows: geometryRows(ctx.display.screenGeometry()) };
  }
};

registry.register(xDisplay);

export default xDisplay;
