/**
 * core/parser/xdpyinfo.ts
 *
 * Pulls the default screen's geometry out of an `xdpyinfo` report:
 *
 *   default screen number:    0
 *   ...
 *   screen #0:
 *     dimensions:    1920x1080 pixels (508x286 millimeters)
 */

import { ScreenGeometry } from '../types';
import { ParseError } from '../errors';

const DEFAULT_SCREEN = /^default screen number:\s*(\d+)/m;
const DIMENSIONS = /^\s*dimensions:\s*(\d+)x(\d+) pixels \((\d+)x(\d+) millimeters\)/;

export function parseXdpyinfo(report: string): ScreenGeometry {
  const screenMatch = DEFAULT_SCREEN.exec(report);
  const screen = screenMatch ? parseInt(screenMatch[1], 10) : 0;

  let inScreen = false;
  for (const line of report.split('\n')) {
    const header = /^screen #(\d+):/.exec(line);
    if (header) {
      inScreen = parseInt(header[1], 10) === screen;
      continue;
    }
    if (!inScreen) continue;

    const dims = DIMENSIONS.exec(line);
    if (dims) {
      const [widthPx, heightPx, widthMm, heightMm] = dims.slice(1, 5).map(n => parseInt(n, 10));
      return { widthPx, heightPx, widthMm, heightMm };
    }
  }

  throw new ParseError('xdpyinfo report', `no dimensions for screen #${screen}`);
}

/** pixels * 25.4 / millimetres. A zero physical size yields Infinity or NaN. */
export function dotsPerInch(pixels: number, millimetres: number): number {
  return (pixels * 25.4) / millimetres;
}
