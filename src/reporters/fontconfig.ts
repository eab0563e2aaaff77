/**
 * reporters/fontconfig.ts
 *
 * Asks the font matcher what a description actually resolves to, and with
 * which rendering settings. The description comes from -f, or else from
 * the theme font of a scratch label; -b and -i add explicit weight and
 * slant to the query.
 *
 * Absolute sizes ("Sans 10px") go into the query as pixel size, others
 * as whole points. Never both.
 */

import {
  FontDescription,
  FontQuery,
  MatchField,
  MatchedFont,
  PANGO_SCALE,
  Reporter,
  ReportContext,
  ReportOptions,
  ReportSection
} from '../core/types';
import { registry } from '../core/registry';
import { PreconditionError } from '../core/errors';
import { withWidget } from '../core/context';
import { fixed, placeholder, row } from '../core/format';
import { fontDescriptionToString, parseFontDescription } from '../core/parser/font_description';
import {
  FC_ANTIALIAS,
  FC_AUTOHINT,
  FC_FAMILY,
  FC_HINT_STYLE,
  FC_HINTING,
  FC_PIXEL_SIZE,
  FC_RGBA,
  FC_SIZE,
  FC_SLANT_ITALIC,
  FC_WEIGHT_BOLD,
  failureToken,
  hintStyleName,
  rgbaName
} from '../core/parser/fc_pattern';

// ---------------------------------------------------------------------------
// Query construction
// ---------------------------------------------------------------------------

export function resolveDescription(ctx: ReportContext): FontDescription {
  if (ctx.options.fontDescription !== undefined) {
    return parseFontDescription(ctx.options.fontDescription);
  }

  const themed = withWidget(ctx.toolkit, 'label', widget => widget.fontDescription());
  if (themed === null) {
    throw new PreconditionError('toolkit', 'The theme sets no font for labels; pass one with -f');
  }
  return parseFontDescription(themed);
}

export function buildFontQuery(desc: FontDescription, options: Pick<ReportOptions, 'bold' | 'italic'>): FontQuery {
  const query: FontQuery = {
    family: desc.family,
    size: desc.sizeIsAbsolute
      ? { unit: 'pixels', value: desc.size / PANGO_SCALE }
      : { unit: 'points', value: Math.trunc(desc.size / PANGO_SCALE) }
  };
  if (options.bold) query.weight = FC_WEIGHT_BOLD;
  if (options.italic) query.slant = FC_SLANT_ITALIC;
  return query;
}

export function requestRows(query: FontQuery): string[] {
  const rows: string[] = [];
  if (query.weight !== undefined) rows.push(row('requested weight', 'FC_WEIGHT_BOLD'));
  if (query.slant !== undefined) rows.push(row('requested slant', 'FC_SLANT_ITALIC'));
  rows.push(row('requested size',
    query.size.unit === 'pixels' ? `${fixed(query.size.value)} pixels` : `${query.size.value} points`));
  return rows;
}

// ---------------------------------------------------------------------------
// Match result
// ---------------------------------------------------------------------------

function field<T>(object: string, result: MatchField<T>, render: (value: T) => string): string {
  return row(object, result.found ? render(result.value) : placeholder(failureToken(result.reason)));
}

export function matchRows(match: MatchedFont): string[] {
  return [
    field(FC_FAMILY, match.getString(FC_FAMILY), v => v),
    field(FC_PIXEL_SIZE, match.getDouble(FC_PIXEL_SIZE), v => `${fixed(v)} pixels`),
    field(FC_SIZE, match.getInteger(FC_SIZE), v => `${v} points`),
    field(FC_ANTIALIAS, match.getBool(FC_ANTIALIAS), String),
    field(FC_HINTING, match.getBool(FC_HINTING), String),
    field(FC_AUTOHINT, match.getBool(FC_AUTOHINT), String),
    field(FC_HINT_STYLE, match.getInteger(FC_HINT_STYLE), v => `${v} (${hintStyleName(v)})`),
    field(FC_RGBA, match.getInteger(FC_RGBA), v => `${v} (${rgbaName(v)})`)
  ];
}

const fontconfig: Reporter = {
  name: 'fontconfig',
  order: 70,

  async run(ctx: ReportContext): Promise<ReportSection> {
    const desc = resolveDescription(ctx);
    const query = buildFontQuery(desc, ctx.options);
    const match = ctx.fonts.match(query);
    return {
      title: `Fontconfig (${fontDescriptionToString(desc)}):`,
      rows: [...requestRows(query), ...matchRows(match)]
    };
  }
};

registry.register(fontconfig);

export default fontconfig;
