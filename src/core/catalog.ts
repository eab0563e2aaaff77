/**
 * core/catalog.ts
 *
 * The fixed lists of settings each reporter prints, in print order.
 */

import { WidgetKind } from './types';

export type ToolkitSettingFormat = 'string' | 'tristate' | 'dpi';

export const TOOLKIT_SETTINGS: ReadonlyArray<{ name: string; format: ToolkitSettingFormat }> = [
  { name: 'gtk-font-name', format: 'string' },
  { name: 'gtk-xft-antialias', format: 'tristate' },
  { name: 'gtk-xft-hinting', format: 'tristate' },
  { name: 'gtk-xft-hintstyle', format: 'string' },
  { name: 'gtk-xft-rgba', format: 'string' },
  { name: 'gtk-xft-dpi', format: 'dpi' }
];

export const WIDGET_KINDS: readonly WidgetKind[] = ['label', 'menu-item', 'toolbar'];

export const PREFERENCE_SCHEMA = 'org.gnome.desktop.interface';

export const PREFERENCE_KEYS: readonly string[] = ['font-name', 'text-scaling-factor'];

export const XRM_RESOURCES: readonly string[] = [
  'Xft.antialias',
  'Xft.hinting',
  'Xft.hintstyle',
  'Xft.rgba',
  'Xft.dpi'
];
