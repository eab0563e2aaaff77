/**
 * core/context.ts
 *
 * Scoped acquisition for toolkit widgets: the widget is released when
 * the callback returns or throws.
 */

import { ToolkitBackend, ToolkitWidget, WidgetKind } from './types';

export function withWidget<T>(toolkit: ToolkitBackend, kind: WidgetKind, use: (widget: ToolkitWidget) => T): T {
  const widget = toolkit.createWidget(kind);
  try {
    return use(widget);
  } finally {
    widget.release();
  }
}
