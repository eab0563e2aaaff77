/**
 * backends/gtk_toolkit.ts
 *
 * GTK access through gjs. Initialising the toolkit runs probes/gtk_probe.js
 * once; the probe reads every GtkSettings property in the catalog and the
 * themed font of one scratch widget per kind, destroying each widget
 * before it exits. The snapshot then serves every later lookup.
 *
 * Widget handles still follow acquire/release: createWidget() hands out a
 * handle, release() returns it, dispose() warns about any left over.
 */

import * as path from 'path';
import Ajv from 'ajv';
import {
  CommandPaths,
  MISSING,
  SettingValue,
  ToolkitBackend,
  ToolkitWidget,
  WidgetKind
} from '../core/types';
import { ExecutionError, ParseError, PreconditionError } from '../core/errors';
import { readCommand } from '../core/exec';
import { TOOLKIT_SETTINGS, WIDGET_KINDS } from '../core/catalog';
import { scopedLogger } from '../core/logger';

const log = scopedLogger('backends/gtk_toolkit');

export const PROBE_SCRIPT = path.resolve(__dirname, '..', '..', 'probes', 'gtk_probe.js');

// ---------------------------------------------------------------------------
// Probe output
// ---------------------------------------------------------------------------

export type ProbeSetting =
  | { type: 'missing' }
  | { type: 'bool'; value: boolean }
  | { type: 'int'; value: number }
  | { type: 'float'; value: number }
  | { type: 'string'; value: string | null }
  | { type: 'other'; text: string };

export interface ProbeWidget {
  kind: string;
  typeName: string;
  font: string | null;
}

export interface ProbeOutput {
  version: string;
  settings: Record<string, ProbeSetting>;
  widgets: ProbeWidget[];
}

const PROBE_SCHEMA = {
  type: 'object',
  required: ['version', 'settings', 'widgets'],
  properties: {
    version: { type: 'string' },
    settings: {
      type: 'object',
      additionalProperties: {
        oneOf: [
          { type: 'object', required: ['type'], properties: { type: { type: 'string', const: 'missing' } }, additionalProperties: false },
          { type: 'object', required: ['type', 'value'], properties: { type: { type: 'string', const: 'bool' }, value: { type: 'boolean' } } },
          { type: 'object', required: ['type', 'value'], properties: { type: { type: 'string', enum: ['int', 'float'] }, value: { type: 'number' } } },
          { type: 'object', required: ['type', 'value'], properties: { type: { type: 'string', const: 'string' }, value: { type: ['string', 'null'] } } },
          { type: 'object', required: ['type', 'text'], properties: { type: { type: 'string', const: 'other' }, text: { type: 'string' } } }
        ]
      }
    },
    widgets: {
      type: 'array',
      items: {
        type: 'object',
        required: ['kind', 'typeName', 'font'],
        properties: {
          kind: { type: 'string' },
          typeName: { type: 'string' },
          font: { type: ['string', 'null'] }
        }
      }
    }
  }
};

const ajv = new Ajv({ allErrors: true, allowUnionTypes: true });
const validateProbeOutput = ajv.compile<ProbeOutput>(PROBE_SCHEMA);

export function parseProbeOutput(stdout: string): ProbeOutput {
  let parsed: unknown;
  try {
    parsed = JSON.parse(stdout);
  } catch (e) {
    throw new ParseError('GTK probe output', e instanceof Error ? e.message : String(e));
  }
  if (!validateProbeOutput(parsed)) {
    throw new ParseError('GTK probe output', ajv.errorsText(validateProbeOutput.errors));
  }
  return parsed;
}

function toSettingValue(setting: ProbeSetting | undefined): SettingValue {
  if (!setting) return MISSING;
  switch (setting.type) {
    case 'missing': return MISSING;
    case 'bool':    return { kind: 'bool', value: setting.value };
    case 'int':     return { kind: 'int', value: setting.value };
    case 'float':   return { kind: 'float', value: setting.value };
    case 'string':  return setting.value === null ? MISSING : { kind: 'string', value: setting.value };
    case 'other':   return { kind: 'other', text: setting.text };
  }
}

// ---------------------------------------------------------------------------
// Backend
// ---------------------------------------------------------------------------

class SnapshotWidget implements ToolkitWidget {
  private released = false;

  constructor(
    readonly kind: WidgetKind,
    readonly typeName: string,
    private readonly font: string | null,
    private readonly onRelease: () => void
  ) {}

  fontDescription(): string | null {
    if (this.released) {
      throw new Error(`${this.typeName} used after release`);
    }
    return this.font;
  }

  release(): void {
    if (this.released) return;
    this.released = true;
    this.onRelease();
  }
}

export class GtkToolkit implements ToolkitBackend {
  readonly name: string;
  private liveWidgets = 0;

  constructor(private readonly snapshot: ProbeOutput) {
    this.name = `GTK ${snapshot.version}`;
  }

  /** Runs the probe. No display or no gjs means no toolkit, which is fatal. */
  static init(commands: CommandPaths, timeoutMs?: number): GtkToolkit {
    const settingNames = TOOLKIT_SETTINGS.map(s => s.name).join(',');
    const kinds = WIDGET_KINDS.join(',');

    let stdout: string;
    try {
      stdout = readCommand(commands.gjs, [PROBE_SCRIPT, settingNames, kinds], { timeoutMs });
    } catch (e) {
      if (e instanceof ExecutionError) {
        throw new PreconditionError('toolkit', `Cannot initialise GTK: ${e.message}`, { status: e.status });
      }
      throw e;
    }

    const snapshot = parseProbeOutput(stdout);
    log.debug({ version: snapshot.version, settings: Object.keys(snapshot.settings).length }, 'Toolkit initialised');
    return new GtkToolkit(snapshot);
  }

  getSetting(name: string): SettingValue {
    return toSettingValue(this.snapshot.settings[name]);
  }

  createWidget(kind: WidgetKind): ToolkitWidget {
    const probed = this.snapshot.widgets.find(w => w.kind === kind);
    this.liveWidgets++;
    return new SnapshotWidget(kind, probed?.typeName ?? kind, probed?.font ?? null, () => {
      this.liveWidgets--;
    });
  }

  get outstandingWidgets(): number {
    return this.liveWidgets;
  }

  dispose(): void {
    if (this.liveWidgets > 0) {
      log.warn({ leaked: this.liveWidgets }, 'Widgets were never released');
    }
  }
}
