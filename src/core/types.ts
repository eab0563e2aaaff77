/**
 * core/types.ts
 *
 * Single source of truth for every shared type in the project.
 * Reporters, backends and parsers all import from here.
 */

// ---------------------------------------------------------------------------
// Configuration
// ---------------------------------------------------------------------------

export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal' | 'silent';

/** Executables used to reach each configuration source. */
export interface CommandPaths {
  gjs: string;
  gsettings: string;
  xdpyinfo: string;
  xrdb: string;
  fcMatch: string;
  dumpXsettings: string;
}

export interface ReportConfig {
  logLevel: LogLevel;
  commands: CommandPaths;
  commandTimeoutMs?: number;               // undefined = wait for helpers indefinitely
}

/** Parsed command line. */
export interface ReportOptions {
  bold: boolean;
  italic: boolean;
  fontDescription?: string;                // -f DESC
}

// ---------------------------------------------------------------------------
// Values read from configuration sources
// ---------------------------------------------------------------------------

export type SettingValue =
  | { kind: 'missing' }
  | { kind: 'bool'; value: boolean }
  | { kind: 'int'; value: number }
  | { kind: 'float'; value: number }
  | { kind: 'string'; value: string }
  | { kind: 'other'; text: string };       // a type no reporter knows how to print

export const MISSING: SettingValue = { kind: 'missing' };

// ---------------------------------------------------------------------------
// Fonts
// ---------------------------------------------------------------------------

export type FontSlant = 'normal' | 'oblique' | 'italic';

export type FontStretch =
  | 'ultra-condensed'
  | 'extra-condensed'
  | 'condensed'
  | 'semi-condensed'
  | 'normal'
  | 'semi-expanded'
  | 'expanded'
  | 'extra-expanded'
  | 'ultra-expanded';

export type FontVariant =
  | 'normal'
  | 'small-caps'
  | 'all-small-caps'
  | 'petite-caps'
  | 'all-petite-caps'
  | 'unicase'
  | 'title-caps';

/** Direction the baseline points to; south is upright text. */
export type FontGravity = 'south' | 'east' | 'north' | 'west';

/** Pango units per point or pixel. */
export const PANGO_SCALE = 1024;

export interface FontDescription {
  family: string | null;
  weight: number;                          // 400 = normal, 700 = bold
  slant: FontSlant;
  stretch: FontStretch;
  variant: FontVariant;
  gravity: FontGravity;
  size: number;                            // Pango units; 0 = unset
  sizeIsAbsolute: boolean;                 // true: size is in device pixels
}

export type FontQuerySize =
  | { unit: 'pixels'; value: number }
  | { unit: 'points'; value: number };

/** What gets handed to the font matcher. */
export interface FontQuery {
  family: string | null;
  weight?: number;                         // fontconfig weight scale
  slant?: number;                          // fontconfig slant scale
  size: FontQuerySize;
}

export type MatchFailure = 'no-match' | 'type-mismatch' | 'no-id' | 'out-of-memory' | 'unknown';

export type MatchField<T> =
  | { found: true; value: T }
  | { found: false; reason: MatchFailure };

/** Read access to a resolved font, one getter per fontconfig value type. */
export interface MatchedFont {
  getString(object: string): MatchField<string>;
  getInteger(object: string): MatchField<number>;
  getDouble(object: string): MatchField<number>;
  getBool(object: string): MatchField<number>;
}

// ---------------------------------------------------------------------------
// Backends: one per configuration source
// ---------------------------------------------------------------------------

export type WidgetKind = 'label' | 'menu-item' | 'toolbar';

export interface ToolkitWidget {
  readonly kind: WidgetKind;
  readonly typeName: string;
  /** The theme-resolved font as a description string, or null when unset. */
  fontDescription(): string | null;
  release(): void;
}

export interface ToolkitBackend {
  /** e.g. "GTK 3.24" */
  readonly name: string;
  getSetting(name: string): SettingValue;
  createWidget(kind: WidgetKind): ToolkitWidget;
  dispose(): void;
}

export interface PreferenceStore {
  readonly schema: string;
  get(key: string): SettingValue;
}

export interface PreferenceBackend {
  /** Throws PreconditionError when the schema is not installed. */
  open(schema: string): PreferenceStore;
}

export interface ScreenGeometry {
  widthPx: number;
  heightPx: number;
  widthMm: number;
  heightMm: number;
}

export interface DisplayBackend {
  screenGeometry(): ScreenGeometry;
}

export interface ResourceBackend {
  /** Contents of the root window's resource-manager property, or null. */
  resourceManagerString(): string | null;
}

export type XSettingsDump =
  | { ok: true; output: string }
  | { ok: false; status: number | null; reason: string };

export interface XSettingsBackend {
  dump(): XSettingsDump;
}

export interface FontMatchBackend {
  /** Throws PreconditionError when nothing can be matched at all. */
  match(query: FontQuery): MatchedFont;
}

// ---------------------------------------------------------------------------
// Report context & reporters
// ---------------------------------------------------------------------------

export interface ReportContext {
  options: ReportOptions;
  toolkit: ToolkitBackend;
  preferences: PreferenceBackend;
  display: DisplayBackend;
  resources: ResourceBackend;
  xsettings: XSettingsBackend;
  fonts: FontMatchBackend;
}

export interface ReportSection {
  title: string;
  rows: string[];
}

export interface Reporter {
  /** Unique registry key. */
  name: string;
  /** Position in the report; lower runs first. */
  order: number;
  run(ctx: ReportContext): Promise<ReportSection>;
}

export type SectionSink = (section: ReportSection) => void;
