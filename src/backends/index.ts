/**
 * backends/index.ts
 *
 * Wires the subprocess-backed sources into a ReportContext. Creating the
 * context initialises the toolkit; everything else connects lazily when a
 * reporter first asks.
 */

import { ReportConfig, ReportContext, ReportOptions } from '../core/types';
import { GtkToolkit } from './gtk_toolkit';
import { GSettingsBackend } from './gsettings';
import { XdpyinfoDisplay, XrdbResources } from './x11';
import { DumpXSettings } from './xsettings';
import { FcMatch } from './fontconfig';

export function createSystemContext(config: ReportConfig, options: ReportOptions): ReportContext {
  const { commands, commandTimeoutMs } = config;
  return {
    options,
    toolkit: GtkToolkit.init(commands, commandTimeoutMs),
    preferences: new GSettingsBackend(commands.gsettings, commandTimeoutMs),
    display: new XdpyinfoDisplay(commands.xdpyinfo, commandTimeoutMs),
    resources: new XrdbResources(commands.xrdb, commandTimeoutMs),
    xsettings: new DumpXSettings(commands.dumpXsettings, commandTimeoutMs),
    fonts: new FcMatch(commands.fcMatch, commandTimeoutMs)
  };
}
