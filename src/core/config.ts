/**
 * core/config.ts
 *
 * Builds the ReportConfig. Sources, lowest precedence first:
 *   1. Built-in defaults (plain executable names, resolved through PATH)
 *   2. config/report.json, or the file named by FONT_REPORT_CONFIG
 *   3. FONT_REPORT_LOG_LEVEL
 *
 * The file is optional. When present it must satisfy CONFIG_SCHEMA.
 */

import * as fs from 'fs';
import * as path from 'path';
import Ajv from 'ajv';
import { CommandPaths, LogLevel, ReportConfig } from './types';
import { ConfigError } from './errors';

export const LOG_LEVELS: readonly LogLevel[] = ['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'];

export const DEFAULT_COMMANDS: CommandPaths = {
  gjs: 'gjs',
  gsettings: 'gsettings',
  xdpyinfo: 'xdpyinfo',
  xrdb: 'xrdb',
  fcMatch: 'fc-match',
  dumpXsettings: 'dump_xsettings'
};

export const DEFAULT_CONFIG: ReportConfig = {
  logLevel: 'warn',
  commands: DEFAULT_COMMANDS
};

/** Shape of config/report.json. Every field is optional. */
export interface ReportConfigFile {
  logLevel?: LogLevel;
  commands?: Partial<CommandPaths>;
  commandTimeoutMs?: number;
}

const commandProperty = { type: 'string', minLength: 1 };

export const CONFIG_SCHEMA = {
  type: 'object',
  properties: {
    logLevel: { type: 'string', enum: LOG_LEVELS },
    commands: {
      type: 'object',
      properties: {
        gjs: commandProperty,
        gsettings: commandProperty,
        xdpyinfo: commandProperty,
        xrdb: commandProperty,
        fcMatch: commandProperty,
        dumpXsettings: commandProperty
      },
      additionalProperties: false
    },
    commandTimeoutMs: { type: 'integer', minimum: 1 }
  },
  additionalProperties: false
};

const ajv = new Ajv({ allErrors: true });
const validateConfigFile = ajv.compile<ReportConfigFile>(CONFIG_SCHEMA);

function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some(level => level === value);
}

export function defaultConfigPath(env: NodeJS.ProcessEnv = process.env): string {
  return env.FONT_REPORT_CONFIG ?? path.resolve(process.cwd(), 'config', 'report.json');
}

/** Reads and validates a config file. Returns {} when the file does not exist. */
export function readConfigFile(configPath: string): ReportConfigFile {
  if (!fs.existsSync(configPath)) return {};

  let parsed: unknown;
  try {
    parsed = JSON.parse(fs.readFileSync(configPath, 'utf-8'));
  } catch (e) {
    throw new ConfigError(configPath, [e instanceof Error ? e.message : String(e)]);
  }

  if (!validateConfigFile(parsed)) {
    throw new ConfigError(configPath, validateConfigFile.errors ?? []);
  }
  return parsed;
}

export function loadReportConfig(env: NodeJS.ProcessEnv = process.env): ReportConfig {
  const configPath = defaultConfigPath(env);
  const file = readConfigFile(configPath);

  const envLevel = env.FONT_REPORT_LOG_LEVEL;
  if (envLevel !== undefined && !isLogLevel(envLevel)) {
    throw new ConfigError('FONT_REPORT_LOG_LEVEL', [`unknown log level "${envLevel}"`]);
  }

  return {
    logLevel: envLevel ?? file.logLevel ?? DEFAULT_CONFIG.logLevel,
    commands: { ...DEFAULT_COMMANDS, ...file.commands },
    commandTimeoutMs: file.commandTimeoutMs
  };
}
