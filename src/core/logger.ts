/**
 * core/logger.ts
 *
 * Singleton pino logger. Every module does:
 *     const log = scopedLogger('reporters/xresources');
 *
 * Logs go to stderr; stdout belongs to the report.
 */

import pino from 'pino';
import { ReportConfig } from './types';

let instance: pino.Logger | null = null;

function create(level: string): pino.Logger {
  return pino({ level, base: { name: 'font-config-report' } }, pino.destination(2));
}

export function initLogger(config: Pick<ReportConfig, 'logLevel'>): pino.Logger {
  instance = create(config.logLevel);
  return instance;
}

export function getLogger(): pino.Logger {
  if (!instance) {
    // Fallback for early imports before initLogger is called
    instance = create(process.env.FONT_REPORT_LOG_LEVEL ?? 'warn');
  }
  return instance;
}

type Level = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal';

type ScopedLogFn = {
  (obj: object, msg?: string): void;
  (msg: string): void;
};

export type ScopedLogger = Record<Level, ScopedLogFn>;

/**
 * Returns a logger scoped to a specific module (a `module` field on every
 * line). Modules create theirs at import time, before initLogger() runs,
 * so the pino child is resolved on each call.
 */
export function scopedLogger(moduleName: string): ScopedLogger {
  const emit = (level: Level) => (objOrMsg: object | string, msg?: string): void => {
    const child = getLogger().child({ module: moduleName });
    if (typeof objOrMsg === 'string') child[level](objOrMsg);
    else child[level](objOrMsg, msg);
  };
  return {
    trace: emit('trace'),
    debug: emit('debug'),
    info: emit('info'),
    warn: emit('warn'),
    error: emit('error'),
    fatal: emit('fatal')
  };
}
