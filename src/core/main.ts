#!/usr/bin/env node
/**
 * core/main.ts
 *
 * The single entry point. Runs in order:
 *   1. Load environment variables from .env
 *   2. Parse the command line
 *   3. Load config (config/report.json + environment)
 *   4. Initialise the logger
 *   5. Print the preamble
 *   6. Initialise the toolkit and build the report context
 *   7. Print every section as it completes (reporters register on import)
 */

import * as dotenv from 'dotenv';

dotenv.config();

import { initLogger, scopedLogger } from './logger';
import { loadReportConfig } from './config';
import { parseArgs, usage } from './cli';
import { formatCtime, renderSection } from './format';
import { registry } from './registry';
import { HelpRequestedError, UsageError } from './errors';
import { ReportContext, ReportOptions, ReportSection } from './types';
import { createSystemContext } from '../backends';
import '../reporters';

const PROGRAM = 'font-config-report';

function write(lines: string[]): void {
  process.stdout.write(lines.map(line => `${line}\n`).join(''));
}

/** Written before the toolkit starts, so it appears even when that fails. */
export function printPreamble(now: Date = new Date()): void {
  write([`Running at ${formatCtime(now)}`, '']);
}

/** Prints every section for an already-built context. */
export async function printReport(ctx: ReportContext): Promise<void> {
  try {
    await registry.runAll(ctx, (section: ReportSection) => write(renderSection(section)));
  } finally {
    ctx.toolkit.dispose();
  }
}

export async function main(argv: string[]): Promise<number> {
  let options: ReportOptions;
  try {
    options = parseArgs(argv);
  } catch (e) {
    if (e instanceof UsageError) {
      if (!(e instanceof HelpRequestedError)) {
        process.stderr.write(`${PROGRAM}: ${e.message}\n`);
      }
      process.stderr.write(usage(PROGRAM));
      return 1;
    }
    throw e;
  }

  const config = loadReportConfig();
  initLogger(config);
  const log = scopedLogger('core/main');
  log.debug({ options, commands: config.commands }, 'Starting report');

  printPreamble();
  const ctx = createSystemContext(config, options);
  await printReport(ctx);
  return 0;
}

// ---------------------------------------------------------------------------
// Run
// ---------------------------------------------------------------------------

if (require.main === module) {
  main(process.argv.slice(2))
    .then(code => {
      process.exitCode = code;
    })
    .catch((e: unknown) => {
      const message = e instanceof Error ? e.message : String(e);
      scopedLogger('core/main').fatal({ err: e }, 'Report aborted');
      process.stderr.write(`${PROGRAM}: ${message}\n`);
      process.exitCode = 1;
    });
}
