/**
 * core/registry.ts
 *
 * Central singleton. Responsibilities:
 *   - Holds every registered Reporter.
 *   - Runs them in order against one ReportContext.
 *   - Hands each finished section to the sink before starting the next,
 *     so a fatal failure later on leaves earlier sections printed.
 *
 * Reporter modules register themselves by calling registry.register()
 * on import; reporters/index.ts imports them all.
 */

import { Reporter, ReportContext, SectionSink } from './types';
import { scopedLogger } from './logger';

const log = scopedLogger('core/registry');

export class ReporterRegistry {
  /** The one and only instance. */
  private static instance: ReporterRegistry | null = null;

  /** reporter name → Reporter */
  private readonly reporters = new Map<string, Reporter>();

  static getInstance(): ReporterRegistry {
    if (!ReporterRegistry.instance) {
      ReporterRegistry.instance = new ReporterRegistry();
    }
    return ReporterRegistry.instance;
  }

  register(reporter: Reporter): void {
    if (this.reporters.has(reporter.name)) {
      log.warn({ reporter: reporter.name }, 'Reporter already registered; overwriting');
    }
    this.reporters.set(reporter.name, reporter);
    log.debug({ reporter: reporter.name, order: reporter.order }, 'Reporter registered');
  }

  /** Reporters in run order. */
  list(): Reporter[] {
    return Array.from(this.reporters.values()).sort((a, b) => a.order - b.order);
  }

  /**
   * Runs every reporter in order. Errors propagate unchanged: the only
   * ones that reach here are fatal.
   */
  async runAll(ctx: ReportContext, sink: SectionSink): Promise<void> {
    for (const reporter of this.list()) {
      const start = Date.now();
      const section = await reporter.run(ctx);
      log.debug({ reporter: reporter.name, rows: section.rows.length, durationMs: Date.now() - start }, 'Reporter finished');
      sink(section);
    }
  }
}

// Convenience export so reporter modules can do:
//     import { registry } from '../core/registry';
//     registry.register(myReporter);
export const registry = ReporterRegistry.getInstance();
