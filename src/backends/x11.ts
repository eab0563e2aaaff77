/**
 * backends/x11.ts
 *
 * Windowing-system queries: screen geometry via `xdpyinfo`, the
 * resource-manager string via `xrdb -query`.
 */

import {
  DisplayBackend,
  ResourceBackend,
  ScreenGeometry
} from '../core/types';
import { ExecutionError, PreconditionError } from '../core/errors';
import { readCommand } from '../core/exec';
import { parseXdpyinfo } from '../core/parser/xdpyinfo';
import { scopedLogger } from '../core/logger';

const log = scopedLogger('backends/x11');

export class XdpyinfoDisplay implements DisplayBackend {
  constructor(
    private readonly command: string,
    private readonly timeoutMs?: number
  ) {}

  /** No display connection is fatal. */
  screenGeometry(): ScreenGeometry {
    let report: string;
    try {
      report = readCommand(this.command, [], { timeoutMs: this.timeoutMs });
    } catch (e) {
      if (e instanceof ExecutionError) {
        throw new PreconditionError('display', `Cannot open display: ${e.message}`);
      }
      throw e;
    }
    return parseXdpyinfo(report);
  }
}

export class XrdbResources implements ResourceBackend {
  constructor(
    private readonly command: string,
    private readonly timeoutMs?: number
  ) {}

  /**
   * xrdb prints nothing when the property is absent, so an empty
   * database and a missing one both come back as null.
   */
  resourceManagerString(): string | null {
    try {
      const data = readCommand(this.command, ['-query'], { timeoutMs: this.timeoutMs });
      return data.trim() === '' ? null : data;
    } catch (e) {
      if (e instanceof ExecutionError) {
        log.warn({ error: e.message, status: e.status }, 'xrdb -query failed');
        return null;
      }
      throw e;
    }
  }
}
