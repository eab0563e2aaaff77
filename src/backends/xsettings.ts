/**
 * backends/xsettings.ts
 *
 * Runs the `dump_xsettings` helper from xsettingsd. The helper is often not
 * installed; that is an outcome, not an error.
 */

import { XSettingsBackend, XSettingsDump } from '../core/types';
import { runCommand } from '../core/exec';
import { scopedLogger } from '../core/logger';

const log = scopedLogger('backends/xsettings');

export class DumpXSettings implements XSettingsBackend {
  constructor(
    private readonly command: string,
    private readonly timeoutMs?: number
  ) {}

  dump(): XSettingsDump {
    const outcome = runCommand(this.command, [], { timeoutMs: this.timeoutMs });

    if (outcome.spawnError) {
      log.debug({ command: this.command, error: outcome.spawnError.message }, 'Helper did not start');
      return { ok: false, status: outcome.status, reason: outcome.spawnError.message };
    }
    if (outcome.status !== 0) {
      log.debug({ command: this.command, status: outcome.status, stderr: outcome.stderr }, 'Helper failed');
      return { ok: false, status: outcome.status, reason: outcome.stderr.trim() || `exit status ${outcome.status}` };
    }
    return { ok: true, output: outcome.stdout };
  }
}
