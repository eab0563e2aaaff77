/**
 * backends/gsettings.ts
 *
 * Desktop preferences through the `gsettings` tool. Opening a store lists
 * the schema's keys, so an uninstalled schema fails up front and a key
 * the schema lacks reads as missing without another process.
 */

import {
  MISSING,
  PreferenceBackend,
  PreferenceStore,
  SettingValue
} from '../core/types';
import { ExecutionError, PreconditionError } from '../core/errors';
import { readCommand } from '../core/exec';
import { parseGVariantText } from '../core/parser/gvariant_text';
import { scopedLogger } from '../core/logger';

const log = scopedLogger('backends/gsettings');

class GSettingsStore implements PreferenceStore {
  constructor(
    private readonly command: string,
    readonly schema: string,
    private readonly keys: ReadonlySet<string>,
    private readonly timeoutMs?: number
  ) {}

  get(key: string): SettingValue {
    if (!this.keys.has(key)) {
      log.debug({ schema: this.schema, key }, 'Key not in schema');
      return MISSING;
    }
    try {
      return parseGVariantText(readCommand(this.command, ['get', this.schema, key], { timeoutMs: this.timeoutMs }));
    } catch (e) {
      if (e instanceof ExecutionError) {
        log.warn({ schema: this.schema, key, error: e.message }, 'gsettings get failed');
        return MISSING;
      }
      throw e;
    }
  }
}

export class GSettingsBackend implements PreferenceBackend {
  constructor(
    private readonly command: string,
    private readonly timeoutMs?: number
  ) {}

  open(schema: string): PreferenceStore {
    let listing: string;
    try {
      listing = readCommand(this.command, ['list-keys', schema], { timeoutMs: this.timeoutMs });
    } catch (e) {
      if (e instanceof ExecutionError) {
        throw new PreconditionError('preferences', `Cannot open settings schema "${schema}": ${e.message}`);
      }
      throw e;
    }

    const keys = new Set(listing.split('\n').map(k => k.trim()).filter(k => k !== ''));
    log.debug({ schema, keys: keys.size }, 'Schema opened');
    return new GSettingsStore(this.command, schema, keys, this.timeoutMs);
  }
}
