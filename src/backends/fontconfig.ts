/**
 * backends/fontconfig.ts
 *
 * Font matching through `fc-match -v`. fc-match runs the same three steps
 * an application does (config substitution, default substitution, best
 * match) and dumps the resolved pattern.
 */

import { FontMatchBackend, FontQuery, MatchedFont } from '../core/types';
import { ExecutionError, PreconditionError } from '../core/errors';
import { readCommand } from '../core/exec';
import { FcPattern, formatFontQuery } from '../core/parser/fc_pattern';
import { scopedLogger } from '../core/logger';

const log = scopedLogger('backends/fontconfig');

export class FcMatch implements FontMatchBackend {
  constructor(
    private readonly command: string,
    private readonly timeoutMs?: number
  ) {}

  match(query: FontQuery): MatchedFont {
    const pattern = formatFontQuery(query);
    log.debug({ pattern }, 'Matching');

    let dump: string;
    try {
      dump = readCommand(this.command, ['-v', pattern], { timeoutMs: this.timeoutMs });
    } catch (e) {
      if (e instanceof ExecutionError) {
        throw new PreconditionError('fontconfig', `No font matches "${pattern}": ${e.message}`);
      }
      throw e;
    }
    return FcPattern.parse(dump);
  }
}
