/**
 * core/exec.ts
 *
 * The one place helper commands are started. Arguments are passed as an
 * argv array, never through a shell.
 *
 *   readCommand()  stdout of a command that must succeed
 *   runCommand()   status + output of a command that is allowed to fail
 */

import { execFileSync, spawnSync } from 'child_process';
import { ExecutionError } from './errors';
import { scopedLogger } from './logger';

const log = scopedLogger('core/exec');

export interface CommandOptions {
  timeoutMs?: number;
  env?: NodeJS.ProcessEnv;
}

export interface CommandOutcome {
  /** null when the process never started or died from a signal. */
  status: number | null;
  stdout: string;
  stderr: string;
  /** Set when the process could not be started at all (e.g. ENOENT). */
  spawnError?: Error;
}

function stderrOf(e: unknown): string {
  if (typeof e === 'object' && e !== null && 'stderr' in e) {
    const stderr = e.stderr;
    if (typeof stderr === 'string') return stderr.trim();
    if (Buffer.isBuffer(stderr)) return stderr.toString('utf-8').trim();
  }
  return '';
}

function statusOf(e: unknown): number | null {
  if (typeof e === 'object' && e !== null && 'status' in e) {
    const status = e.status;
    if (typeof status === 'number') return status;
  }
  return null;
}

export function readCommand(file: string, args: string[], options: CommandOptions = {}): string {
  log.debug({ file, args }, 'Running helper');
  try {
    return execFileSync(file, args, {
      encoding: 'utf-8',
      timeout: options.timeoutMs,
      env: options.env,
      stdio: ['ignore', 'pipe', 'pipe']
    });
  } catch (e) {
    const message = e instanceof Error ? e.message : String(e);
    throw new ExecutionError(file, stderrOf(e) || message, statusOf(e), { args });
  }
}

export function runCommand(file: string, args: string[], options: CommandOptions = {}): CommandOutcome {
  log.debug({ file, args }, 'Running helper');
  const result = spawnSync(file, args, {
    encoding: 'utf-8',
    timeout: options.timeoutMs,
    env: options.env,
    stdio: ['ignore', 'pipe', 'pipe']
  });

  return {
    status: result.status,
    stdout: result.stdout ?? '',
    stderr: result.stderr ?? '',
    spawnError: result.error
  };
}
