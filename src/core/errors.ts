/**
 * core/errors.ts
 *
 * Typed error hierarchy. Every throw site uses one of these.
 * Missing or oddly typed values are never errors: reporters print a
 * placeholder for them. What lands here either stops the run or is a
 * helper command misbehaving.
 */

export class ReportBaseError extends Error {
  readonly code: string;
  readonly details?: Record<string, unknown>;

  constructor(message: string, code: string, details?: Record<string, unknown>) {
    super(message);
    this.code = code;
    this.details = details;
    this.name = this.constructor.name;
    Object.setPrototypeOf(this, new.target.prototype); // fix instanceof in TS
  }
}

// ---------------------------------------------------------------------------
// Startup errors
// ---------------------------------------------------------------------------

/** Bad command line. The caller prints the usage text. */
export class UsageError extends ReportBaseError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'USAGE', details);
  }
}

/** -h: the usage text is the whole answer. */
export class HelpRequestedError extends UsageError {
  constructor() {
    super('help requested', { flag: 'h' });
  }
}

/** config/report.json exists but does not satisfy its schema. */
export class ConfigError extends ReportBaseError {
  constructor(configPath: string, violations: unknown[]) {
    super(
      `Invalid configuration in "${configPath}"`,
      'CONFIG_INVALID',
      { configPath, violations }
    );
  }
}

// ---------------------------------------------------------------------------
// Fatal tier
// ---------------------------------------------------------------------------

/**
 * Something every working desktop has is missing: no display, no
 * toolkit, no preference schema, no font match at all.
 */
export class PreconditionError extends ReportBaseError {
  constructor(source: string, message: string, details?: Record<string, unknown>) {
    super(message, 'PRECONDITION_FAILED', { source, ...details });
  }
}

// ---------------------------------------------------------------------------
// Helper command errors
// ---------------------------------------------------------------------------

/** A helper command could not be started or exited non-zero. */
export class ExecutionError extends ReportBaseError {
  readonly status: number | null;

  constructor(command: string, message: string, status: number | null = null, details?: Record<string, unknown>) {
    super(message, 'EXECUTION_ERROR', { command, status, ...details });
    this.status = status;
  }
}

/** A helper command ran but its output could not be read. */
export class ParseError extends ReportBaseError {
  constructor(what: string, message: string, details?: Record<string, unknown>) {
    super(`Could not parse ${what}: ${message}`, 'PARSE_ERROR', { what, ...details });
  }
}
