/**
 * Error taxonomy for the crawl engine.
 *
 * Per-page failures (FetchError, ParseError) are recorded on the frontier and
 * never leave a worker loop. InvalidTransitionError signals a logic defect and
 * propagates to the caller. StateIOError is logged for periodic snapshots and
 * thrown for the final one.
 */

export type CrawlErrorCode =
  | 'fetch_failed'
  | 'parse_error'
  | 'invalid_transition'
  | 'state_io'
  | 'invalid_config';

export class CrawlError extends Error {
  readonly code: CrawlErrorCode;

  constructor(code: CrawlErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

export type FetchFailureKind = 'timeout' | 'network' | 'aborted' | 'too_large';

export class FetchError extends CrawlError {
  readonly kind: FetchFailureKind;
  /** errno-style detail for network failures (ECONNRESET, ENOTFOUND, ...) */
  readonly detail?: string;

  constructor(
    kind: FetchFailureKind,
    url: string,
    options: { detail?: string; cause?: unknown } = {}
  ) {
    super('fetch_failed', `Fetch ${kind} for ${url}${options.detail ? ` (${options.detail})` : ''}`, {
      cause: options.cause,
    });
    this.kind = kind;
    this.detail = options.detail;
  }

  /** Failure reason recorded on the frontier, e.g. `timeout` or `network:ECONNRESET`. */
  get reason(): string {
    return this.kind === 'network' && this.detail ? `network:${this.detail}` : this.kind;
  }
}

export class ParseError extends CrawlError {
  constructor(url: string, options?: { cause?: unknown }) {
    super('parse_error', `Could not parse page ${url}`, options);
  }
}

export class InvalidTransitionError extends CrawlError {
  constructor(message: string) {
    super('invalid_transition', message);
  }
}

export class StateIOError extends CrawlError {
  readonly path: string;
  readonly operation: 'read' | 'write';

  constructor(path: string, operation: 'read' | 'write', options?: { cause?: unknown }) {
    super('state_io', `Failed to ${operation} crawl state at ${path}`, options);
    this.path = path;
    this.operation = operation;
  }
}

export class ConfigError extends CrawlError {
  readonly issues: string[];

  constructor(issues: string[]) {
    super('invalid_config', `Invalid configuration:\n  ${issues.join('\n  ')}`);
    this.issues = issues;
  }
}

/** Frontier failure reason for anything thrown inside a worker iteration. */
export function failureReason(error: unknown): string {
  if (error instanceof FetchError) return error.reason;
  if (error instanceof ParseError) return 'parse_error';
  if (error instanceof Error) return `error:${error.message}`;
  return `error:${String(error)}`;
}
