/**
 * ENTROPY MODULE — Errors
 *
 * Every pipeline failure carries a stable code and an HTTP status so the
 * Fastify error handler can answer without knowing the class.
 */

export type EntropyErrorCode =
  | 'DATA_UNAVAILABLE'
  | 'INSUFFICIENT_HISTORY'
  | 'DEGENERATE_CORRELATION'
  | 'LOOKAHEAD_VIOLATION'
  | 'SOURCE_FETCH_FAILED'
  | 'INVALID_CONFIG'
  | 'RUN_NOT_FOUND';

export class EntropyError extends Error {
  readonly code: EntropyErrorCode;
  readonly statusCode: number;
  readonly details: Record<string, unknown>;

  constructor(
    code: EntropyErrorCode,
    statusCode: number,
    message: string,
    details: Record<string, unknown> = {}
  ) {
    super(message);
    this.name = 'EntropyError';
    this.code = code;
    this.statusCode = statusCode;
    this.details = details;
  }
}

/**
 * The source has no data for an instrument. Callers exclude the instrument
 * unless it is required (benchmark, volatility index).
 */
export class DataUnavailableError extends EntropyError {
  readonly ticker: string;

  constructor(ticker: string, message?: string) {
    super('DATA_UNAVAILABLE', 404, message ?? `No data for ${ticker}`, { ticker });
    this.name = 'DataUnavailableError';
    this.ticker = ticker;
  }
}

export class InsufficientHistoryError extends EntropyError {
  constructor(message: string, details: Record<string, unknown> = {}) {
    super('INSUFFICIENT_HISTORY', 422, message, details);
    this.name = 'InsufficientHistoryError';
  }
}

export class DegenerateCorrelationError extends EntropyError {
  readonly sign: number;

  constructor(sign: number, size: number) {
    super(
      'DEGENERATE_CORRELATION',
      422,
      `Correlation matrix (${size}x${size}) is not positive definite (sign=${sign})`,
      { sign, size }
    );
    this.name = 'DegenerateCorrelationError';
    this.sign = sign;
  }
}

export class LookaheadViolationError extends EntropyError {
  constructor(message: string, details: Record<string, unknown> = {}) {
    super('LOOKAHEAD_VIOLATION', 400, message, details);
    this.name = 'LookaheadViolationError';
  }
}

/** Transient source failures that outlived every retry. */
export class SourceFetchError extends EntropyError {
  readonly attempts: number;

  constructor(ticker: string, attempts: number, cause: string) {
    super(
      'SOURCE_FETCH_FAILED',
      502,
      `Fetching ${ticker} failed after ${attempts} attempts: ${cause}`,
      { ticker, attempts }
    );
    this.name = 'SourceFetchError';
    this.attempts = attempts;
  }
}

export class ConfigValidationError extends EntropyError {
  constructor(problems: string[]) {
    super('INVALID_CONFIG', 400, `Invalid study config: ${problems.join('; ')}`, { problems });
    this.name = 'ConfigValidationError';
  }
}

export class RunNotFoundError extends EntropyError {
  constructor(runId: string) {
    super('RUN_NOT_FOUND', 404, `Run ${runId} not found`, { runId });
    this.name = 'RunNotFoundError';
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
