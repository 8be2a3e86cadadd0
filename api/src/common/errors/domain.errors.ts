import { HttpStatus } from '@nestjs/common';

export type ErrorKind =
  | 'SourceUnavailable'
  | 'RateLimited'
  | 'EmptyResult'
  | 'ValidationFailure'
  | 'InstrumentUnsupported'
  | 'VersionNotFound'
  | 'NoReadyVersion'
  | 'InsufficientHistory'
  | 'TrainingFailure';

export type ErrorContext = Record<string, string | number>;

/**
 * Base class for every failure the forecasting core reports.
 * `kind` is the stable name clients see; `status` is the HTTP mapping.
 */
export abstract class DomainError extends Error {
  abstract readonly kind: ErrorKind;
  abstract readonly status: HttpStatus;
  private ctx: ErrorContext;

  constructor(message: string, context: ErrorContext = {}, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.ctx = { ...context };
  }

  get context(): ErrorContext {
    return { ...this.ctx };
  }

  /** Attaches caller context (instrument, version...) without replacing what is already there. */
  withContext(context: ErrorContext): this {
    this.ctx = { ...context, ...this.ctx };
    return this;
  }
}

/* ----------------------------- Source errors ----------------------------- */

export class SourceUnavailableError extends DomainError {
  readonly kind = 'SourceUnavailable';
  readonly status = HttpStatus.INTERNAL_SERVER_ERROR;
}

export class RateLimitedError extends DomainError {
  readonly kind = 'RateLimited';
  readonly status = HttpStatus.INTERNAL_SERVER_ERROR;
}

export class EmptyResultError extends DomainError {
  readonly kind = 'EmptyResult';
  readonly status = HttpStatus.INTERNAL_SERVER_ERROR;
}

export class ValidationFailureError extends DomainError {
  readonly kind = 'ValidationFailure';
  readonly status = HttpStatus.INTERNAL_SERVER_ERROR;
}

/* ----------------------------- Caller errors ----------------------------- */

export class InstrumentUnsupportedError extends DomainError {
  readonly kind = 'InstrumentUnsupported';
  readonly status = HttpStatus.NOT_FOUND;

  constructor(instrumentId: string) {
    super(`Instrument '${instrumentId}' is not supported`, { instrumentId });
  }
}

export class VersionNotFoundError extends DomainError {
  readonly kind = 'VersionNotFound';
  readonly status = HttpStatus.NOT_FOUND;
}

export class NoReadyVersionError extends DomainError {
  readonly kind = 'NoReadyVersion';
  readonly status = HttpStatus.NOT_FOUND;

  constructor(instrumentId: string) {
    super(`No trained model is ready for '${instrumentId}'`, { instrumentId });
  }
}

/* ---------------------------- Internal errors ---------------------------- */

export class InsufficientHistoryError extends DomainError {
  readonly kind = 'InsufficientHistory';
  readonly status = HttpStatus.INTERNAL_SERVER_ERROR;
}

export class TrainingFailureError extends DomainError {
  readonly kind = 'TrainingFailure';
  readonly status = HttpStatus.INTERNAL_SERVER_ERROR;
}

export function isSourceError(
  err: unknown,
): err is SourceUnavailableError | RateLimitedError | EmptyResultError | ValidationFailureError {
  return (
    err instanceof SourceUnavailableError ||
    err instanceof RateLimitedError ||
    err instanceof EmptyResultError ||
    err instanceof ValidationFailureError
  );
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
