export type ErrorKind = 'not_found' | 'validation' | 'provider' | 'corrupt';

export type MissingResource = 'meeting' | 'audio' | 'transcript' | 'index' | 'summary' | 'insights';

/**
 * Base class for every failure the core reports on purpose.
 * Callers branch on `kind`; messages are for humans only.
 */
export abstract class AppError extends Error {
  abstract readonly kind: ErrorKind;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class NotFoundError extends AppError {
  readonly kind = 'not_found' as const;

  constructor(
    readonly resource: MissingResource,
    message: string
  ) {
    super(message);
  }
}

export class ValidationError extends AppError {
  readonly kind = 'validation' as const;
}

export class ProviderError extends AppError {
  readonly kind = 'provider' as const;

  constructor(
    message: string,
    readonly status?: number,
    options?: { cause?: unknown }
  ) {
    super(message, options);
  }
}

/** Index, metadata or log files disagree with each other or fail validation. */
export class CorruptStateError extends AppError {
  readonly kind = 'corrupt' as const;
}

export function isAppError(error: unknown): error is AppError {
  return error instanceof AppError;
}
