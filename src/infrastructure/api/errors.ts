import type { NextFunction, Request, Response } from 'express';
import { isAppError, NotFoundError, type ErrorKind } from '../../domain/errors';
import { errorMessage, log } from '../../utils/logger';

const STATUS_BY_KIND: Record<ErrorKind, number> = {
  not_found: 404,
  validation: 400,
  provider: 500,
  corrupt: 500,
};

export function sendError(res: Response, error: unknown): void {
  if (isAppError(error)) {
    const status = STATUS_BY_KIND[error.kind];
    if (status >= 500) {
      log('error', 'Request failed', { kind: error.kind, error: error.message });
    }
    res.status(status).json({
      success: false,
      error: error.message,
      kind: error.kind,
      resource: error instanceof NotFoundError ? error.resource : undefined,
    });
    return;
  }

  log('error', 'Unhandled API error', { error: errorMessage(error) });
  res.status(500).json({ success: false, error: 'Internal server error' });
}

function httpStatusOf(error: unknown): number | undefined {
  if (typeof error === 'object' && error !== null && 'status' in error && typeof error.status === 'number') {
    return error.status;
  }
  return undefined;
}

// Body parser failures (malformed JSON, oversized uploads) arrive here
export function bodyParserErrorHandler(error: unknown, _req: Request, res: Response, next: NextFunction): void {
  const status = httpStatusOf(error);
  if (status === undefined || status >= 500) {
    next(error);
    return;
  }
  res.status(status).json({
    success: false,
    error: status === 413 ? 'Request body too large' : 'Malformed request body',
    kind: 'validation',
  });
}

export function fallbackErrorHandler(error: unknown, _req: Request, res: Response, _next: NextFunction): void {
  sendError(res, error);
}
