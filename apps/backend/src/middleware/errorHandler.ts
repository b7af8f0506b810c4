import type { Request, Response, NextFunction } from 'express';
import { ApiError, sendError } from '../shared/apiError.js';
import { ERROR_CODES, ERROR_MESSAGES } from '../shared/errors.js';
import { requestLogger } from './requestContext.js';

export function notFoundHandler(_req: Request, res: Response) {
  return sendError(res, { status: 404, errorCode: ERROR_CODES.NOT_FOUND });
}

export function errorHandler(err: unknown, req: Request, res: Response, next: NextFunction) {
  const log = requestLogger(req);
  const error = err instanceof Error ? err : new Error(String(err));
  const status = error instanceof ApiError ? error.status : 500;

  if (status >= 500) {
    const cause = error.cause instanceof Error ? error.cause : null;
    log.error('http.error', {
      method: req.method,
      path: req.path,
      errorName: error.name,
      errorMessage: error.message,
      causeMessage: cause?.message,
      // Stacks carry filesystem paths; keep them out of production logs.
      ...(process.env.NODE_ENV === 'production' ? {} : { stack: (cause ?? error).stack }),
    });
  }

  if (res.headersSent) {
    log.warn('http.error.headersSent', { method: req.method, path: req.path });
    return next(err);
  }

  if (error instanceof ApiError) {
    return sendError(res, { status: error.status, errorCode: error.errorCode, error: error.message });
  }

  return sendError(res, {
    status: 500,
    errorCode: ERROR_CODES.INTERNAL_ERROR,
    error: ERROR_MESSAGES[ERROR_CODES.INTERNAL_ERROR],
  });
}
