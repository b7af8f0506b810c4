import type { Response } from 'express';
import { ERROR_CODE_HEADER } from '@chart-relay/api-contracts';
import { ERROR_MESSAGES, ERROR_STATUS, type ErrorCode } from './errors.js';

export class ApiError extends Error {
  public readonly status: number;
  public readonly errorCode: ErrorCode;

  constructor(params: { errorCode: ErrorCode; status?: number; message?: string; cause?: unknown }) {
    super(params.message || ERROR_MESSAGES[params.errorCode], { cause: params.cause });
    this.name = 'ApiError';
    this.status = params.status ?? ERROR_STATUS[params.errorCode];
    this.errorCode = params.errorCode;
  }
}

export function sendError(res: Response, payload: { status: number; errorCode: ErrorCode; error?: string }) {
  const { status, errorCode, error } = payload;
  return res
    .status(status)
    .set(ERROR_CODE_HEADER, errorCode)
    .type('text/plain')
    .send(error ?? ERROR_MESSAGES[errorCode]);
}
