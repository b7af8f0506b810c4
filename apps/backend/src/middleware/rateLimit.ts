import rateLimit, { type Options } from 'express-rate-limit';
import type { NextFunction, Request, Response } from 'express';
import { HEALTH_ROUTE } from '@chart-relay/api-contracts';
import { sendError } from '../shared/apiError.js';
import { ERROR_CODES } from '../shared/errors.js';
import { requestLogger } from './requestContext.js';

export type RateLimitConfig = {
  windowMs: number;
  max: number;
};

// A viewer polls every ~10s, so the default budget leaves room for several tabs per IP.
export function createGlobalLimiter(config: RateLimitConfig) {
  return rateLimit({
    windowMs: config.windowMs,
    limit: config.max,
    standardHeaders: true,
    legacyHeaders: false,
    skip: (req) => req.path === HEALTH_ROUTE,
    handler: (req: Request, res: Response, _next: NextFunction, options: Options) => {
      requestLogger(req).warn('security.rate_limit.blocked', {
        ip: req.ip,
        path: req.path,
        method: req.method,
        windowMs: options.windowMs,
      });
      sendError(res, { status: options.statusCode, errorCode: ERROR_CODES.RATE_LIMITED });
    },
  });
}
