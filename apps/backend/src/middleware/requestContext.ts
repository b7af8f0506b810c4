import type { NextFunction, Request, Response } from 'express';
import { randomUUID } from 'crypto';
import { REQUEST_ID_HEADER } from '@chart-relay/api-contracts';
import { logger, type Logger } from '../utils/logger.js';

function parseNumberEnv(name: string, fallback: number): number {
  const n = Number.parseFloat(String(process.env[name] ?? ''));
  return Number.isFinite(n) ? n : fallback;
}

function shouldSample(rate: number): boolean {
  if (!Number.isFinite(rate)) return true;
  if (rate >= 1) return true;
  if (rate <= 0) return false;
  return Math.random() < rate;
}

function getOrCreateRequestId(req: Request): string {
  const incoming = req.headers[REQUEST_ID_HEADER] ?? req.headers['x-correlation-id'];
  const fromHeader = Array.isArray(incoming) ? incoming[0] : incoming;
  if (fromHeader && fromHeader.trim().length > 0) return fromHeader.trim().slice(0, 128);
  return randomUUID();
}

export function requestLogger(req: Request): Logger {
  return req.log ?? logger.child({ requestId: req.requestId });
}

export function requestContext(req: Request, res: Response, next: NextFunction) {
  const requestId = getOrCreateRequestId(req);
  req.requestId = requestId;
  res.setHeader(REQUEST_ID_HEADER, requestId);
  const log = logger.child({ requestId });
  req.log = log;

  const start = process.hrtime.bigint();

  res.on('finish', () => {
    const durationMs = Math.round(Number(process.hrtime.bigint() - start) / 1_000_000);
    const status = res.statusCode;

    const sampleRate = parseNumberEnv('HTTP_LOG_SAMPLE_RATE', process.env.NODE_ENV === 'production' ? 0.05 : 1);
    const slowMs = parseNumberEnv('HTTP_LOG_SLOW_MS', process.env.NODE_ENV === 'production' ? 1000 : 2000);

    const base = {
      method: req.method,
      path: req.path,
      status,
      durationMs,
      bytes: Number(res.getHeader('content-length') ?? 0) || 0,
    };

    // 5xx and slow requests are always logged; the rest is sampled.
    if (status >= 500) {
      log.error('http.request', base);
      return;
    }
    if (durationMs >= slowMs) {
      log.warn('http.slow', { ...base, slowMs });
      return;
    }
    if (shouldSample(sampleRate)) {
      log.info('http.request', { ...base, sampleRate });
    }
  });

  next();
}
