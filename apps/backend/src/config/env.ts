import path from 'node:path';
import { z, ZodError } from 'zod';
import { logger } from '../utils/logger.js';

const envSchema = z.object({
  PORT: z.coerce.number().int().positive().optional().default(3001),
  NODE_ENV: z.enum(['development', 'test', 'production']).optional().default('development'),

  RESOURCE_FILE: z.string().min(1).optional().default('./exports/chart.png'),
  RESOURCE_CONTENT_TYPE: z.string().min(1).optional(),

  WEB_URL: z.string().url().optional(),

  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).optional(),
  HTTP_LOG_SAMPLE_RATE: z.coerce.number().min(0).max(1).optional(),
  HTTP_LOG_SLOW_MS: z.coerce.number().int().nonnegative().optional(),

  RATE_LIMIT_WINDOW_MS: z.coerce.number().int().positive().optional().default(60_000),
  RATE_LIMIT_MAX: z.coerce.number().int().positive().optional().default(120),

  SHUTDOWN_TIMEOUT_MS: z.coerce.number().int().positive().optional().default(10_000),
  HTTP_DRAIN_TIMEOUT_MS: z.coerce.number().int().positive().optional().default(5_000),
});

export type Env = z.infer<typeof envSchema>;

export type ServerConfig = {
  port: number;
  nodeEnv: Env['NODE_ENV'];
  resourceFile: string;
  resourceContentType: string | null;
  allowedOrigins: string[];
  rateLimit: { windowMs: number; max: number };
  shutdownTimeoutMs: number;
  httpDrainTimeoutMs: number;
};

export function parseEnv(source: NodeJS.ProcessEnv): Env {
  // Empty strings in .env mean "unset".
  const cleaned: Record<string, string> = {};
  for (const [key, value] of Object.entries(source)) {
    if (typeof value === 'string' && value.trim() !== '') cleaned[key] = value;
  }
  return envSchema.parse(cleaned);
}

export function getAllowedOrigins(env: Pick<Env, 'WEB_URL'>): string[] {
  if (env.WEB_URL) return [env.WEB_URL];
  return ['http://localhost:5173'];
}

export function toServerConfig(env: Env, cwd: string = process.cwd()): ServerConfig {
  return {
    port: env.PORT,
    nodeEnv: env.NODE_ENV,
    resourceFile: path.resolve(cwd, env.RESOURCE_FILE),
    resourceContentType: env.RESOURCE_CONTENT_TYPE ?? null,
    allowedOrigins: getAllowedOrigins(env),
    rateLimit: { windowMs: env.RATE_LIMIT_WINDOW_MS, max: env.RATE_LIMIT_MAX },
    shutdownTimeoutMs: env.SHUTDOWN_TIMEOUT_MS,
    httpDrainTimeoutMs: env.HTTP_DRAIN_TIMEOUT_MS,
  };
}

export function loadServerConfig(source: NodeJS.ProcessEnv = process.env): ServerConfig {
  try {
    return toServerConfig(parseEnv(source));
  } catch (error) {
    if (error instanceof ZodError) {
      logger.error('env.invalid', {
        issues: error.issues.map((issue) => ({ path: issue.path.join('.'), message: issue.message })),
      });
    }
    throw error;
  }
}
