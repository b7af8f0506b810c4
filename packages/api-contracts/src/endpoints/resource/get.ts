import { z } from 'zod';

export const RESOURCE_ROUTE = '/resource';
export const HEALTH_ROUTE = '/health';

export const DEFAULT_POLL_INTERVAL_MS = 10_000;
export const MIN_POLL_INTERVAL_MS = 1_000;

export const HealthResponseSchema = z.object({
  status: z.enum(['ok', 'shutting_down']),
});

export const ViewerConfigSchema = z.object({
  apiBaseUrl: z.string().optional(),
  pollIntervalMs: z.number().int().min(MIN_POLL_INTERVAL_MS).default(DEFAULT_POLL_INTERVAL_MS),
});

export type HealthResponse = z.infer<typeof HealthResponseSchema>;
export type ViewerConfig = z.infer<typeof ViewerConfigSchema>;
