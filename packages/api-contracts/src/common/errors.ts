import { z } from 'zod';

export const ResourceErrorCodeSchema = z.enum(['RESOURCE_NOT_FOUND', 'NOT_FOUND', 'INTERNAL_ERROR', 'RATE_LIMITED']);

export type ResourceErrorCode = z.infer<typeof ResourceErrorCodeSchema>;

// Error bodies are plain text; the machine-readable code travels in this header.
export const ERROR_CODE_HEADER = 'x-error-code';
export const REQUEST_ID_HEADER = 'x-request-id';
