import type { ResourceErrorCode } from '@chart-relay/api-contracts';

export const ERROR_CODES = {
  RESOURCE_NOT_FOUND: 'RESOURCE_NOT_FOUND',
  NOT_FOUND: 'NOT_FOUND',
  INTERNAL_ERROR: 'INTERNAL_ERROR',
  RATE_LIMITED: 'RATE_LIMITED',
} as const satisfies Record<ResourceErrorCode, ResourceErrorCode>;

export type ErrorCode = (typeof ERROR_CODES)[keyof typeof ERROR_CODES];

export const ERROR_MESSAGES: Record<ErrorCode, string> = {
  RESOURCE_NOT_FOUND: 'Resource not found',
  NOT_FOUND: 'Not found',
  INTERNAL_ERROR: 'Internal server error',
  RATE_LIMITED: 'Too many requests',
};

export const ERROR_STATUS: Record<ErrorCode, number> = {
  RESOURCE_NOT_FOUND: 404,
  NOT_FOUND: 404,
  INTERNAL_ERROR: 500,
  RATE_LIMITED: 429,
};
