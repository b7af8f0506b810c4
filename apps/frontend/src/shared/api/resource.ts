import axios from 'axios';
import {
  ERROR_CODE_HEADER,
  RESOURCE_ROUTE,
  ResourceErrorCodeSchema,
  type ResourceFetchErrorKind,
} from '@chart-relay/api-contracts';

import { api, getRequestIdFromError } from '@/lib/api';

export type ResourceFetchResult =
  | { kind: 'updated'; blob: Blob; etag: string | null }
  | { kind: 'unchanged' };

export type FetchResourceOptions = {
  signal?: AbortSignal;
  /** Validator of the image currently on screen; lets the server answer 304. */
  etag?: string | null;
};

export type ResourceFetcher = (opts?: FetchResourceOptions) => Promise<ResourceFetchResult>;

export class ResourceFetchError extends Error {
  readonly kind: ResourceFetchErrorKind;
  readonly status: number | null;
  readonly requestId: string | null;

  constructor(params: { kind: ResourceFetchErrorKind; message: string; status?: number | null; requestId?: string | null; cause?: unknown }) {
    super(params.message, { cause: params.cause });
    this.name = 'ResourceFetchError';
    this.kind = params.kind;
    this.status = params.status ?? null;
    this.requestId = params.requestId ?? null;
  }
}

function headerString(value: unknown): string | null {
  return typeof value === 'string' && value.trim() ? value.trim() : null;
}

export function toResourceFetchError(error: unknown): ResourceFetchError {
  if (error instanceof ResourceFetchError) return error;

  if (axios.isCancel(error)) {
    return new ResourceFetchError({ kind: 'cancelled', message: 'Request cancelled', cause: error });
  }

  if (axios.isAxiosError(error) && error.response) {
    const { status, headers } = error.response;
    const code = ResourceErrorCodeSchema.safeParse(headerString(headers?.[ERROR_CODE_HEADER]));
    const notFound = status === 404 || (code.success && code.data === 'RESOURCE_NOT_FOUND');
    return new ResourceFetchError({
      kind: notFound ? 'not_found' : 'internal',
      message: notFound ? 'Resource not found' : `Server responded with ${status}`,
      status,
      requestId: getRequestIdFromError(error),
      cause: error,
    });
  }

  const message = error instanceof Error && error.message ? error.message : 'Network error';
  return new ResourceFetchError({ kind: 'network', message, cause: error });
}

export const fetchResource: ResourceFetcher = async (opts = {}) => {
  try {
    const res = await api.get<ArrayBuffer>(RESOURCE_ROUTE, {
      responseType: 'arraybuffer',
      signal: opts.signal,
      headers: opts.etag ? { 'If-None-Match': opts.etag } : undefined,
      validateStatus: (status) => status === 200 || status === 304,
    });

    if (res.status === 304) return { kind: 'unchanged' };

    const contentType = headerString(res.headers['content-type']) ?? 'application/octet-stream';
    return {
      kind: 'updated',
      blob: new Blob([res.data], { type: contentType }),
      etag: headerString(res.headers['etag']),
    };
  } catch (error) {
    throw toResourceFetchError(error);
  }
};
