import path from 'node:path';
import type { NextFunction, Request, Response } from 'express';
import { ApiError } from '../../shared/apiError.js';
import { ERROR_CODES } from '../../shared/errors.js';
import type { ResourceSnapshot, ResourceStore } from '../../storage/index.js';
import { requestLogger } from '../../middleware/requestContext.js';

export type ResourceControllerDeps = {
  store: ResourceStore;
  /** Overrides the type derived from the file extension. */
  contentType: string | null;
};

function stripWeak(tag: string): string {
  return tag.startsWith('W/') ? tag.slice(2) : tag;
}

export function etagMatches(ifNoneMatch: string | undefined, etag: string): boolean {
  if (!ifNoneMatch) return false;
  const wanted = stripWeak(etag);
  return ifNoneMatch
    .split(',')
    .map((t) => t.trim())
    .some((t) => t === '*' || stripWeak(t) === wanted);
}

export function createResourceController(deps: ResourceControllerDeps) {
  const { store } = deps;
  // '.bin' resolves to application/octet-stream when the path has no extension.
  const contentType = deps.contentType ?? (path.extname(store.location) || '.bin');

  const getResource = async (req: Request, res: Response, next: NextFunction) => {
    let snapshot: ResourceSnapshot | null;
    try {
      snapshot = await store.read();
    } catch (error) {
      // errorHandler logs the cause.
      return next(new ApiError({ errorCode: ERROR_CODES.INTERNAL_ERROR, cause: error }));
    }

    if (!snapshot) {
      requestLogger(req).info('resource.not_found', { location: store.location });
      return next(new ApiError({ errorCode: ERROR_CODES.RESOURCE_NOT_FOUND }));
    }

    res.set({
      'Cache-Control': 'no-cache, no-store',
      ETag: snapshot.etag,
      'Last-Modified': snapshot.modifiedAt.toUTCString(),
      'X-Content-Type-Options': 'nosniff',
    });

    if (etagMatches(req.get('if-none-match'), snapshot.etag)) {
      return res.status(304).end();
    }

    // Not res.send: its freshness check would also honour If-Modified-Since.
    res.status(200).type(contentType).set('Content-Length', String(snapshot.bytes.length));
    return req.method === 'HEAD' ? res.end() : res.end(snapshot.bytes);
  };

  return { getResource };
}
