import { DEFAULT_POLL_INTERVAL_MS, type ViewerStatus } from '@chart-relay/api-contracts';
import { useCallback, useEffect, useRef, useState } from 'react';

import { fetchResource, toResourceFetchError, type ResourceFetchError, type ResourceFetcher, type ResourceFetchResult } from '@/shared/api/resource';

import { DisplayHandle, browserObjectUrls, type ObjectUrlFactory } from './displayHandle';
import { startPolling, type PollingTask } from './pollingTask';

export type ResourcePollingState = {
  status: ViewerStatus;
  /** Object URL of the image on screen; kept across failed polls. */
  src: string | null;
  error: ResourceFetchError | null;
  lastUpdatedAt: number | null;
};

export type UseResourcePollingOptions = {
  intervalMs?: number;
  fetchResource?: ResourceFetcher;
  objectUrls?: ObjectUrlFactory;
};

const INITIAL_STATE: ResourcePollingState = { status: 'loading', src: null, error: null, lastUpdatedAt: null };

export function useResourcePolling(options: UseResourcePollingOptions = {}) {
  const intervalMs = options.intervalMs ?? DEFAULT_POLL_INTERVAL_MS;
  const [state, setState] = useState<ResourcePollingState>(INITIAL_STATE);

  // Read at activation time so unstable callers don't restart the cycle.
  const fetcherRef = useRef<ResourceFetcher>(options.fetchResource ?? fetchResource);
  fetcherRef.current = options.fetchResource ?? fetchResource;
  const objectUrlsRef = useRef<ObjectUrlFactory>(options.objectUrls ?? browserObjectUrls);
  objectUrlsRef.current = options.objectUrls ?? browserObjectUrls;

  const taskRef = useRef<PollingTask | null>(null);

  useEffect(() => {
    const handle = new DisplayHandle(objectUrlsRef.current);
    let etag: string | null = null;
    setState(INITIAL_STATE);

    const task = startPolling<ResourceFetchResult>({
      intervalMs,
      fetch: (signal) => fetcherRef.current({ signal, etag: handle.current ? etag : null }),
      onResult: (result) => {
        if (result.kind === 'unchanged') {
          setState((prev) => (prev.src ? { ...prev, status: 'displaying', error: null } : prev));
          return;
        }
        etag = result.etag;
        const src = handle.replace(result.blob);
        setState({ status: 'displaying', src, error: null, lastUpdatedAt: Date.now() });
      },
      onError: (error) => {
        const err = toResourceFetchError(error);
        if (err.kind === 'cancelled') return;
        console.warn('Chart poll failed:', { kind: err.kind, status: err.status, requestId: err.requestId });
        setState((prev) => ({ ...prev, status: 'error', error: err }));
      },
    });
    taskRef.current = task;

    return () => {
      task.stop();
      if (taskRef.current === task) taskRef.current = null;
      handle.release();
    };
  }, [intervalMs]);

  const refresh = useCallback(() => {
    taskRef.current?.refresh();
  }, []);

  return { ...state, refresh };
}
