import { vi } from 'vitest';

import type { ObjectUrlFactory } from '@/features/resource-viewer/model/displayHandle';

export type Deferred<T> = {
  promise: Promise<T>;
  resolve: (value: T) => void;
  reject: (error: unknown) => void;
};

export function deferred<T>(): Deferred<T> {
  let resolve: (value: T) => void = () => {};
  let reject: (error: unknown) => void = () => {};
  const promise = new Promise<T>((res, rej) => {
    resolve = res;
    reject = rej;
  });
  return { promise, resolve, reject };
}

/**
 * Deterministic object URLs (jsdom has no URL.createObjectURL).
 * URLs are `blob:test/<n>` in creation order.
 */
export function createFakeObjectUrls() {
  let counter = 0;
  const live = new Set<string>();
  const created = new Map<string, Blob>();
  const factory: ObjectUrlFactory = {
    create: vi.fn((blob: Blob) => {
      counter += 1;
      const url = `blob:test/${counter}`;
      live.add(url);
      created.set(url, blob);
      return url;
    }),
    revoke: vi.fn((url: string) => {
      live.delete(url);
    }),
  };
  return { factory, live, created };
}
