import type { Server as HttpServer } from 'http';
import request from 'supertest';
import { describe, expect, it, vi } from 'vitest';
import { isShuttingDown, setupShutdownHandlers } from '../src/server/shutdown.js';
import { buildApp } from './helpers.js';

describe('graceful shutdown', () => {
  it('drains the http server and exits on SIGTERM', async () => {
    vi.spyOn(process.stdout, 'write').mockImplementation(() => true);
    const handlers: Record<string, (signal: NodeJS.Signals) => void> = {};
    const onSpy = vi.spyOn(process, 'on').mockImplementation((event, listener) => {
      handlers[String(event)] = listener as (signal: NodeJS.Signals) => void;
      return process;
    });

    let resolveExit: (code: number) => void = () => {};
    const exitPromise = new Promise<number>((resolve) => {
      resolveExit = resolve;
    });
    const exitSpy = vi.spyOn(process, 'exit').mockImplementation(((code?: number) => {
      resolveExit(code ?? 0);
      return undefined as never;
    }) as never);

    const httpServer = {
      listening: true,
      on: vi.fn(),
      close: vi.fn((cb?: (err?: Error) => void) => cb?.()),
      closeIdleConnections: vi.fn(),
    } as unknown as HttpServer;

    setupShutdownHandlers({ httpServer, shutdownTimeoutMs: 2000, httpDrainTimeoutMs: 100 });

    expect(Object.keys(handlers).sort()).toEqual(['SIGINT', 'SIGTERM']);
    handlers.SIGTERM?.('SIGTERM');
    const exitCode = await exitPromise;

    expect(exitCode).toBe(0);
    expect(httpServer.close).toHaveBeenCalledTimes(1);
    expect(httpServer.closeIdleConnections).toHaveBeenCalledTimes(1);
    expect(isShuttingDown()).toBe(true);

    const health = await request(buildApp()).get('/health');
    expect(health.status).toBe(503);
    expect(health.body).toEqual({ status: 'shutting_down' });

    // A second signal is ignored once shutdown has started.
    handlers.SIGINT?.('SIGINT');
    await Promise.resolve();
    expect(httpServer.close).toHaveBeenCalledTimes(1);

    onSpy.mockRestore();
    exitSpy.mockRestore();
  });
});
