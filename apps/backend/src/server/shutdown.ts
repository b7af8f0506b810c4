import type { Server as HttpServer } from 'http';
import type { Socket } from 'net';
import { logger } from '../utils/logger.js';

let shutdownSignal: NodeJS.Signals | null = null;

export function isShuttingDown(): boolean {
  return shutdownSignal !== null;
}

type ShutdownDeps = {
  httpServer: HttpServer;
  shutdownTimeoutMs: number;
  httpDrainTimeoutMs: number;
};

export function setupShutdownHandlers(deps: ShutdownDeps) {
  const { httpServer } = deps;
  const activeHttpConnections = new Set<Socket>();
  httpServer.on('connection', (socket: Socket) => {
    activeHttpConnections.add(socket);
    socket.on('close', () => {
      activeHttpConnections.delete(socket);
    });
  });

  async function closeHttpServerWithDrain(timeoutMs: number): Promise<void> {
    if (!httpServer.listening) return;
    await new Promise<void>((resolve) => {
      let settled = false;
      const done = () => {
        if (settled) return;
        settled = true;
        clearTimeout(timer);
        resolve();
      };

      const timer = setTimeout(() => {
        logger.warn('shutdown.http_drain_timeout', {
          timeoutMs,
          openConnections: activeHttpConnections.size,
        });
        for (const socket of activeHttpConnections) {
          socket.destroy();
        }
        done();
      }, timeoutMs);
      timer.unref?.();

      httpServer.close((err) => {
        if (err) logger.error('shutdown.http_close_failed', { errorMessage: err.message });
        done();
      });
      // Idle keep-alive sockets (a polling viewer holds one) would otherwise block close().
      httpServer.closeIdleConnections();
    });
  }

  async function shutdown(signal: NodeJS.Signals): Promise<void> {
    if (shutdownSignal) return;
    shutdownSignal = signal;

    logger.info('shutdown.start', {
      signal,
      timeoutMs: deps.shutdownTimeoutMs,
      httpDrainTimeoutMs: deps.httpDrainTimeoutMs,
    });

    const timer = setTimeout(() => {
      logger.error('shutdown.timeout', { signal, timeoutMs: deps.shutdownTimeoutMs });
      process.exit(1);
    }, deps.shutdownTimeoutMs);
    timer.unref?.();

    await closeHttpServerWithDrain(Math.min(deps.httpDrainTimeoutMs, deps.shutdownTimeoutMs));

    clearTimeout(timer);
    logger.info('shutdown.complete', { signal });
    process.exit(0);
  }

  const onSignal = (signal: NodeJS.Signals) => {
    shutdown(signal).catch((error: unknown) => {
      logger.error('shutdown.failed', { signal, errorMessage: error instanceof Error ? error.message : String(error) });
      process.exit(1);
    });
  };
  process.on('SIGINT', onSignal);
  process.on('SIGTERM', onSignal);

  return { shutdown };
}
