import './config/loadEnv.js';
import { createServer } from 'http';
import { createApp } from './app.js';
import { loadServerConfig, type ServerConfig } from './config/env.js';
import { setupShutdownHandlers } from './server/shutdown.js';
import { logger } from './utils/logger.js';

function startServer() {
  let config: ServerConfig;
  try {
    config = loadServerConfig();
  } catch {
    // env.invalid already logged the issues.
    process.exit(1);
  }

  const app = createApp({ config });
  const httpServer = createServer(app);

  httpServer.keepAliveTimeout = 65000;
  httpServer.headersTimeout = 66000; // must be > keepAliveTimeout
  httpServer.requestTimeout = 30000;

  setupShutdownHandlers({
    httpServer,
    shutdownTimeoutMs: config.shutdownTimeoutMs,
    httpDrainTimeoutMs: config.httpDrainTimeoutMs,
  });

  httpServer.on('error', (err: NodeJS.ErrnoException) => {
    if (err.code === 'EADDRINUSE') {
      logger.error('server.port_in_use', { port: config.port });
      process.exit(1);
    }
    throw err;
  });

  httpServer.listen(config.port, () => {
    logger.info('server.started', {
      port: config.port,
      nodeEnv: config.nodeEnv,
      resourceFile: config.resourceFile,
      allowedOrigins: config.allowedOrigins,
    });
  });
}

startServer();
