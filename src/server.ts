// Load environment variables from .env file
import 'dotenv/config';

import type { Server } from 'http';
import { loadConfig, type AppConfig } from './config/env';
import { errorMessage, logger } from './utils/logger';
import { createApp } from './app';
import { createRuntime } from './runtime';

const EXPECTED_SOCKET_ERRORS = new Set(['EPIPE', 'ECONNRESET', 'ERR_STREAM_DESTROYED']);

const errorCode = (error: Error): string | undefined =>
  'code' in error && typeof error.code === 'string' ? error.code : undefined;

/**
 * Build the runtime, start listening and install signal handlers. Resolves
 * once the server is accepting connections.
 */
export async function startServer(config: AppConfig = loadConfig()): Promise<Server> {
  const runtime = await createRuntime(config);
  const app = createApp(runtime);

  const server = await new Promise<Server>((resolve) => {
    const listening = app.listen(config.port, () => resolve(listening));
  });

  server.setTimeout(config.requestTimeoutMs);
  server.keepAliveTimeout = 65_000; // Slightly above typical LB timeout (60s)
  server.headersTimeout = 70_000;   // Must be > keepAliveTimeout

  runtime.start();
  logger.info('sluice ingestion service listening', {
    port: config.port,
    store: runtime.store.backend,
    publisher: runtime.publisher.name,
    adapters: runtime.registry.list()
  });

  server.on('clientError', (err: Error, socket) => {
    logger.debug('client connection error', { error: err.message, code: errorCode(err) });
    if (!socket.destroyed) {
      socket.end('HTTP/1.1 400 Bad Request\r\n\r\n');
    }
  });

  server.on('connection', (socket) => {
    socket.on('error', (err: Error) => {
      const code = errorCode(err);
      if (!code || !EXPECTED_SOCKET_ERRORS.has(code)) {
        logger.warn('socket error', { error: err.message, code });
      }
    });
  });

  let shuttingDown = false;
  const shutdown = async (): Promise<void> => {
    if (shuttingDown) return;
    shuttingDown = true;
    logger.info('shutting down service');

    // Force exit after 30s to prevent hanging on stuck connections
    const forceExitTimer = setTimeout(() => {
      logger.error('graceful shutdown timed out after 30s, forcing exit');
      process.exit(1);
    }, 30_000);
    forceExitTimer.unref();

    try {
      await new Promise<void>((resolve, reject) => {
        server.close((err) => (err ? reject(err) : resolve()));
      });
      logger.info('HTTP server closed, connections drained');
    } catch (error) {
      logger.error('HTTP server close failed', { error: errorMessage(error) });
    }

    await runtime.stop().catch((error: unknown) => {
      logger.error('runtime shutdown failed', { error: errorMessage(error) });
    });

    process.exit(0);
  };

  process.on('SIGINT', () => void shutdown());
  process.on('SIGTERM', () => void shutdown());

  return server;
}

if (require.main === module) {
  startServer().catch((error: unknown) => {
    logger.error('failed to start service', { error: errorMessage(error) });
    process.exit(1);
  });
}
