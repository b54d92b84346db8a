/**
 * Express application factory.
 * Kept apart from server.ts so tests can drive it with supertest.
 */

import express from 'express';
import helmet from 'helmet';
import { logger } from './utils/logger';
import type { Runtime } from './runtime';
import { createIngestRouter } from './api/routes/ingest';
import { requestContextMiddleware } from './middleware/request-context';
import { createAuditLogMiddleware } from './middleware/audit-log';
import { createAuthMiddleware } from './middleware/auth';
import { createRateLimitMiddleware } from './middleware/rate-limit';
import { errorHandler, notFoundHandler } from './middleware/error-handler';

export function createApp(runtime: Runtime): express.Express {
  const { config, metrics, queue, circuitBreaker, rateLimiter, workerPool, parser } = runtime;
  const app = express();

  app.disable('x-powered-by');
  app.use(helmet());

  // Request context middleware (must be early for tracing)
  app.use(requestContextMiddleware);

  app.use(express.json({ limit: '1mb' }));

  app.get('/health', (_req, res) => {
    res.json({ status: 'ok', timestamp: Date.now() });
  });

  app.get('/ready', async (_req, res, next) => {
    try {
      const health = await runtime.health();
      const statusCode = health.status === 'unhealthy' ? 503 : 200;
      res.status(statusCode).json({
        ...health,
        workerPool: workerPool.stats(),
        parseWorkers: parser.stats(),
        metrics: metrics.snapshot()
      });
    } catch (error) {
      next(error);
    }
  });

  app.get('/metrics', (_req, res) => {
    const stats = queue.getStats();
    const pool = workerPool.stats();
    res.setHeader('Content-Type', 'text/plain; version=0.0.4');
    res.send(metrics.renderPrometheus({
      sluice_queue_depth: { help: 'Tasks waiting to run (queued or scheduled for retry)', value: stats.queued + stats.scheduled },
      sluice_queue_running: { help: 'Tasks currently running', value: stats.running },
      sluice_worker_pool_active: { help: 'Busy worker pool slots', value: pool.active },
      sluice_parse_workers_busy: { help: 'Parse worker threads currently parsing', value: parser.stats().busy },
      sluice_circuits_open: { help: 'Adapters with an open circuit', value: circuitBreaker.openCircuits().length }
    }));
  });

  // Audit log (before rate limiting and auth, whose denials it records)
  app.use('/v1', createAuditLogMiddleware(config.audit));

  if (config.rateLimit.enabled) {
    app.use(createRateLimitMiddleware({
      limiter: rateLimiter,
      limitBy: config.rateLimit.limitBy,
      exemptPaths: config.rateLimit.exemptPaths,
      metrics
    }));
    logger.info('Rate limiting enabled', {
      requestsPerWindow: config.rateLimit.requestsPerWindow,
      windowSeconds: config.rateLimit.windowSeconds,
      limitBy: config.rateLimit.limitBy
    });
  }

  app.use('/v1', createAuthMiddleware(config.auth));
  if (config.auth.enabled) {
    logger.info('API authentication enabled');
  }

  app.use('/v1/ingest', createIngestRouter(runtime));

  // 404 handler for undefined routes (must be after all route definitions)
  app.use(notFoundHandler);

  // Global error handler (must be last)
  app.use(errorHandler);

  return app;
}
