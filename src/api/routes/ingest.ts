/**
 * Ingestion API Routes
 *
 * Endpoints:
 *   POST   /v1/ingest                 Run one attempt synchronously
 *   POST   /v1/ingest/jobs            Queue a task (retries are redelivered)
 *   GET    /v1/ingest/jobs            List queued and finished tasks
 *   GET    /v1/ingest/jobs/:jobId     Task status
 *   DELETE /v1/ingest/jobs/:jobId     Cancel a waiting task
 *   GET    /v1/ingest/adapters        Registered adapter names
 *   GET    /v1/ingest/circuits        Circuit breaker state per adapter
 *   GET    /v1/ingest/records         Persisted attempt records
 *   GET    /v1/ingest/records/:id     One record
 *
 * @module api/routes/ingest
 */

import { Router, Request, Response } from 'express';
import { z } from 'zod';
import { statusForErrorKind, type TaskErrorReport } from '../../core/error-classifier';
import { ErrorKind } from '../../core/errors';
import { ErrorCode, asyncHandler, errorCodeForStatus, retryAfterSeconds } from '../../middleware/error-handler';
import type { Runtime } from '../../runtime';
import { taskNameFor } from '../../services/task-orchestrator';
import { logger } from '../../utils/logger';

// ---------------------------------------------------------------------------
// Zod schemas
// ---------------------------------------------------------------------------

const ingestRequestSchema = z.object({
  adapter_type: z.string().trim().min(1),
  source_config: z.record(z.string(), z.unknown()).default({}),
  correlation_id: z.string().trim().min(1).optional()
});

const listJobsQuerySchema = z.object({
  status: z.enum(['queued', 'running', 'retry_scheduled', 'succeeded', 'failed', 'cancelled']).optional(),
  adapter_type: z.string().min(1).optional(),
  limit: z.coerce.number().int().min(1).max(500).optional()
});

const listRecordsQuerySchema = z.object({
  correlation_id: z.string().min(1).optional(),
  status: z.enum(['success', 'error']).optional(),
  adapter_type: z.string().min(1).optional(),
  limit: z.coerce.number().int().min(1).max(500).default(50)
});

type IngestRequest = z.infer<typeof ingestRequestSchema>;

const invalidRequest = (req: Request, res: Response, message: string, error: z.ZodError): void => {
  res.status(400).json({
    error: ErrorCode.INVALID_REQUEST,
    message,
    details: error.flatten(),
    timestamp: Date.now(),
    path: req.path
  });
};

const correlationIdFor = (req: Request, body: IngestRequest): string | undefined =>
  body.correlation_id ?? (req.header('x-correlation-id') || undefined);

/** Instant (ms) an open circuit closes, from the report's `reopenAt` detail. */
const circuitReopenAt = (report: TaskErrorReport): number | undefined => {
  const reopenAt = report.details.reopenAt;
  if (typeof reopenAt !== 'string') {
    return undefined;
  }
  const reopenMs = Date.parse(reopenAt);
  return Number.isNaN(reopenMs) ? undefined : reopenMs;
};

export function createIngestRouter(runtime: Runtime): Router {
  const router = Router();
  const { orchestrator, queue, store, circuitBreaker } = runtime;

  // -------------------------------------------------------------------------
  // POST /  - Synchronous attempt
  // -------------------------------------------------------------------------

  router.post('/', asyncHandler(async (req: Request, res: Response) => {
    const parsed = ingestRequestSchema.safeParse(req.body);
    if (!parsed.success) {
      invalidRequest(req, res, 'Ingestion request validation failed', parsed.error);
      return;
    }

    const body = parsed.data;
    const correlationId = correlationIdFor(req, body);

    if (req.socket.destroyed) {
      logger.warn('client disconnected before ingestion started', { adapterType: body.adapter_type });
      return;
    }

    const outcome = await orchestrator.execute(
      {
        adapterType: body.adapter_type,
        sourceConfig: body.source_config,
        attempt: 0,
        ...(correlationId !== undefined ? { correlationId } : {})
      },
      { allowRedelivery: false }
    );

    if (outcome.status === 'succeeded') {
      res.json({
        status: 'success',
        message: `Ingestion completed for adapter '${body.adapter_type}'`,
        record_id: outcome.record?.id ?? null,
        payload: outcome.payload
      });
      return;
    }

    const { report } = outcome;
    if (report.classification === ErrorKind.CIRCUIT_OPEN) {
      const reopenAt = circuitReopenAt(report);
      if (reopenAt !== undefined) {
        res.setHeader('Retry-After', retryAfterSeconds(reopenAt).toString());
      }
    }

    const statusCode = statusForErrorKind(report.classification);
    res.status(statusCode).json({
      status: 'error',
      error: errorCodeForStatus(statusCode),
      message: report.message,
      record_id: outcome.record?.id ?? null,
      error_details: report
    });
  }));

  // -------------------------------------------------------------------------
  // Queued tasks
  // -------------------------------------------------------------------------

  router.post('/jobs', (req: Request, res: Response) => {
    const parsed = ingestRequestSchema.safeParse(req.body);
    if (!parsed.success) {
      invalidRequest(req, res, 'Ingestion request validation failed', parsed.error);
      return;
    }

    const body = parsed.data;
    const correlationId = correlationIdFor(req, body);
    const job = queue.enqueue({
      adapterType: body.adapter_type,
      sourceConfig: body.source_config,
      ...(correlationId !== undefined ? { correlationId } : {})
    });

    res.status(202).json({
      jobId: job.id,
      taskName: taskNameFor(body.adapter_type),
      status: job.status
    });
  });

  router.get('/jobs', (req: Request, res: Response) => {
    const parsed = listJobsQuerySchema.safeParse(req.query);
    if (!parsed.success) {
      invalidRequest(req, res, 'Invalid job filters', parsed.error);
      return;
    }

    const { status, adapter_type: adapterType, limit } = parsed.data;
    const jobs = queue.listJobs({
      ...(status ? { status } : {}),
      ...(adapterType ? { adapterType } : {}),
      ...(limit ? { limit } : {})
    });

    res.json({ jobs, count: jobs.length, stats: queue.getStats() });
  });

  router.get('/jobs/:jobId', (req: Request, res: Response) => {
    const { jobId } = req.params;
    const job = queue.getJob(jobId);

    if (!job) {
      res.status(404).json({
        error: 'job_not_found',
        message: `Job '${jobId}' not found`,
        timestamp: Date.now(),
        path: req.path
      });
      return;
    }

    res.json(job);
  });

  router.delete('/jobs/:jobId', (req: Request, res: Response) => {
    const { jobId } = req.params;
    const job = queue.getJob(jobId);

    if (!job) {
      res.status(404).json({
        error: 'job_not_found',
        message: `Job '${jobId}' not found`,
        timestamp: Date.now(),
        path: req.path
      });
      return;
    }

    if (!queue.cancel(jobId)) {
      res.status(409).json({
        error: 'cannot_cancel',
        message: `Job '${jobId}' is ${job.status} and cannot be cancelled`,
        timestamp: Date.now(),
        path: req.path
      });
      return;
    }

    res.json({ jobId, status: 'cancelled' });
  });

  // -------------------------------------------------------------------------
  // Introspection
  // -------------------------------------------------------------------------

  router.get('/adapters', (_req: Request, res: Response) => {
    const adapters = orchestrator.listAdapters();
    res.json({ adapters, tasks: adapters.map(taskNameFor) });
  });

  router.get('/circuits', (_req: Request, res: Response) => {
    res.json({ circuits: circuitBreaker.snapshot() });
  });

  router.get('/records', asyncHandler(async (req: Request, res: Response) => {
    const parsed = listRecordsQuerySchema.safeParse(req.query);
    if (!parsed.success) {
      invalidRequest(req, res, 'Invalid record filters', parsed.error);
      return;
    }

    const { correlation_id: correlationId, status, adapter_type: adapterType, limit } = parsed.data;
    const records = correlationId
      ? (await store.findByCorrelationId(correlationId))
          .filter(record => !status || record.status === status)
          .filter(record => !adapterType || record.adapterType === adapterType)
          .slice(0, limit)
      : await store.list({
          limit,
          ...(status ? { status } : {}),
          ...(adapterType ? { adapterType } : {})
        });

    res.json({ records, count: records.length, backend: store.backend });
  }));

  router.get('/records/:recordId', asyncHandler(async (req: Request, res: Response) => {
    const record = await store.get(req.params.recordId);
    if (!record) {
      res.status(404).json({
        error: 'record_not_found',
        message: `Record '${req.params.recordId}' not found`,
        timestamp: Date.now(),
        path: req.path
      });
      return;
    }
    res.json(record);
  }));

  return router;
}
