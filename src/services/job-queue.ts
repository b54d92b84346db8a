/**
 * In-process ingestion task queue.
 *
 * Submissions are queued under the task name `ingest_<adapter>_task` and
 * picked up by a polling worker loop that runs up to `concurrency` attempts at
 * once. Each attempt is handed to the registered handler (the orchestrator).
 *
 * A `redeliver` outcome puts the same job back with `attempt + 1`, available
 * again after the countdown. Delivery is at least once: a job that is running
 * when the process dies is not recovered here.
 *
 * @module services/job-queue
 */

import { randomUUID } from 'crypto';
import type { TaskErrorReport } from '../core/error-classifier';
import { errorMessage, logger } from '../utils/logger';
import { taskNameFor, type AttemptOutcome, type IngestionTask } from './task-orchestrator';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type IngestionJobStatus = 'queued' | 'running' | 'retry_scheduled' | 'succeeded' | 'failed' | 'cancelled';

export interface IngestionSubmission {
  adapterType: string;
  sourceConfig: unknown;
  correlationId?: string;
}

export interface IngestionJob {
  id: string;
  taskName: string;
  adapterType: string;
  correlationId?: string;
  status: IngestionJobStatus;
  /** Retries already performed. */
  attempt: number;
  /** Times the job has been handed to a worker. */
  deliveries: number;
  createdAt: string;
  availableAt: string;
  startedAt?: string;
  completedAt?: string;
  lastCountdownSeconds?: number;
  lastError?: TaskErrorReport;
  result?: {
    recordId: string | null;
    durationMs: number;
    isValid: boolean;
  };
}

export type IngestionJobHandler = (task: IngestionTask) => Promise<AttemptOutcome>;

export interface QueueStats {
  queued: number;
  scheduled: number;
  running: number;
  total: number;
  active: boolean;
}

const TERMINAL: ReadonlySet<IngestionJobStatus> = new Set(['succeeded', 'failed', 'cancelled']);

const MAX_FINISHED_JOBS = 1000;

// ---------------------------------------------------------------------------
// IngestionQueue
// ---------------------------------------------------------------------------

export class IngestionQueue {
  private readonly jobs = new Map<string, IngestionJob>();

  /** Source configs stay private to the queue; job views never expose them. */
  private readonly tasks = new Map<string, IngestionTask>();

  /** Jobs waiting to run, in submission order. */
  private pending: string[] = [];

  private readonly inflight = new Map<string, Promise<void>>();
  private handler: IngestionJobHandler | null = null;
  private workerInterval: ReturnType<typeof setInterval> | null = null;
  private active = false;

  private readonly concurrency: number;
  private readonly pollIntervalMs: number;
  private readonly now: () => number;

  constructor(options?: { concurrency?: number; pollIntervalMs?: number; now?: () => number }) {
    this.concurrency = Math.max(1, options?.concurrency ?? 4);
    this.pollIntervalMs = options?.pollIntervalMs ?? 250;
    this.now = options?.now ?? (() => Date.now());
  }

  // -----------------------------------------------------------------------
  // Public API
  // -----------------------------------------------------------------------

  registerHandler(handler: IngestionJobHandler): void {
    this.handler = handler;
  }

  enqueue(submission: IngestionSubmission): IngestionJob {
    const id = randomUUID();
    const now = new Date(this.now()).toISOString();

    const job: IngestionJob = {
      id,
      taskName: taskNameFor(submission.adapterType),
      adapterType: submission.adapterType,
      status: 'queued',
      attempt: 0,
      deliveries: 0,
      createdAt: now,
      availableAt: now,
      ...(submission.correlationId !== undefined ? { correlationId: submission.correlationId } : {})
    };

    this.jobs.set(id, job);
    this.tasks.set(id, {
      adapterType: submission.adapterType,
      sourceConfig: submission.sourceConfig,
      attempt: 0,
      ...(submission.correlationId !== undefined ? { correlationId: submission.correlationId } : {})
    });
    this.pending.push(id);

    logger.info('ingestion task enqueued', { jobId: id, taskName: job.taskName, correlationId: job.correlationId });
    return { ...job };
  }

  /**
   * Cancel a job that is waiting (queued or scheduled for retry). Running
   * attempts are not interrupted.
   */
  cancel(jobId: string): boolean {
    const job = this.jobs.get(jobId);
    if (!job || (job.status !== 'queued' && job.status !== 'retry_scheduled')) {
      return false;
    }

    this.pending = this.pending.filter(id => id !== jobId);
    job.status = 'cancelled';
    job.completedAt = new Date(this.now()).toISOString();
    this.tasks.delete(jobId);

    logger.info('ingestion task cancelled', { jobId });
    this.evictFinishedJobs();
    return true;
  }

  getJob(jobId: string): IngestionJob | undefined {
    const job = this.jobs.get(jobId);
    return job ? { ...job } : undefined;
  }

  listJobs(filter?: { status?: IngestionJobStatus; adapterType?: string; limit?: number }): IngestionJob[] {
    const jobs = Array.from(this.jobs.values())
      .filter(job => !filter?.status || job.status === filter.status)
      .filter(job => !filter?.adapterType || job.adapterType === filter.adapterType)
      .map(job => ({ ...job }));

    // Newest first
    jobs.sort((a, b) => b.createdAt.localeCompare(a.createdAt));
    return jobs.slice(0, filter?.limit ?? jobs.length);
  }

  start(): void {
    if (this.active) return;
    this.active = true;

    this.workerInterval = setInterval(() => {
      this.processNext();
    }, this.pollIntervalMs);

    // Don't prevent process exit
    this.workerInterval.unref();

    logger.info('ingestion queue started', { concurrency: this.concurrency });
  }

  /**
   * Stop taking work and wait for running attempts to finish.
   */
  async stop(): Promise<void> {
    this.active = false;

    if (this.workerInterval) {
      clearInterval(this.workerInterval);
      this.workerInterval = null;
    }

    await Promise.all(this.inflight.values());
    logger.info('ingestion queue stopped');
  }

  getStats(): QueueStats {
    let queued = 0;
    let scheduled = 0;
    for (const job of this.jobs.values()) {
      if (job.status === 'queued') queued++;
      if (job.status === 'retry_scheduled') scheduled++;
    }
    return { queued, scheduled, running: this.inflight.size, total: this.jobs.size, active: this.active };
  }

  // -----------------------------------------------------------------------
  // Internal methods
  // -----------------------------------------------------------------------

  /**
   * Worker loop tick: start due jobs up to the concurrency limit.
   */
  private processNext(): void {
    if (!this.active || !this.handler) return;

    const now = this.now();
    const remaining: string[] = [];

    for (const jobId of this.pending) {
      const job = this.jobs.get(jobId);
      if (!job || TERMINAL.has(job.status)) continue;

      const due = Date.parse(job.availableAt) <= now;
      if (due && this.inflight.size < this.concurrency) {
        this.executeJob(job, this.handler);
      } else {
        remaining.push(jobId);
      }
    }

    this.pending = remaining;
  }

  private executeJob(job: IngestionJob, handler: IngestionJobHandler): void {
    const task = this.tasks.get(job.id);
    if (!task) return;

    job.status = 'running';
    job.deliveries++;
    job.startedAt = new Date(this.now()).toISOString();

    logger.info('ingestion task started', { jobId: job.id, taskName: job.taskName, attempt: task.attempt });

    const run = handler({ ...task })
      .then(outcome => this.applyOutcome(job, task, outcome))
      .catch((error: unknown) => {
        // The handler reports failures as outcomes; reaching here is a bug in it.
        job.status = 'failed';
        job.completedAt = new Date(this.now()).toISOString();
        this.tasks.delete(job.id);
        logger.error('ingestion task handler threw', { jobId: job.id, error: errorMessage(error) });
      })
      .finally(() => {
        this.inflight.delete(job.id);
        this.evictFinishedJobs();
      });

    this.inflight.set(job.id, run);
  }

  private applyOutcome(job: IngestionJob, task: IngestionTask, outcome: AttemptOutcome): void {
    const finishedAt = new Date(this.now()).toISOString();

    if (outcome.status === 'succeeded') {
      job.status = 'succeeded';
      job.completedAt = finishedAt;
      job.result = {
        recordId: outcome.record?.id ?? null,
        durationMs: outcome.payload.metadata.processingDurationMs,
        isValid: outcome.payload.validation.isValid
      };
      this.tasks.delete(job.id);
      logger.info('ingestion task succeeded', { jobId: job.id, attempt: task.attempt });
      return;
    }

    job.lastError = outcome.report;

    if (outcome.decision.type === 'redeliver') {
      const { countdownSeconds, nextAttempt } = outcome.decision;
      task.attempt = nextAttempt;
      job.attempt = nextAttempt;
      job.status = 'retry_scheduled';
      job.lastCountdownSeconds = countdownSeconds;
      job.availableAt = new Date(this.now() + countdownSeconds * 1000).toISOString();
      this.pending.push(job.id);
      logger.info('ingestion task redelivery scheduled', { jobId: job.id, countdownSeconds, nextAttempt });
      return;
    }

    job.status = 'failed';
    job.completedAt = finishedAt;
    this.tasks.delete(job.id);
  }

  /**
   * Keep at most {@link MAX_FINISHED_JOBS} finished jobs in memory. Persisted
   * ingestion records are the durable history.
   */
  private evictFinishedJobs(): void {
    const finished = Array.from(this.jobs.values()).filter(job => TERMINAL.has(job.status));
    if (finished.length <= MAX_FINISHED_JOBS) return;

    finished.sort((a, b) => (a.completedAt ?? a.createdAt).localeCompare(b.completedAt ?? b.createdAt));
    const toRemove = finished.length - MAX_FINISHED_JOBS;
    for (const job of finished.slice(0, toRemove)) {
      this.jobs.delete(job.id);
    }
    logger.debug('evicted finished ingestion jobs', { count: toRemove });
  }
}
