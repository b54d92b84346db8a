/**
 * Task Orchestrator
 *
 * Drives one ingestion attempt through
 * `Admitted → CircuitChecked → Executing → {Succeeded | Failed}` and, on
 * failure, decides between redelivery and a terminal outcome.
 *
 * Rate-limit admission happens before this class is reached (HTTP path only).
 * The orchestrator never loops: a redeliver decision is handed back to the
 * caller, which re-enqueues the task with the countdown and `attempt + 1`.
 *
 * Persistence and event publishing are best effort. Their failures are
 * logged and counted and never change the attempt's outcome.
 *
 * @module services/task-orchestrator
 */

import type { ProcessingMode } from '../config/env';
import { defaultSourceId, prepareAttempt, type AdapterSettings } from '../core/adapter-settings';
import type { CircuitBreakerRegistry } from '../core/circuit-breaker';
import { buildErrorReport, classifyError, type TaskErrorReport } from '../core/error-classifier';
import { AdapterNotFoundError, ErrorKind } from '../core/errors';
import { processAdapter, type IngestionPayload } from '../core/pipeline';
import { resolveRetryPolicy, type RetryPolicy } from '../core/retry-policy';
import { errorMessage, logger, runWithContext, setRequestContext } from '../utils/logger';
import type { AdapterRegistry } from './adapters/registry';
import { buildErrorEvent, buildSuccessEvent, type IngestionEvent, type IngestionEventPublisher } from './event-publisher';
import {
  buildErrorRecord,
  buildSuccessRecord,
  type IngestionRecord,
  type IngestionRecordInput,
  type IngestionRecordStore
} from './ingestion-store';
import type { IngestionMetrics } from './metrics';
import type { WorkerPool } from './worker-pool';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/** Task submission shape shared by the HTTP path and the queue. */
export interface IngestionTask {
  adapterType: string;
  sourceConfig: unknown;
  correlationId?: string;
  /** Zero-based count of retries already performed for this submission. */
  attempt: number;
}

export type RetryDecision =
  | { type: 'redeliver'; countdownSeconds: number; nextAttempt: number }
  | { type: 'terminal' };

export type AttemptOutcome =
  | {
      status: 'succeeded';
      payload: IngestionPayload;
      record: IngestionRecord | null;
    }
  | {
      status: 'failed';
      report: TaskErrorReport;
      decision: RetryDecision;
      durationMs: number;
      record: IngestionRecord | null;
    };

export interface ExecuteOptions {
  /** False on the synchronous path, which surfaces every failure directly. */
  allowRedelivery?: boolean;
}

export interface TaskOrchestratorDeps {
  registry: AdapterRegistry;
  circuitBreaker: CircuitBreakerRegistry;
  defaultRetryPolicy: RetryPolicy;
  workerPool: WorkerPool;
  store: IngestionRecordStore;
  publisher: IngestionEventPublisher;
  metrics: IngestionMetrics;
  processingMode?: ProcessingMode;
  now?: () => number;
}

export const taskNameFor = (adapterType: string): string => `ingest_${adapterType}_task`;

/** Metrics label for submissions naming an unregistered adapter. */
export const UNKNOWN_ADAPTER_LABEL = 'unknown';

// ---------------------------------------------------------------------------
// TaskOrchestrator
// ---------------------------------------------------------------------------

export class TaskOrchestrator {
  private readonly deps: TaskOrchestratorDeps;
  private readonly now: () => number;

  constructor(deps: TaskOrchestratorDeps) {
    this.deps = deps;
    this.now = deps.now ?? Date.now;
  }

  listAdapters(): string[] {
    return this.deps.registry.list();
  }

  /**
   * Run one attempt of `task`. Never rejects: every failure is classified,
   * reported and returned as a `failed` outcome.
   */
  execute(task: IngestionTask, options: ExecuteOptions = {}): Promise<AttemptOutcome> {
    const context = {
      adapterType: task.adapterType,
      attempt: task.attempt,
      ...(task.correlationId !== undefined ? { correlationId: task.correlationId } : {})
    };
    return runWithContext(context, () => this.runAttempt(task, options.allowRedelivery ?? true));
  }

  private async runAttempt(task: IngestionTask, allowRedelivery: boolean): Promise<AttemptOutcome> {
    const { registry, circuitBreaker, defaultRetryPolicy, workerPool, metrics } = this.deps;
    const { adapterType } = task;

    let settings: AdapterSettings | undefined;
    let policy = defaultRetryPolicy;
    let durationMs = 0;

    try {
      // Admitted
      const prepared = prepareAttempt(adapterType, task.sourceConfig, {
        ...(task.correlationId !== undefined ? { correlationId: task.correlationId } : {}),
        ...(this.deps.processingMode ? { processingMode: this.deps.processingMode } : {})
      });
      const attemptSettings = prepared.settings;
      settings = attemptSettings;
      setRequestContext({
        sourceId: attemptSettings.sourceId,
        ...(attemptSettings.correlationId !== undefined ? { correlationId: attemptSettings.correlationId } : {})
      });
      policy = resolveRetryPolicy(prepared.retryOverride, defaultRetryPolicy);

      // Unknown names never reach the breaker, so they cannot open a circuit or add state.
      if (!registry.has(adapterType)) {
        throw new AdapterNotFoundError(adapterType, registry.list());
      }

      // CircuitChecked
      circuitBreaker.ensureAvailable(adapterType);

      // Executing
      const adapter = registry.create(adapterType, attemptSettings);
      logger.debug('executing adapter pipeline', { taskName: taskNameFor(adapterType) });

      const payload = await workerPool.run(() =>
        processAdapter(adapter, attemptSettings, {
          now: this.now,
          onDuration: elapsed => {
            durationMs = elapsed;
            metrics.recordDuration(elapsed);
          }
        })
      );

      return await this.succeed(payload);
    } catch (error) {
      const sourceId = settings?.sourceId ?? this.fallbackSourceId(task);
      const correlationId = settings?.correlationId ?? task.correlationId;
      return await this.fail(error, { task, sourceId, correlationId, policy, durationMs, allowRedelivery });
    }
  }

  // -------------------------------------------------------------------------
  // Succeeded
  // -------------------------------------------------------------------------

  private async succeed(payload: IngestionPayload): Promise<AttemptOutcome> {
    const { metadata, validation } = payload;
    this.deps.circuitBreaker.recordSuccess(metadata.adapterType);

    const record = await this.persist(buildSuccessRecord(payload));
    await this.publish(buildSuccessEvent(payload));
    this.deps.metrics.recordAttempt(metadata.adapterType, 'success');

    logger.info('ingestion attempt succeeded', {
      durationMs: metadata.processingDurationMs,
      isValid: validation.isValid,
      errorCount: validation.errors.length,
      warningCount: validation.warnings.length
    });

    return { status: 'succeeded', payload, record };
  }

  // -------------------------------------------------------------------------
  // Failed
  // -------------------------------------------------------------------------

  private async fail(
    error: unknown,
    ctx: {
      task: IngestionTask;
      sourceId: string;
      correlationId: string | undefined;
      policy: RetryPolicy;
      durationMs: number;
      allowRedelivery: boolean;
    }
  ): Promise<AttemptOutcome> {
    const { circuitBreaker, metrics, registry } = this.deps;
    const { task, policy } = ctx;
    const kind = classifyError(error);

    if (kind === ErrorKind.CIRCUIT_OPEN) {
      metrics.recordCircuitRejection();
    } else if (!(error instanceof AdapterNotFoundError)) {
      circuitBreaker.recordFailure(task.adapterType);
    }

    const decision = this.decide(kind, task.attempt, policy, ctx.allowRedelivery);
    const report = buildErrorReport(error, {
      adapterType: task.adapterType,
      sourceId: ctx.sourceId,
      ...(ctx.correlationId !== undefined ? { correlationId: ctx.correlationId } : {}),
      policy,
      extraDetails: {
        retry_policy: policy.toJSON(),
        attempt: task.attempt,
        decision
      },
      now: () => new Date(this.now())
    });

    const record = await this.persist(buildErrorRecord(report, ctx.durationMs));
    await this.publish(buildErrorEvent(report, ctx.durationMs));
    metrics.recordAttempt(registry.has(task.adapterType) ? task.adapterType : UNKNOWN_ADAPTER_LABEL, 'error');
    metrics.recordError(report.classification, report.errorType);

    if (decision.type === 'redeliver') {
      metrics.recordRedelivery();
      logger.warn('ingestion attempt failed, scheduling redelivery', {
        classification: report.classification,
        error: report.message,
        countdownSeconds: decision.countdownSeconds,
        nextAttempt: decision.nextAttempt
      });
    } else {
      logger.error('ingestion attempt failed', { report });
    }

    return { status: 'failed', report, decision, durationMs: ctx.durationMs, record };
  }

  private decide(kind: ErrorKind, attempt: number, policy: RetryPolicy, allowRedelivery: boolean): RetryDecision {
    if (!allowRedelivery || kind === ErrorKind.CIRCUIT_OPEN) {
      return { type: 'terminal' };
    }
    if (!policy.shouldRetry({ kind }) || attempt >= policy.maxAttempts) {
      return { type: 'terminal' };
    }
    return {
      type: 'redeliver',
      countdownSeconds: policy.nextCountdown(attempt),
      nextAttempt: attempt + 1
    };
  }

  // -------------------------------------------------------------------------
  // Side effects
  // -------------------------------------------------------------------------

  private async persist(input: IngestionRecordInput): Promise<IngestionRecord | null> {
    try {
      return await this.deps.store.persist(input);
    } catch (error) {
      this.deps.metrics.recordPersistenceFailure();
      logger.error('failed to persist ingestion record', { status: input.status, error: errorMessage(error) });
      return null;
    }
  }

  private async publish(event: IngestionEvent): Promise<void> {
    let delivered: boolean;
    try {
      delivered = await this.deps.publisher.publish(event);
    } catch (error) {
      logger.error('event publisher threw', { publisher: this.deps.publisher.name, error: errorMessage(error) });
      delivered = false;
    }
    if (!delivered) {
      this.deps.metrics.recordPublishFailure();
    }
  }

  private fallbackSourceId(task: IngestionTask): string {
    const config = task.sourceConfig;
    if (typeof config === 'object' && config !== null && 'source_id' in config) {
      const value = config.source_id;
      if (typeof value === 'string' && value.trim().length > 0) {
        return value;
      }
    }
    return defaultSourceId(task.adapterType);
  }
}
