/**
 * Wires the ingestion collaborators together. The HTTP app, the CLI and the
 * tests all build their instances through {@link createRuntime}.
 *
 * @module runtime
 */

import type { AppConfig } from './config/env';
import { CircuitBreakerRegistry } from './core/circuit-breaker';
import { TokenBucketRateLimiter } from './core/rate-limiter';
import { RetryPolicy } from './core/retry-policy';
import { createDefaultRegistry, type AdapterRegistry, type FetchFn } from './services/adapters';
import { createEventPublisher, type IngestionEventPublisher } from './services/event-publisher';
import { performHealthCheck, type HealthStatus } from './services/health-check';
import { createIngestionRecordStore, type IngestionRecordStore } from './services/ingestion-store';
import { IngestionQueue } from './services/job-queue';
import { IngestionMetrics } from './services/metrics';
import { ParseWorkerPool } from './services/parse-workers';
import { TaskOrchestrator } from './services/task-orchestrator';
import { WorkerPool } from './services/worker-pool';
import { errorMessage, logger } from './utils/logger';

export interface RuntimeOverrides {
  registry?: AdapterRegistry;
  store?: IngestionRecordStore;
  publisher?: IngestionEventPublisher;
  fetch?: FetchFn;
  now?: () => number;
}

export interface Runtime {
  readonly config: AppConfig;
  readonly registry: AdapterRegistry;
  readonly circuitBreaker: CircuitBreakerRegistry;
  readonly rateLimiter: TokenBucketRateLimiter;
  readonly defaultRetryPolicy: RetryPolicy;
  readonly workerPool: WorkerPool;
  readonly parser: ParseWorkerPool;
  readonly store: IngestionRecordStore;
  readonly publisher: IngestionEventPublisher;
  readonly metrics: IngestionMetrics;
  readonly orchestrator: TaskOrchestrator;
  readonly queue: IngestionQueue;
  /** Start the queue worker and the rate limiter's bucket sweep. */
  start(): void;
  /** Drain running work and close connections. */
  stop(): Promise<void>;
  health(): Promise<HealthStatus>;
}

export async function createRuntime(config: AppConfig, overrides: RuntimeOverrides = {}): Promise<Runtime> {
  const now = overrides.now ?? Date.now;

  const parser = new ParseWorkerPool({ threads: config.workerPool.parseThreads });
  const registry = overrides.registry
    ?? createDefaultRegistry({ parser, ...(overrides.fetch ? { fetch: overrides.fetch } : {}) });
  const circuitBreaker = new CircuitBreakerRegistry({
    ...config.circuitBreaker,
    now
  });
  const rateLimiter = new TokenBucketRateLimiter({
    requestsPerWindow: config.rateLimit.requestsPerWindow,
    windowSeconds: config.rateLimit.windowSeconds,
    burstSize: config.rateLimit.burstSize,
    now
  });
  const defaultRetryPolicy = new RetryPolicy(config.retry);
  const workerPool = new WorkerPool(config.workerPool.size);
  const store = overrides.store ?? await createIngestionRecordStore(config.redis);
  const publisher = overrides.publisher ?? await createEventPublisher(config.events, config.redis);
  const metrics = new IngestionMetrics();

  const orchestrator = new TaskOrchestrator({
    registry,
    circuitBreaker,
    defaultRetryPolicy,
    workerPool,
    store,
    publisher,
    metrics,
    processingMode: config.processingMode,
    now
  });

  const queue = new IngestionQueue({ ...config.queue, now });
  queue.registerHandler(task => orchestrator.execute(task));

  let stopSweeper: (() => void) | null = null;

  return {
    config,
    registry,
    circuitBreaker,
    rateLimiter,
    defaultRetryPolicy,
    workerPool,
    parser,
    store,
    publisher,
    metrics,
    orchestrator,
    queue,

    start(): void {
      queue.start();
      if (config.rateLimit.enabled && !stopSweeper) {
        stopSweeper = rateLimiter.startSweeper(
          config.rateLimit.sweepIntervalSeconds,
          config.rateLimit.staleAfterSeconds
        );
      }
    },

    async stop(): Promise<void> {
      stopSweeper?.();
      stopSweeper = null;
      await queue.stop();

      const results = await Promise.allSettled([store.close(), publisher.close(), parser.close()]);
      for (const result of results) {
        if (result.status === 'rejected') {
          logger.warn('runtime shutdown: failed to close connection', { error: errorMessage(result.reason) });
        }
      }
    },

    health(): Promise<HealthStatus> {
      return performHealthCheck({
        store,
        publisher,
        queue,
        circuitBreaker,
        redisEnabled: config.redis.enabled,
        eventsEnabled: config.events.enabled
      });
    }
  };
}
