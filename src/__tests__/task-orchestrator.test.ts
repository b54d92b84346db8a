import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { createValidationResult, type SourceAdapter } from '../core/pipeline';
import { CircuitBreakerRegistry } from '../core/circuit-breaker';
import { CollectionError, ErrorKind, ValidationError } from '../core/errors';
import { RetryPolicy } from '../core/retry-policy';
import { AdapterRegistry } from '../services/adapters/registry';
import type { IngestionEvent, IngestionEventPublisher } from '../services/event-publisher';
import { InMemoryIngestionRecordStore } from '../services/ingestion-store';
import { IngestionQueue } from '../services/job-queue';
import { IngestionMetrics } from '../services/metrics';
import { TaskOrchestrator, taskNameFor, type AttemptOutcome } from '../services/task-orchestrator';
import { WorkerPool } from '../services/worker-pool';

vi.mock('../utils/logger', async (importOriginal) => {
  const actual = await importOriginal<typeof import('../utils/logger')>();
  return {
    ...actual,
    logger: { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() },
  };
});

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

class RecordingPublisher implements IngestionEventPublisher {
  readonly name = 'recording';
  readonly events: IngestionEvent[] = [];
  accept = true;

  async publish(event: IngestionEvent): Promise<boolean> {
    this.events.push(event);
    return this.accept;
  }

  async ping(): Promise<boolean> {
    return true;
  }

  async close(): Promise<void> {
    return;
  }
}

/** Adapter whose collect step fails `failures` times before succeeding. */
function flakyAdapter(state: { failures: number; collected: number }): SourceAdapter<string, { value: string }> {
  return {
    async collect() {
      state.collected++;
      if (state.failures > 0) {
        state.failures--;
        throw new CollectionError('Connection refused', { endpoint: 'https://example.test/items' });
      }
      return 'payload';
    },
    async validate() {
      return createValidationResult({ metrics: { records: 1 } });
    },
    async transform(raw) {
      return { value: raw };
    },
    async cleanup() {
      return;
    },
  };
}

const NOW = Date.parse('2026-04-01T08:00:00.000Z');

function setup(options: { failureThreshold?: number } = {}) {
  const flaky = { failures: 0, collected: 0 };
  const registry = new AdapterRegistry()
    .register('flaky', () => flakyAdapter(flaky))
    .register('strict', () => ({
      async collect() {
        return 'x';
      },
      async validate(): Promise<never> {
        throw new ValidationError('Invalid CSV validation rules: min_rows: Expected number, received string');
      },
      async transform() {
        return 'x';
      },
      async cleanup() {
        return;
      },
    }));

  const store = new InMemoryIngestionRecordStore({ now: () => new Date(NOW) });
  const publisher = new RecordingPublisher();
  const metrics = new IngestionMetrics();
  const circuitBreaker = new CircuitBreakerRegistry({
    failureThreshold: options.failureThreshold ?? 5,
    failureWindowSeconds: 300,
    resetCooldownSeconds: 600,
    now: () => NOW,
  });

  const orchestrator = new TaskOrchestrator({
    registry,
    circuitBreaker,
    defaultRetryPolicy: new RetryPolicy({
      enabled: true,
      maxAttempts: 3,
      backoffSeconds: 30,
      maxBackoffSeconds: 300,
      retryableErrorKinds: ['collection'],
    }),
    workerPool: new WorkerPool(2),
    store,
    publisher,
    metrics,
    now: () => NOW,
  });

  return { orchestrator, registry, store, publisher, metrics, circuitBreaker, flaky };
}

function expectFailed(outcome: AttemptOutcome) {
  if (outcome.status !== 'failed') {
    throw new Error(`expected a failed outcome, got ${outcome.status}`);
  }
  return outcome;
}

const retryPolicy = { backoff_seconds: 1, max_backoff_seconds: 4, max_attempts: 3 };

// ---------------------------------------------------------------------------
// Tests
// ---------------------------------------------------------------------------

describe('TaskOrchestrator', () => {
  let ctx: ReturnType<typeof setup>;

  beforeEach(() => {
    ctx = setup();
  });

  it('names tasks after their adapter', () => {
    expect(taskNameFor('csv')).toBe('ingest_csv_task');
    expect(ctx.orchestrator.listAdapters()).toEqual(['flaky', 'strict']);
  });

  it('persists and publishes a successful attempt', async () => {
    const outcome = await ctx.orchestrator.execute({
      adapterType: 'flaky',
      sourceConfig: { source_id: 'items' },
      correlationId: 'corr-ok',
      attempt: 0,
    });

    expect(outcome.status).toBe('succeeded');
    if (outcome.status !== 'succeeded') return;
    expect(outcome.payload.data).toEqual({ value: 'payload' });
    expect(outcome.payload.metadata).toMatchObject({ sourceId: 'items', adapterType: 'flaky', correlationId: 'corr-ok' });
    expect(outcome.record?.status).toBe('success');

    const records = await ctx.store.findByCorrelationId('corr-ok');
    expect(records).toHaveLength(1);
    expect(ctx.publisher.events).toHaveLength(1);
    expect(ctx.publisher.events[0]).toMatchObject({
      correlation_id: 'corr-ok',
      adapter: 'flaky',
      source_id: 'items',
      status: 'success',
      metrics: { records: '1' },
    });
    expect(ctx.metrics.snapshot().attempts).toEqual({ 'adapter=flaky,status=success': 1 });
  });

  it('fails an unknown adapter terminally with one error record', async () => {
    const outcome = expectFailed(
      await ctx.orchestrator.execute({
        adapterType: 'xml',
        sourceConfig: { source_id: 'feed' },
        correlationId: 'corr-unknown',
        attempt: 0,
      })
    );

    expect(outcome.decision).toEqual({ type: 'terminal' });
    expect(outcome.report).toMatchObject({
      adapterType: 'xml',
      sourceId: 'feed',
      correlationId: 'corr-unknown',
      errorType: 'AdapterNotFoundError',
      classification: ErrorKind.CONFIGURATION,
      retryable: false,
      message: "Adapter 'xml' is not registered. Available adapters: flaky, strict.",
    });

    const records = await ctx.store.findByCorrelationId('corr-unknown');
    expect(records).toHaveLength(1);
    expect(records[0]?.status).toBe('error');
    expect(records[0]?.errorDetails?.classification).toBe(ErrorKind.CONFIGURATION);
    expect(ctx.publisher.events.map(e => e.status)).toEqual(['error']);
    expect(ctx.circuitBreaker.snapshot()).toEqual([]);
  });

  it('keeps answering unknown adapters with configuration errors past the failure threshold', async () => {
    const kinds: ErrorKind[] = [];
    for (let i = 0; i < 6; i++) {
      const outcome = expectFailed(
        await ctx.orchestrator.execute({ adapterType: 'nope', sourceConfig: {}, attempt: 0 })
      );
      kinds.push(outcome.report.classification);
    }
    for (let i = 0; i < 20; i++) {
      await ctx.orchestrator.execute({ adapterType: `junk-${i}`, sourceConfig: {}, attempt: 0 });
    }

    expect(kinds).toEqual(Array(6).fill(ErrorKind.CONFIGURATION));
    expect(ctx.circuitBreaker.snapshot()).toEqual([]);
    expect(ctx.metrics.snapshot().attempts).toEqual({ 'adapter=unknown,status=error': 26 });
    expect(ctx.metrics.snapshot().circuitRejections).toBe(0);
  });

  it('redelivers retryable failures with exponential countdowns until success', async () => {
    ctx.flaky.failures = 2;
    const task = {
      adapterType: 'flaky',
      sourceConfig: { source_id: 'items', retry_policy: retryPolicy },
      correlationId: 'corr-retry',
    };

    const first = expectFailed(await ctx.orchestrator.execute({ ...task, attempt: 0 }));
    expect(first.decision).toEqual({ type: 'redeliver', countdownSeconds: 1, nextAttempt: 1 });
    expect(first.report.retryable).toBe(true);
    expect(first.report.details).toMatchObject({
      endpoint: 'https://example.test/items',
      attempt: 0,
      decision: { type: 'redeliver', countdownSeconds: 1, nextAttempt: 1 },
      retry_policy: { maxAttempts: 3, backoffSeconds: 1, maxBackoffSeconds: 4 },
    });

    const second = expectFailed(await ctx.orchestrator.execute({ ...task, attempt: 1 }));
    expect(second.decision).toEqual({ type: 'redeliver', countdownSeconds: 2, nextAttempt: 2 });

    const third = await ctx.orchestrator.execute({ ...task, attempt: 2 });
    expect(third.status).toBe('succeeded');

    const records = await ctx.store.findByCorrelationId('corr-retry');
    expect(records.map(r => r.status).sort()).toEqual(['error', 'error', 'success']);
    expect(ctx.flaky.collected).toBe(3);
    expect(ctx.metrics.snapshot().redeliveries).toBe(2);
    // Success clears the failure history
    expect(ctx.circuitBreaker.snapshot()[0]?.failureCount).toBe(0);
  });

  it('stops redelivering once max_attempts retries are spent', async () => {
    ctx.flaky.failures = 10;

    const outcome = expectFailed(
      await ctx.orchestrator.execute({
        adapterType: 'flaky',
        sourceConfig: { retry_policy: retryPolicy },
        attempt: 3,
      })
    );

    expect(outcome.decision).toEqual({ type: 'terminal' });
    expect(outcome.report.retryable).toBe(true);
    expect(outcome.report.sourceId).toBe('flaky-source');
  });

  it('does not redeliver non-retryable kinds', async () => {
    const outcome = expectFailed(
      await ctx.orchestrator.execute({ adapterType: 'strict', sourceConfig: {}, attempt: 0 })
    );

    expect(outcome.report.classification).toBe(ErrorKind.VALIDATION);
    expect(outcome.report.errorType).toBe('ValidationError');
    expect(outcome.decision).toEqual({ type: 'terminal' });
  });

  it('never redelivers on the synchronous path', async () => {
    ctx.flaky.failures = 1;

    const outcome = expectFailed(
      await ctx.orchestrator.execute({ adapterType: 'flaky', sourceConfig: {}, attempt: 0 }, { allowRedelivery: false })
    );

    expect(outcome.report.retryable).toBe(true);
    expect(outcome.decision).toEqual({ type: 'terminal' });
  });

  it('rejects attempts while the circuit is open without running the adapter', async () => {
    ctx = setup({ failureThreshold: 2 });
    ctx.flaky.failures = 5;

    await ctx.orchestrator.execute({ adapterType: 'flaky', sourceConfig: {}, attempt: 0 });
    await ctx.orchestrator.execute({ adapterType: 'flaky', sourceConfig: {}, attempt: 0 });
    expect(ctx.flaky.collected).toBe(2);

    const outcome = expectFailed(
      await ctx.orchestrator.execute({ adapterType: 'flaky', sourceConfig: {}, attempt: 0 })
    );

    expect(ctx.flaky.collected).toBe(2);
    expect(outcome.report.classification).toBe(ErrorKind.CIRCUIT_OPEN);
    expect(outcome.report.retryable).toBe(false);
    expect(outcome.report.details.reopenAt).toBe('2026-04-01T08:10:00.000Z');
    expect(outcome.decision).toEqual({ type: 'terminal' });
    expect(ctx.metrics.snapshot().circuitRejections).toBe(1);
    // Rejections do not add failures
    expect(ctx.circuitBreaker.snapshot()[0]?.failureCount).toBe(2);
  });

  it('fails terminally on an invalid retry_policy override', async () => {
    const outcome = expectFailed(
      await ctx.orchestrator.execute({
        adapterType: 'flaky',
        sourceConfig: { retry_policy: { backoff_seconds: 'later' } },
        attempt: 0,
      })
    );

    expect(outcome.report.classification).toBe(ErrorKind.CONFIGURATION);
    expect(outcome.report.message).toBe('Invalid retry_policy override');
    expect(ctx.flaky.collected).toBe(0);
  });

  it('fails terminally on a malformed source config', async () => {
    const outcome = expectFailed(
      await ctx.orchestrator.execute({ adapterType: 'flaky', sourceConfig: 'not-an-object', attempt: 0 })
    );

    expect(outcome.report.classification).toBe(ErrorKind.CONFIGURATION);
    expect(outcome.report.sourceId).toBe('flaky-source');
  });

  it('counts persistence failures without failing the attempt', async () => {
    vi.spyOn(ctx.store, 'persist').mockRejectedValue(new Error('redis down'));

    const outcome = await ctx.orchestrator.execute({ adapterType: 'flaky', sourceConfig: {}, attempt: 0 });

    expect(outcome.status).toBe('succeeded');
    expect(outcome.record).toBeNull();
    expect(ctx.metrics.snapshot().persistenceFailures).toBe(1);
    expect(ctx.publisher.events).toHaveLength(1);
  });

  it('counts rejected events without failing the attempt', async () => {
    ctx.publisher.accept = false;

    const outcome = await ctx.orchestrator.execute({ adapterType: 'flaky', sourceConfig: {}, attempt: 0 });

    expect(outcome.status).toBe('succeeded');
    expect(ctx.metrics.snapshot().publishFailures).toBe(1);
  });
});

describe('TaskOrchestrator behind IngestionQueue', () => {
  let ctx: ReturnType<typeof setup>;
  let queue: IngestionQueue;

  beforeEach(() => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date(NOW));
    ctx = setup();
    queue = new IngestionQueue({ concurrency: 1, pollIntervalMs: 100 });
    queue.registerHandler(task => ctx.orchestrator.execute(task));
  });

  afterEach(async () => {
    await queue.stop();
    vi.useRealTimers();
  });

  it('redelivers after 1s then 2s and succeeds on the third delivery', async () => {
    ctx.flaky.failures = 2;
    const { id } = queue.enqueue({
      adapterType: 'flaky',
      sourceConfig: { source_id: 'items', retry_policy: retryPolicy },
      correlationId: 'corr-queued',
    });
    queue.start();

    await vi.advanceTimersByTimeAsync(100);
    expect(queue.getJob(id)).toMatchObject({
      status: 'retry_scheduled',
      attempt: 1,
      deliveries: 1,
      lastCountdownSeconds: 1,
      availableAt: '2026-04-01T08:00:01.100Z',
    });

    await vi.advanceTimersByTimeAsync(900);
    expect(ctx.flaky.collected).toBe(1);

    await vi.advanceTimersByTimeAsync(100);
    expect(ctx.flaky.collected).toBe(2);
    expect(queue.getJob(id)).toMatchObject({
      status: 'retry_scheduled',
      attempt: 2,
      deliveries: 2,
      lastCountdownSeconds: 2,
      availableAt: '2026-04-01T08:00:03.100Z',
    });

    await vi.advanceTimersByTimeAsync(1900);
    expect(ctx.flaky.collected).toBe(2);

    await vi.advanceTimersByTimeAsync(100);
    expect(ctx.flaky.collected).toBe(3);
    expect(queue.getJob(id)).toMatchObject({ status: 'succeeded', attempt: 2, deliveries: 3 });

    const records = await ctx.store.findByCorrelationId('corr-queued');
    expect(records.map(r => r.status).sort()).toEqual(['error', 'error', 'success']);
    expect(ctx.metrics.snapshot().redeliveries).toBe(2);
  });
});
