/**
 * Outbound completion events.
 *
 * One event per attempt outcome, delivered at least once: a failed publish is
 * logged and counted, never retried here and never thrown to the caller.
 *
 * @module services/event-publisher
 */

import type { AppConfig } from '../config/env';
import type { TaskErrorReport } from '../core/error-classifier';
import type { IngestionPayload } from '../core/pipeline';
import { errorMessage, logger } from '../utils/logger';
import { connectRedis, type RedisClient } from './redis-client';

export interface IngestionEvent {
  correlation_id: string | null;
  adapter: string;
  source_id: string;
  status: 'success' | 'error';
  duration_ms: number;
  timestamp: string;
  validation: {
    is_valid: boolean;
    error_count: number;
    warning_count: number;
  };
  metrics: Record<string, string>;
}

/** Wire encoding of an event. Opaque to the publisher. */
export type EventSerializer = (event: IngestionEvent) => string;

export const jsonSerializer: EventSerializer = event => JSON.stringify(event);

export interface IngestionEventPublisher {
  readonly name: string;
  /** Resolves `true` when the broker accepted the event. Never rejects. */
  publish(event: IngestionEvent): Promise<boolean>;
  ping(): Promise<boolean>;
  close(): Promise<void>;
}

const stringifyMetric = (value: unknown): string => {
  if (typeof value === 'string') return value;
  if (value === null || value === undefined) return '';
  if (typeof value === 'object') return JSON.stringify(value);
  return String(value);
};

export function stringifyMetrics(metrics: Readonly<Record<string, unknown>>): Record<string, string> {
  const out: Record<string, string> = {};
  for (const [key, value] of Object.entries(metrics)) {
    out[key] = stringifyMetric(value);
  }
  return out;
}

export function buildSuccessEvent(payload: IngestionPayload): IngestionEvent {
  const { metadata, validation } = payload;
  return {
    correlation_id: metadata.correlationId ?? null,
    adapter: metadata.adapterType,
    source_id: metadata.sourceId,
    status: 'success',
    duration_ms: metadata.processingDurationMs,
    timestamp: metadata.timestamp,
    validation: {
      is_valid: validation.isValid,
      error_count: validation.errors.length,
      warning_count: validation.warnings.length
    },
    metrics: stringifyMetrics(validation.metrics)
  };
}

export function buildErrorEvent(report: TaskErrorReport, durationMs: number): IngestionEvent {
  return {
    correlation_id: report.correlationId ?? null,
    adapter: report.adapterType,
    source_id: report.sourceId,
    status: 'error',
    duration_ms: durationMs,
    timestamp: report.timestamp,
    validation: {
      is_valid: false,
      error_count: 1,
      warning_count: 0
    },
    metrics: {
      classification: report.classification,
      retryable: String(report.retryable)
    }
  };
}

// ---------------------------------------------------------------------------
// Redis Streams publisher
// ---------------------------------------------------------------------------

export class RedisStreamEventPublisher implements IngestionEventPublisher {
  readonly name = 'redis-stream';
  private readonly client: RedisClient;
  private readonly stream: string;
  private readonly maxLength: number;
  private readonly serialize: EventSerializer;

  constructor(client: RedisClient, options: { stream: string; maxLength: number; serializer?: EventSerializer }) {
    this.client = client;
    this.stream = options.stream;
    this.maxLength = options.maxLength;
    this.serialize = options.serializer ?? jsonSerializer;
  }

  async publish(event: IngestionEvent): Promise<boolean> {
    try {
      const fields: Record<string, string> = {
        status: event.status,
        adapter: event.adapter,
        body: this.serialize(event)
      };
      if (event.correlation_id) {
        fields.correlation_id = event.correlation_id;
      }

      await this.client.xAdd(this.stream, '*', fields, {
        TRIM: { strategy: 'MAXLEN', strategyModifier: '~', threshold: this.maxLength }
      });
      return true;
    } catch (error) {
      logger.error('failed to publish ingestion event', {
        stream: this.stream,
        adapterType: event.adapter,
        sourceId: event.source_id,
        status: event.status,
        error: errorMessage(error)
      });
      return false;
    }
  }

  async ping(): Promise<boolean> {
    try {
      return (await this.client.ping()) === 'PONG';
    } catch (error) {
      logger.warn('event publisher ping failed', { error: errorMessage(error) });
      return false;
    }
  }

  async close(): Promise<void> {
    if (this.client.isOpen) {
      await this.client.quit();
    }
  }
}

/** Accepts and discards events. Used when events are disabled. */
export class NoopEventPublisher implements IngestionEventPublisher {
  readonly name = 'noop';

  async publish(event: IngestionEvent): Promise<boolean> {
    logger.debug('event publishing disabled, dropping event', { status: event.status, adapterType: event.adapter });
    return true;
  }

  async ping(): Promise<boolean> {
    return true;
  }

  async close(): Promise<void> {
    return;
  }
}

export async function createEventPublisher(
  events: AppConfig['events'],
  redis: AppConfig['redis']
): Promise<IngestionEventPublisher> {
  if (!events.enabled || !redis.enabled) {
    logger.info('event publisher: disabled or no Redis configured, events are dropped');
    return new NoopEventPublisher();
  }

  try {
    const client = await connectRedis(redis.url, 'event publisher');
    logger.info('event publisher: publishing to Redis stream', { stream: events.stream });
    return new RedisStreamEventPublisher(client, { stream: events.stream, maxLength: events.maxLength });
  } catch (error) {
    logger.warn('event publisher: Redis unavailable, events are dropped', { error: errorMessage(error) });
    return new NoopEventPublisher();
  }
}
