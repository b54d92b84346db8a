/**
 * Ingestion Record Store
 *
 * One record per attempt outcome, written once and never updated. Backed by
 * Redis when enabled and reachable, otherwise by an in-memory Map.
 *
 * Redis key patterns:
 * - `sluice:record:{id}` (record JSON)
 * - `sluice:records:by_created` (sorted set of record IDs scored by creation time)
 * - `sluice:records:correlation:{correlationId}` (set of record IDs)
 *
 * @module services/ingestion-store
 */

import { randomUUID } from 'crypto';
import { z } from 'zod';
import type { AppConfig } from '../config/env';
import { ErrorKind } from '../core/errors';
import { buildFailureSummary, type TaskErrorReport } from '../core/error-classifier';
import type { IngestionPayload } from '../core/pipeline';
import { errorMessage, logger } from '../utils/logger';
import { connectRedis, type RedisClient } from './redis-client';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

const metadataSchema = z.object({
  sourceId: z.string(),
  adapterType: z.string(),
  timestamp: z.string(),
  processingDurationMs: z.number(),
  processingMode: z.enum(['local', 'cloud']),
  correlationId: z.string().optional()
});

const validationSummarySchema = z.object({
  isValid: z.boolean(),
  errorCount: z.number(),
  warningCount: z.number(),
  metrics: z.record(z.unknown()),
  errors: z.array(z.string()),
  warnings: z.array(z.string())
});

const errorReportSchema = z.object({
  adapterType: z.string(),
  sourceId: z.string(),
  correlationId: z.string().optional(),
  errorType: z.string(),
  message: z.string(),
  classification: z.nativeEnum(ErrorKind),
  retryable: z.boolean(),
  timestamp: z.string(),
  details: z.record(z.unknown())
});

export const ingestionRecordSchema = z.object({
  id: z.string(),
  createdAt: z.string(),
  sourceId: z.string(),
  adapterType: z.string(),
  status: z.enum(['success', 'error']),
  durationMs: z.number().nullable(),
  correlationId: z.string().optional(),
  payloadMetadata: metadataSchema.nullable(),
  validationSummary: validationSummarySchema,
  errorDetails: errorReportSchema.nullable()
});

export type IngestionRecord = z.infer<typeof ingestionRecordSchema>;
export type IngestionRecordInput = Omit<IngestionRecord, 'id' | 'createdAt'>;
export type IngestionRecordStatus = IngestionRecord['status'];

export interface RecordFilter {
  status?: IngestionRecordStatus;
  adapterType?: string;
  limit?: number;
}

export interface IngestionRecordStore {
  readonly backend: 'redis' | 'memory';
  persist(input: IngestionRecordInput): Promise<IngestionRecord>;
  get(id: string): Promise<IngestionRecord | null>;
  list(filter?: RecordFilter): Promise<IngestionRecord[]>;
  findByCorrelationId(correlationId: string): Promise<IngestionRecord[]>;
  ping(): Promise<boolean>;
  close(): Promise<void>;
}

// ---------------------------------------------------------------------------
// Record builders
// ---------------------------------------------------------------------------

export function buildSuccessRecord(payload: IngestionPayload): IngestionRecordInput {
  const { metadata, validation } = payload;
  return {
    sourceId: metadata.sourceId,
    adapterType: metadata.adapterType,
    status: 'success',
    durationMs: metadata.processingDurationMs,
    ...(metadata.correlationId !== undefined ? { correlationId: metadata.correlationId } : {}),
    payloadMetadata: { ...metadata },
    validationSummary: {
      isValid: validation.isValid,
      errorCount: validation.errors.length,
      warningCount: validation.warnings.length,
      metrics: { ...validation.metrics },
      errors: [...validation.errors],
      warnings: [...validation.warnings]
    },
    errorDetails: null
  };
}

export function buildErrorRecord(report: TaskErrorReport, durationMs: number | null): IngestionRecordInput {
  return {
    sourceId: report.sourceId,
    adapterType: report.adapterType,
    status: 'error',
    durationMs,
    ...(report.correlationId !== undefined ? { correlationId: report.correlationId } : {}),
    payloadMetadata: null,
    validationSummary: buildFailureSummary(report),
    errorDetails: report
  };
}

const materialize = (input: IngestionRecordInput, now: Date): IngestionRecord => ({
  id: randomUUID(),
  createdAt: now.toISOString(),
  ...input
});

const applyFilter = (records: IngestionRecord[], filter?: RecordFilter): IngestionRecord[] => {
  const matched = records.filter(record => {
    if (filter?.status && record.status !== filter.status) return false;
    if (filter?.adapterType && record.adapterType !== filter.adapterType) return false;
    return true;
  });

  // Newest first
  matched.sort((a, b) => b.createdAt.localeCompare(a.createdAt));
  return matched.slice(0, filter?.limit ?? matched.length);
};

const parseRecord = (data: string): IngestionRecord | null => {
  const parsed = ingestionRecordSchema.safeParse(JSON.parse(data));
  if (!parsed.success) {
    logger.warn('skipping malformed ingestion record', { issues: parsed.error.issues.length });
    return null;
  }
  return parsed.data;
};

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

const KEY_PREFIX = 'sluice:record:';
const SORTED_SET_KEY = 'sluice:records:by_created';
const CORRELATION_SET_PREFIX = 'sluice:records:correlation:';

// ---------------------------------------------------------------------------
// RedisIngestionRecordStore
// ---------------------------------------------------------------------------

export class RedisIngestionRecordStore implements IngestionRecordStore {
  readonly backend = 'redis' as const;
  private readonly client: RedisClient;
  private readonly now: () => Date;

  constructor(client: RedisClient, options?: { now?: () => Date }) {
    this.client = client;
    this.now = options?.now ?? (() => new Date());
  }

  async persist(input: IngestionRecordInput): Promise<IngestionRecord> {
    const record = materialize(input, this.now());

    const tx = this.client.multi();
    tx.set(`${KEY_PREFIX}${record.id}`, JSON.stringify(record));
    tx.zAdd(SORTED_SET_KEY, { score: new Date(record.createdAt).getTime(), value: record.id });
    if (record.correlationId) {
      tx.sAdd(`${CORRELATION_SET_PREFIX}${record.correlationId}`, record.id);
    }
    await tx.exec();

    return record;
  }

  async get(id: string): Promise<IngestionRecord | null> {
    const data = await this.client.get(`${KEY_PREFIX}${id}`);
    return data ? parseRecord(data) : null;
  }

  async list(filter?: RecordFilter): Promise<IngestionRecord[]> {
    const ids = await this.client.zRange(SORTED_SET_KEY, 0, -1);
    return applyFilter(await this.fetchMany(ids), filter);
  }

  async findByCorrelationId(correlationId: string): Promise<IngestionRecord[]> {
    const ids = await this.client.sMembers(`${CORRELATION_SET_PREFIX}${correlationId}`);
    return applyFilter(await this.fetchMany(ids));
  }

  async ping(): Promise<boolean> {
    try {
      return (await this.client.ping()) === 'PONG';
    } catch (error) {
      logger.warn('record store ping failed', { error: errorMessage(error) });
      return false;
    }
  }

  async close(): Promise<void> {
    if (this.client.isOpen) {
      await this.client.quit();
    }
  }

  private async fetchMany(ids: string[]): Promise<IngestionRecord[]> {
    if (ids.length === 0) return [];

    const values = await this.client.mGet(ids.map(id => `${KEY_PREFIX}${id}`));
    const records: IngestionRecord[] = [];
    for (const value of values) {
      if (typeof value !== 'string') continue;
      const record = parseRecord(value);
      if (record) records.push(record);
    }
    return records;
  }
}

// ---------------------------------------------------------------------------
// InMemoryIngestionRecordStore
// ---------------------------------------------------------------------------

export class InMemoryIngestionRecordStore implements IngestionRecordStore {
  readonly backend = 'memory' as const;
  private readonly records = new Map<string, IngestionRecord>();
  private readonly now: () => Date;

  constructor(options?: { now?: () => Date }) {
    this.now = options?.now ?? (() => new Date());
  }

  async persist(input: IngestionRecordInput): Promise<IngestionRecord> {
    const record = materialize(input, this.now());
    this.records.set(record.id, record);
    return { ...record };
  }

  async get(id: string): Promise<IngestionRecord | null> {
    const record = this.records.get(id);
    return record ? { ...record } : null;
  }

  async list(filter?: RecordFilter): Promise<IngestionRecord[]> {
    return applyFilter(Array.from(this.records.values(), record => ({ ...record })), filter);
  }

  async findByCorrelationId(correlationId: string): Promise<IngestionRecord[]> {
    return applyFilter(
      Array.from(this.records.values())
        .filter(record => record.correlationId === correlationId)
        .map(record => ({ ...record }))
    );
  }

  async ping(): Promise<boolean> {
    return true;
  }

  async close(): Promise<void> {
    this.records.clear();
  }
}

// ---------------------------------------------------------------------------
// Factory
// ---------------------------------------------------------------------------

/**
 * Use Redis when enabled and reachable; otherwise fall back to memory.
 */
export async function createIngestionRecordStore(redis: AppConfig['redis']): Promise<IngestionRecordStore> {
  if (!redis.enabled) {
    logger.info('record store: Redis disabled, using in-memory store');
    return new InMemoryIngestionRecordStore();
  }

  try {
    const client = await connectRedis(redis.url, 'record store');
    logger.info('record store: using Redis', { url: redis.url });
    return new RedisIngestionRecordStore(client);
  } catch (error) {
    logger.warn('record store: Redis unavailable, falling back to in-memory store', {
      error: errorMessage(error)
    });
    return new InMemoryIngestionRecordStore();
  }
}
