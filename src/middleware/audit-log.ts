/**
 * Audit Logging Middleware
 *
 * Writes one structured `audit` log entry per API request once the response
 * has finished: authentication failures, permission denials, rate-limit
 * denials, ingestion submissions and data reads or deletes. Request bodies
 * are only recorded on request, and always pass through
 * {@link redactSensitive} first.
 *
 * @module middleware/audit-log
 */

import type { Request, Response, NextFunction, RequestHandler } from 'express';
import { logger } from '../utils/logger';
import { clientIp } from './rate-limit';

export enum AuditAction {
  AUTH_FAILURE = 'auth.failure',
  PERMISSION_DENIED = 'auth.permission.denied',
  RATE_LIMITED = 'api.rate_limited',
  INGESTION_COMPLETED = 'ingestion.completed',
  INGESTION_FAILED = 'ingestion.failed',
  INGESTION_QUEUED = 'ingestion.queued',
  DATA_READ = 'data.read',
  DATA_DELETE = 'data.delete',
  API_REQUEST = 'api.request'
}

export type AuditOutcome = 'success' | 'failure' | 'denied';

export interface AuditLogEntry {
  timestamp: string;
  action: AuditAction;
  outcome: AuditOutcome;
  method: string;
  path: string;
  statusCode: number;
  durationMs: number;
  actor: string;
  actorType: 'api_key' | 'anonymous';
  clientIp: string;
  requestId?: string;
  correlationId?: string;
  userAgent?: string;
  details?: Record<string, unknown>;
}

export interface AuditLogConfig {
  enabled: boolean;
  /** Record the (redacted) request body of ingestion submissions. */
  logRequestBody: boolean;
  /** Larger bodies are replaced by a size marker. */
  maxBodySize: number;
  /** Path prefixes never audited. */
  excludePaths?: string[];
  now?: () => number;
}

const REDACTED = '***REDACTED***';

const SENSITIVE_FIELD_NAMES = new Set([
  'password',
  'passwd',
  'pwd',
  'secret',
  'api_key',
  'apikey',
  'x-api-key',
  'token',
  'bearer',
  'authorization',
  'auth',
  'credentials',
  'private_key',
  'database_url',
  'connection_string'
]);

const SENSITIVE_PATTERN = /(api[_-]?key|apikey|password|passwd|pwd|token|bearer)["']?\s*[:=]\s*["']?[^\s"'&,;]+/gi;

/**
 * Copy of `value` with sensitive fields replaced and `key=value` secrets
 * masked inside strings. Nesting deeper than `depth` is left as is.
 */
export function redactSensitive(value: unknown, depth = 10): unknown {
  if (typeof value === 'string') {
    return value.replace(SENSITIVE_PATTERN, `$1=${REDACTED}`);
  }
  if (depth <= 0 || typeof value !== 'object' || value === null) {
    return value;
  }
  if (Array.isArray(value)) {
    return value.map(item => redactSensitive(item, depth - 1));
  }
  return Object.fromEntries(
    Object.entries(value).map(([key, field]) => [
      key,
      SENSITIVE_FIELD_NAMES.has(key.toLowerCase()) ? REDACTED : redactSensitive(field, depth - 1)
    ])
  );
}

const INGEST_PATH = '/v1/ingest';
const JOBS_PATH = '/v1/ingest/jobs';

/**
 * Audit action and outcome for a finished request.
 */
export function classifyAuditEvent(
  method: string,
  path: string,
  statusCode: number
): { action: AuditAction; outcome: AuditOutcome } {
  const ok = statusCode < 400;
  if (statusCode === 401) return { action: AuditAction.AUTH_FAILURE, outcome: 'failure' };
  if (statusCode === 403) return { action: AuditAction.PERMISSION_DENIED, outcome: 'denied' };
  if (statusCode === 429) return { action: AuditAction.RATE_LIMITED, outcome: 'denied' };

  if (method === 'POST' && path === INGEST_PATH) {
    return ok
      ? { action: AuditAction.INGESTION_COMPLETED, outcome: 'success' }
      : { action: AuditAction.INGESTION_FAILED, outcome: 'failure' };
  }
  if (method === 'POST' && path === JOBS_PATH) {
    return { action: AuditAction.INGESTION_QUEUED, outcome: ok ? 'success' : 'failure' };
  }
  if (method === 'GET') return { action: AuditAction.DATA_READ, outcome: ok ? 'success' : 'failure' };
  if (method === 'DELETE') return { action: AuditAction.DATA_DELETE, outcome: ok ? 'success' : 'failure' };
  return { action: AuditAction.API_REQUEST, outcome: ok ? 'success' : 'failure' };
}

const stringField = (body: unknown, key: string): string | undefined => {
  if (typeof body !== 'object' || body === null || !(key in body)) {
    return undefined;
  }
  const value: unknown = Reflect.get(body, key);
  return typeof value === 'string' ? value : undefined;
};

function submissionDetails(req: Request, config: AuditLogConfig): Record<string, unknown> {
  const details: Record<string, unknown> = {};
  const adapterType = stringField(req.body, 'adapter_type');
  if (adapterType !== undefined) {
    details.adapterType = adapterType;
  }

  if (config.logRequestBody && req.body !== undefined) {
    const redacted = redactSensitive(req.body);
    const serialized = JSON.stringify(redacted) ?? '';
    details.requestBody = serialized.length <= config.maxBodySize
      ? redacted
      : `[TRUNCATED ${serialized.length} bytes]`;
  }
  return details;
}

function logAuditEntry(entry: AuditLogEntry): void {
  const message = `AUDIT ${entry.action}`;
  const data = { type: 'audit', ...entry };
  if (entry.statusCode >= 500) {
    logger.error(message, data);
  } else if (entry.statusCode >= 400) {
    logger.warn(message, data);
  } else {
    logger.info(message, data);
  }
}

export function createAuditLogMiddleware(config: AuditLogConfig): RequestHandler {
  const { excludePaths = [], now = Date.now } = config;

  return function auditLogMiddleware(req: Request, res: Response, next: NextFunction): void {
    const path = `${req.baseUrl}${req.path}`;
    if (!config.enabled || excludePaths.some(prefix => path.startsWith(prefix))) {
      next();
      return;
    }

    const startedAt = now();

    res.on('finish', () => {
      const { action, outcome } = classifyAuditEvent(req.method, path, res.statusCode);
      const requestId = res.getHeader('x-request-id');
      const correlationId = stringField(req.body, 'correlation_id') ?? req.header('x-correlation-id');
      const userAgent = req.header('user-agent');
      const details = req.method === 'POST' ? submissionDetails(req, config) : {};

      logAuditEntry({
        timestamp: new Date(startedAt).toISOString(),
        action,
        outcome,
        method: req.method,
        path,
        statusCode: res.statusCode,
        durationMs: now() - startedAt,
        actor: req.apiKeyHash ? `${req.apiKeyHash.slice(0, 8)}...` : 'anonymous',
        actorType: req.apiKeyHash ? 'api_key' : 'anonymous',
        clientIp: clientIp(req),
        ...(typeof requestId === 'string' ? { requestId } : {}),
        ...(correlationId ? { correlationId } : {}),
        ...(userAgent ? { userAgent } : {}),
        ...(Object.keys(details).length > 0 ? { details } : {})
      });
    });

    next();
  };
}
