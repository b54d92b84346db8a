export type RateLimitStrategy = 'ip' | 'api_key' | 'endpoint';
export type ProcessingMode = 'local' | 'cloud';

export interface AppConfig {
  port: number;
  requestTimeoutMs: number;
  redis: {
    enabled: boolean;
    url: string;
  };
  rateLimit: {
    enabled: boolean;
    requestsPerWindow: number;
    windowSeconds: number;
    burstSize: number;
    limitBy: RateLimitStrategy;
    exemptPaths: string[];
    staleAfterSeconds: number;
    sweepIntervalSeconds: number;
  };
  circuitBreaker: {
    failureThreshold: number;
    failureWindowSeconds: number;
    resetCooldownSeconds: number;
  };
  retry: {
    enabled: boolean;
    maxAttempts: number;
    backoffSeconds: number;
    maxBackoffSeconds: number;
    // Names are checked when the default RetryPolicy is built, not here.
    retryableErrorKinds: string[];
  };
  queue: {
    concurrency: number;
    pollIntervalMs: number;
  };
  workerPool: {
    size: number;
    /** Threads for the json and csv parse stages; 0 parses inline. */
    parseThreads: number;
  };
  auth: {
    enabled: boolean;
    apiKeys: string[];
  };
  audit: {
    enabled: boolean;
    logRequestBody: boolean;
    maxBodySize: number;
  };
  events: {
    enabled: boolean;
    stream: string;
    maxLength: number;
  };
  processingMode: ProcessingMode;
}

type Env = Record<string, string | undefined>;

export const numberFromEnv = (value: string | undefined, fallback: number): number => {
  if (!value) {
    return fallback;
  }

  const parsed = Number.parseInt(value, 10);
  return Number.isNaN(parsed) ? fallback : parsed;
};

export const floatFromEnv = (value: string | undefined, fallback: number): number => {
  if (!value) {
    return fallback;
  }

  const parsed = Number.parseFloat(value);
  return Number.isFinite(parsed) ? parsed : fallback;
};

export const booleanFromEnv = (value: string | undefined, fallback: boolean): boolean => {
  if (!value) {
    return fallback;
  }

  if (value.toLowerCase() === 'true') {
    return true;
  }

  if (value.toLowerCase() === 'false') {
    return false;
  }

  return fallback;
};

export const listFromEnv = (value: string | undefined, fallback: string[]): string[] => {
  if (value === undefined) {
    return fallback;
  }

  return value.split(',').map(s => s.trim()).filter(Boolean);
};

const strategyFromEnv = (value: string | undefined, fallback: RateLimitStrategy): RateLimitStrategy => {
  if (!value) {
    return fallback;
  }

  const normalized = value.toLowerCase();
  if (normalized === 'ip' || normalized === 'api_key' || normalized === 'endpoint') {
    return normalized;
  }

  return fallback;
};

/**
 * Build the application configuration from environment variables.
 * Malformed values fall back to defaults; semantic checks (for example
 * backoff bounds) happen where the values are consumed.
 */
export function loadConfig(env: Env = process.env): AppConfig {
  const requestsPerWindow = numberFromEnv(env.RATE_LIMIT_REQUESTS, 100);

  return {
    port: numberFromEnv(env.PORT, 5380),
    requestTimeoutMs: numberFromEnv(env.REQUEST_TIMEOUT_MS, 30_000),
    redis: {
      enabled: booleanFromEnv(env.REDIS_ENABLED, env.NODE_ENV === 'production'),
      url: env.REDIS_URL ?? 'redis://localhost:6379'
    },
    rateLimit: {
      enabled: booleanFromEnv(env.RATE_LIMIT_ENABLED, true),
      requestsPerWindow,
      windowSeconds: numberFromEnv(env.RATE_LIMIT_WINDOW_SECONDS, 60),
      burstSize: numberFromEnv(env.RATE_LIMIT_BURST, requestsPerWindow),
      limitBy: strategyFromEnv(env.RATE_LIMIT_BY, 'ip'),
      exemptPaths: listFromEnv(env.RATE_LIMIT_EXEMPT_PATHS, ['/health', '/ready', '/metrics']),
      staleAfterSeconds: numberFromEnv(env.RATE_LIMIT_STALE_AFTER_SECONDS, 3600),
      sweepIntervalSeconds: numberFromEnv(env.RATE_LIMIT_SWEEP_INTERVAL_SECONDS, 600)
    },
    circuitBreaker: {
      failureThreshold: numberFromEnv(env.CIRCUIT_FAILURE_THRESHOLD, 5),
      failureWindowSeconds: numberFromEnv(env.CIRCUIT_FAILURE_WINDOW_SECONDS, 300),
      resetCooldownSeconds: numberFromEnv(env.CIRCUIT_RESET_SECONDS, 600)
    },
    retry: {
      enabled: booleanFromEnv(env.RETRY_ENABLED, true),
      maxAttempts: numberFromEnv(env.RETRY_MAX_ATTEMPTS, 3),
      backoffSeconds: floatFromEnv(env.RETRY_BACKOFF_SECONDS, 30),
      maxBackoffSeconds: floatFromEnv(env.RETRY_MAX_BACKOFF_SECONDS, 300),
      retryableErrorKinds: listFromEnv(env.RETRY_ERROR_KINDS, ['collection'])
    },
    queue: {
      concurrency: numberFromEnv(env.QUEUE_CONCURRENCY, 4),
      pollIntervalMs: numberFromEnv(env.QUEUE_POLL_INTERVAL_MS, 250)
    },
    workerPool: {
      size: numberFromEnv(env.WORKER_POOL_SIZE, 4),
      parseThreads: numberFromEnv(env.PARSE_WORKER_THREADS, 2)
    },
    auth: {
      enabled: booleanFromEnv(env.SLUICE_AUTH_ENABLED, false),
      apiKeys: listFromEnv(env.SLUICE_API_KEYS, [])
    },
    audit: {
      enabled: booleanFromEnv(env.AUDIT_LOG_ENABLED, true),
      logRequestBody: booleanFromEnv(env.AUDIT_LOG_REQUEST_BODY, false),
      maxBodySize: numberFromEnv(env.AUDIT_LOG_MAX_BODY_SIZE, 1000)
    },
    events: {
      enabled: booleanFromEnv(env.EVENTS_ENABLED, true),
      stream: env.EVENTS_STREAM ?? 'sluice.ingestion.complete',
      maxLength: numberFromEnv(env.EVENTS_MAX_LENGTH, 10_000)
    },
    processingMode: env.PROCESSING_MODE === 'cloud' ? 'cloud' : 'local'
  };
}
