/*
 * Structured JSON logger with correlation context carried across async work.
 */
import { randomUUID } from 'crypto';
import { AsyncLocalStorage } from 'async_hooks';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogContext {
  requestId?: string;
  correlationId?: string;
  adapterType?: string;
  sourceId?: string;
  [key: string]: unknown;
}

export type LogMeta = Record<string, unknown>;

export interface Logger {
  debug(message: string, meta?: LogMeta): void;
  info(message: string, meta?: LogMeta): void;
  warn(message: string, meta?: LogMeta): void;
  error(message: string, meta?: LogMeta): void;
}

const levelPriority: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40
};

const isLogLevel = (value: string | undefined): value is LogLevel =>
  value === 'debug' || value === 'info' || value === 'warn' || value === 'error';

const envLevel = process.env.LOG_LEVEL?.toLowerCase();
const threshold = levelPriority[isLogLevel(envLevel) ? envLevel : 'info'];

const contextStore = new AsyncLocalStorage<LogContext>();

const write = (level: LogLevel, message: string, meta?: LogMeta): void => {
  if (levelPriority[level] < threshold) {
    return;
  }

  const payload = {
    timestamp: new Date().toISOString(),
    level,
    message,
    ...(contextStore.getStore() ?? {}),
    ...meta
  };

  console.log(JSON.stringify(payload));
};

/**
 * Merge fields into the context of the current async execution.
 */
export const setRequestContext = (context: LogContext): void => {
  const store = contextStore.getStore() ?? {};
  contextStore.enterWith({ ...store, ...context });
};

export const getRequestContext = (): LogContext => {
  return contextStore.getStore() ?? {};
};

/**
 * Run `fn` with `context` layered over the caller's context. Task attempts use
 * this so every line they log carries the correlation ID.
 */
export const runWithContext = <T>(context: LogContext, fn: () => T): T => {
  return contextStore.run({ ...getRequestContext(), ...context }, fn);
};

export const generateRequestId = (): string => {
  return randomUUID();
};

export const errorMessage = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);

export const logger: Logger = {
  debug: (message, meta) => write('debug', message, meta),
  info: (message, meta) => write('info', message, meta),
  warn: (message, meta) => write('warn', message, meta),
  error: (message, meta) => write('error', message, meta)
};
