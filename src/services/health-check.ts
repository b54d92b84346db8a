/**
 * Readiness checks over the runtime's collaborators.
 *
 * @module services/health-check
 */

import type { CircuitBreakerRegistry } from '../core/circuit-breaker';
import { errorMessage, logger } from '../utils/logger';
import type { IngestionEventPublisher } from './event-publisher';
import type { IngestionRecordStore } from './ingestion-store';
import type { IngestionQueue } from './job-queue';

export type HealthState = 'healthy' | 'degraded' | 'unhealthy';

export interface ComponentHealth {
  status: HealthState;
  message: string;
  latencyMs?: number;
  details?: Record<string, unknown>;
}

export interface HealthStatus {
  status: HealthState;
  timestamp: number;
  checks: {
    store: ComponentHealth;
    publisher: ComponentHealth;
    queue: ComponentHealth;
    circuits: ComponentHealth;
  };
  overall: {
    healthy: number;
    degraded: number;
    unhealthy: number;
  };
}

export interface HealthCheckDeps {
  store: IngestionRecordStore;
  publisher: IngestionEventPublisher;
  queue: IngestionQueue;
  circuitBreaker: CircuitBreakerRegistry;
  redisEnabled: boolean;
  eventsEnabled: boolean;
}

async function checkStoreHealth(deps: HealthCheckDeps): Promise<ComponentHealth> {
  const start = Date.now();

  try {
    const reachable = await deps.store.ping();
    const latencyMs = Date.now() - start;

    if (!reachable) {
      return { status: 'unhealthy', message: 'Record store not reachable', latencyMs };
    }
    if (deps.store.backend === 'memory' && deps.redisEnabled) {
      return {
        status: 'degraded',
        message: 'Using in-memory record store (Redis unavailable)',
        latencyMs,
        details: { backend: deps.store.backend }
      };
    }
    return {
      status: 'healthy',
      message: `Record store ready (${deps.store.backend})`,
      latencyMs,
      details: { backend: deps.store.backend }
    };
  } catch (error) {
    return {
      status: 'unhealthy',
      message: `Record store check failed: ${errorMessage(error)}`,
      latencyMs: Date.now() - start
    };
  }
}

async function checkPublisherHealth(deps: HealthCheckDeps): Promise<ComponentHealth> {
  const start = Date.now();

  if (!deps.eventsEnabled) {
    return { status: 'healthy', message: 'Event publishing disabled', details: { publisher: deps.publisher.name } };
  }
  if (deps.publisher.name === 'noop') {
    return { status: 'degraded', message: 'Events enabled but no broker connected; events are dropped' };
  }

  const reachable = await deps.publisher.ping();
  return {
    status: reachable ? 'healthy' : 'degraded',
    message: reachable ? 'Event broker reachable' : 'Event broker not reachable',
    latencyMs: Date.now() - start,
    details: { publisher: deps.publisher.name }
  };
}

function checkQueueHealth(queue: IngestionQueue): ComponentHealth {
  const stats = queue.getStats();
  return {
    status: stats.active ? 'healthy' : 'degraded',
    message: stats.active ? 'Queue worker running' : 'Queue worker not started',
    details: { ...stats }
  };
}

function checkCircuitHealth(circuitBreaker: CircuitBreakerRegistry): ComponentHealth {
  const open = circuitBreaker.openCircuits();
  return {
    status: open.length > 0 ? 'degraded' : 'healthy',
    message: open.length > 0 ? `Open circuits: ${open.join(', ')}` : 'All circuits closed',
    details: { open }
  };
}

/**
 * Readiness summary: unhealthy if any component is unhealthy, degraded if any
 * is degraded.
 */
export async function performHealthCheck(deps: HealthCheckDeps): Promise<HealthStatus> {
  const startTime = Date.now();

  const [store, publisher] = await Promise.all([checkStoreHealth(deps), checkPublisherHealth(deps)]);
  const checks = {
    store,
    publisher,
    queue: checkQueueHealth(deps.queue),
    circuits: checkCircuitHealth(deps.circuitBreaker)
  };

  const statuses = Object.values(checks).map(c => c.status);
  const overall = {
    healthy: statuses.filter(s => s === 'healthy').length,
    degraded: statuses.filter(s => s === 'degraded').length,
    unhealthy: statuses.filter(s => s === 'unhealthy').length
  };

  let status: HealthState;
  if (overall.unhealthy > 0) {
    status = 'unhealthy';
  } else if (overall.degraded > 0) {
    status = 'degraded';
  } else {
    status = 'healthy';
  }

  logger.debug('Health check completed', { duration: Date.now() - startTime, status });

  return { status, timestamp: Date.now(), checks, overall };
}
