/**
 * Per-adapter circuit breaker registry.
 *
 * States per adapter:
 * - CLOSED: failures inside the window are below the threshold, attempts pass.
 * - OPEN: attempts are rejected with {@link CircuitBreakerOpenError} until the
 *   cooldown expires.
 *
 * There is no half-open trial call. When the cooldown has elapsed the next
 * `ensureAvailable` clears the failure history and the circuit is CLOSED again.
 *
 * Each method body is synchronous, so on a single Node.js event loop it runs
 * as one critical section across every concurrent worker and request.
 *
 * @module core/circuit-breaker
 */

import { logger } from '../utils/logger';
import { CircuitBreakerOpenError } from './errors';

export enum CircuitStatus {
  CLOSED = 'CLOSED',
  OPEN = 'OPEN'
}

export interface CircuitState {
  /** Failure instants (ms since epoch), oldest first. */
  failureTimestamps: number[];
  /** Instant the circuit re-admits attempts, or null while closed. */
  openUntil: number | null;
}

export interface CircuitBreakerOptions {
  /** Failures within the window that open the circuit (default: 5) */
  failureThreshold?: number;
  /** Sliding failure window in seconds (default: 300) */
  failureWindowSeconds?: number;
  /** How long an open circuit rejects attempts, in seconds (default: 600) */
  resetCooldownSeconds?: number;
  now?: () => number;
}

export interface CircuitSnapshot {
  adapterType: string;
  status: CircuitStatus;
  failureCount: number;
  openUntil: string | null;
}

export class CircuitBreakerRegistry {
  private readonly failureThreshold: number;
  private readonly failureWindowMs: number;
  private readonly resetCooldownMs: number;
  private readonly now: () => number;
  private readonly circuits = new Map<string, CircuitState>();

  constructor(options: CircuitBreakerOptions = {}) {
    this.failureThreshold = options.failureThreshold ?? 5;
    this.failureWindowMs = (options.failureWindowSeconds ?? 300) * 1000;
    this.resetCooldownMs = (options.resetCooldownSeconds ?? 600) * 1000;
    this.now = options.now ?? Date.now;

    if (this.failureThreshold < 1) {
      throw new RangeError('failureThreshold must be at least 1');
    }
    if (this.failureWindowMs <= 0 || this.resetCooldownMs <= 0) {
      throw new RangeError('failureWindowSeconds and resetCooldownSeconds must be positive');
    }
  }

  /**
   * Throw {@link CircuitBreakerOpenError} while the adapter's circuit is open.
   * An expired cooldown closes the circuit and starts a fresh window.
   */
  ensureAvailable(adapterType: string): void {
    const state = this.circuits.get(adapterType);
    if (!state || state.openUntil === null) {
      return;
    }

    const now = this.now();
    if (state.openUntil > now) {
      throw new CircuitBreakerOpenError(adapterType, new Date(state.openUntil));
    }

    state.openUntil = null;
    state.failureTimestamps = [];
    logger.info('circuit breaker closed after cooldown', { adapterType });
  }

  recordFailure(adapterType: string): void {
    const state = this.getOrCreate(adapterType);
    const now = this.now();

    state.failureTimestamps.push(now);
    state.failureTimestamps = state.failureTimestamps.filter(ts => now - ts <= this.failureWindowMs);

    if (state.failureTimestamps.length >= this.failureThreshold) {
      state.openUntil = now + this.resetCooldownMs;
      logger.error('circuit breaker opened', {
        adapterType,
        failures: state.failureTimestamps.length,
        reopenAt: new Date(state.openUntil).toISOString()
      });
    }
  }

  recordSuccess(adapterType: string): void {
    const state = this.circuits.get(adapterType);
    if (!state) {
      return;
    }

    state.failureTimestamps = [];
    state.openUntil = null;
  }

  /**
   * Drop state for one adapter, or for all adapters when none is given.
   */
  reset(adapterType?: string): void {
    if (adapterType === undefined) {
      this.circuits.clear();
      return;
    }
    this.circuits.delete(adapterType);
  }

  /** Read-only view used by readiness checks and tests. */
  snapshot(): CircuitSnapshot[] {
    const now = this.now();
    return Array.from(this.circuits.entries()).map(([adapterType, state]) => ({
      adapterType,
      status: state.openUntil !== null && state.openUntil > now ? CircuitStatus.OPEN : CircuitStatus.CLOSED,
      failureCount: state.failureTimestamps.length,
      openUntil: state.openUntil === null ? null : new Date(state.openUntil).toISOString()
    }));
  }

  openCircuits(): string[] {
    return this.snapshot()
      .filter(entry => entry.status === CircuitStatus.OPEN)
      .map(entry => entry.adapterType);
  }

  private getOrCreate(adapterType: string): CircuitState {
    let state = this.circuits.get(adapterType);
    if (!state) {
      state = { failureTimestamps: [], openUntil: null };
      this.circuits.set(adapterType, state);
    }
    return state;
  }
}
