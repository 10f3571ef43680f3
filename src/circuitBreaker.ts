/**
 * Circuit breaker for the remote book catalog
 *
 * Only service trouble counts against the catalog: 5xx and 429 answers,
 * timeouts and connection errors. A 404 or an empty search is an answer.
 *
 * After `failureThreshold` failures in a row the circuit opens. Once the
 * cooldown has passed a single trial request goes out; it closes the circuit,
 * or reopens it with a longer cooldown.
 */

import { CatalogUnavailableError } from './errors.js';
import { isNetworkError } from './utils/resilience.js';

export type CircuitState = 'CLOSED' | 'OPEN' | 'HALF_OPEN';

type Circuit =
  | { state: 'CLOSED'; failures: number }
  | { state: 'OPEN'; failures: number; openedAt: number }
  | { state: 'HALF_OPEN'; failures: number; trialInFlight: boolean };

export interface CircuitBreakerOptions {
  name: string;
  /** Failures in a row that open the circuit (default 5) */
  failureThreshold?: number;
  /** First cooldown (default 30s) */
  cooldownMs?: number;
  /** Ceiling for the growing cooldown (default 5 min) */
  maxCooldownMs?: number;
  /** Cooldown growth after each failed trial (default 2) */
  cooldownMultiplier?: number;
  now?: () => number;
}

export interface CircuitStatus {
  state: CircuitState;
  trialInFlight: boolean;
  consecutiveFailures: number;
  cooldownMs: number;
  cooldownRemainingMs: number;
  totalTrips: number;
}

export class CircuitBreaker {
  readonly name: string;
  private circuit: Circuit = { state: 'CLOSED', failures: 0 };
  private cooldownMs: number;
  private totalTrips = 0;

  private readonly failureThreshold: number;
  private readonly baseCooldownMs: number;
  private readonly maxCooldownMs: number;
  private readonly cooldownMultiplier: number;
  private readonly now: () => number;

  constructor(options: CircuitBreakerOptions) {
    this.name = options.name;
    this.failureThreshold = options.failureThreshold ?? 5;
    this.baseCooldownMs = options.cooldownMs ?? 30_000;
    this.maxCooldownMs = options.maxCooldownMs ?? 300_000;
    this.cooldownMultiplier = options.cooldownMultiplier ?? 2;
    this.now = options.now ?? Date.now;
    this.cooldownMs = this.baseCooldownMs;
  }

  /**
   * Whether a request may go out now. While half-open only one request is
   * admitted until its outcome is recorded.
   */
  allowRequest(): boolean {
    const circuit = this.circuit;
    switch (circuit.state) {
      case 'CLOSED':
        return true;
      case 'OPEN':
        if (this.now() - circuit.openedAt < this.cooldownMs) return false;
        this.circuit = { state: 'HALF_OPEN', failures: circuit.failures, trialInFlight: true };
        this.log(`half-open after ${seconds(this.cooldownMs)}s, sending a trial request`);
        return true;
      case 'HALF_OPEN':
        if (circuit.trialInFlight) return false;
        circuit.trialInFlight = true;
        return true;
    }
  }

  /**
   * Send `request` through the breaker.
   *
   * @param isFailure - whether an answer counts against the service
   * @throws CatalogUnavailableError while the circuit refuses requests
   */
  async call<T>(request: () => Promise<T>, isFailure: (result: T) => boolean): Promise<T> {
    if (!this.allowRequest()) {
      throw new CatalogUnavailableError(this.name);
    }

    let result: T;
    try {
      result = await request();
    } catch (error) {
      if (isNetworkError(error)) {
        this.recordFailure();
      } else {
        this.release();
      }
      throw error;
    }

    if (isFailure(result)) {
      this.recordFailure();
    } else {
      this.recordSuccess();
    }
    return result;
  }

  /** The catalog answered, with or without a match */
  recordSuccess(): void {
    if (this.circuit.state === 'HALF_OPEN') {
      this.cooldownMs = this.baseCooldownMs;
      this.log('closed, trial request answered');
    }
    this.circuit = { state: 'CLOSED', failures: 0 };
  }

  /** The catalog did not answer usefully (5xx, 429, timeout, connection error) */
  recordFailure(): void {
    const failures = this.circuit.failures + 1;
    const openedAt = this.now();

    switch (this.circuit.state) {
      case 'HALF_OPEN':
        this.cooldownMs = Math.min(this.cooldownMs * this.cooldownMultiplier, this.maxCooldownMs);
        this.circuit = { state: 'OPEN', failures, openedAt };
        this.log(`open again, trial request failed (cooldown ${seconds(this.cooldownMs)}s)`);
        return;
      case 'OPEN':
        // a request let through before the trip; the cooldown restarts
        this.circuit = { state: 'OPEN', failures, openedAt };
        return;
      case 'CLOSED':
        if (failures < this.failureThreshold) {
          this.circuit = { state: 'CLOSED', failures };
          return;
        }
        this.totalTrips++;
        this.circuit = { state: 'OPEN', failures, openedAt };
        this.log(`open after ${failures} failures in a row (cooldown ${seconds(this.cooldownMs)}s, trip #${this.totalTrips})`);
    }
  }

  getStatus(): CircuitStatus {
    const circuit = this.circuit;
    return {
      state: circuit.state,
      trialInFlight: circuit.state === 'HALF_OPEN' && circuit.trialInFlight,
      consecutiveFailures: circuit.failures,
      cooldownMs: this.cooldownMs,
      cooldownRemainingMs: circuit.state === 'OPEN'
        ? Math.max(0, this.cooldownMs - (this.now() - circuit.openedAt))
        : 0,
      totalTrips: this.totalTrips,
    };
  }

  static isHttpFailure(status: number): boolean {
    return status >= 500 || status === 429;
  }

  /** A trial ended without telling us anything about the service */
  private release(): void {
    if (this.circuit.state === 'HALF_OPEN') {
      this.circuit.trialInFlight = false;
    }
  }

  private log(message: string): void {
    console.log(`[CircuitBreaker:${this.name}] ${message}`);
  }
}

function seconds(ms: number): number {
  return Math.round(ms / 1000);
}

export const openLibraryBreaker = new CircuitBreaker({
  name: 'OpenLibrary',
  failureThreshold: 5,
  cooldownMs: 30_000,
  maxCooldownMs: 300_000,
  cooldownMultiplier: 2,
});
