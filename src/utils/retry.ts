/**
 * Circuit breaker and failure classification for job server calls
 */

import { RetryableError, ServerError, TransportError } from '../core/errors.js';

export type CircuitState = 'closed' | 'open';

export interface CircuitBreakerOptions {
  failureThreshold: number;
  resetTimeoutMs: number;
}

export const DEFAULT_CIRCUIT_BREAKER_OPTIONS: CircuitBreakerOptions = {
  failureThreshold: 5,
  resetTimeoutMs: 60000,
};

export interface CircuitBreakerLog {
  timestamp: Date;
  state: CircuitState;
  reason: string;
}

export interface CircuitBreakerStats {
  state: CircuitState;
  failureCount: number;
  lastFailureTime: Date | null;
  logs: CircuitBreakerLog[];
}

/**
 * Circuit Breaker Pattern
 * Stops calls to a failing job server until the reset timeout has passed.
 *
 * There is no half-open state: once the timeout has elapsed `canExecute()`
 * closes the breaker and the next call is the probe. A failing probe reopens
 * the breaker straight away.
 */
export class CircuitBreaker {
  private failureCount = 0;
  private lastFailureTime: number | null = null;
  private state: CircuitState = 'closed';
  private probing = false;
  private logs: CircuitBreakerLog[] = [];

  constructor(
    private readonly failureThreshold: number = DEFAULT_CIRCUIT_BREAKER_OPTIONS.failureThreshold,
    private readonly resetTimeoutMs: number = DEFAULT_CIRCUIT_BREAKER_OPTIONS.resetTimeoutMs,
    private readonly now: () => number = Date.now
  ) {}

  static fromOptions(options: Partial<CircuitBreakerOptions> = {}, now?: () => number): CircuitBreaker {
    const { failureThreshold, resetTimeoutMs } = { ...DEFAULT_CIRCUIT_BREAKER_OPTIONS, ...options };
    return new CircuitBreaker(failureThreshold, resetTimeoutMs, now);
  }

  /**
   * Whether a call may be attempted now.
   * An open breaker whose reset timeout has elapsed is closed as a side effect.
   */
  canExecute(): boolean {
    if (this.state === 'closed') {
      return true;
    }

    if (this.lastFailureTime !== null && this.now() - this.lastFailureTime >= this.resetTimeoutMs) {
      this.state = 'closed';
      this.failureCount = 0;
      this.probing = true;
      this.logStateChange('closed', 'Reset timeout reached');
      return true;
    }

    return false;
  }

  recordFailure(): void {
    this.failureCount++;
    this.lastFailureTime = this.now();

    if (this.state === 'open') {
      return;
    }

    if (this.probing) {
      this.probing = false;
      this.state = 'open';
      this.logStateChange('open', 'Trial call failed after reset timeout');
    } else if (this.failureCount >= this.failureThreshold) {
      this.state = 'open';
      this.logStateChange('open', `Failure threshold (${this.failureThreshold}) reached`);
    }
  }

  recordSuccess(): void {
    this.failureCount = 0;
    this.probing = false;
    if (this.state === 'open') {
      this.state = 'closed';
      this.logStateChange('closed', 'Call succeeded');
    }
  }

  isOpen(): boolean {
    return this.state === 'open';
  }

  getState(): CircuitState {
    return this.state;
  }

  getFailureCount(): number {
    return this.failureCount;
  }

  getStats(): CircuitBreakerStats {
    return {
      state: this.state,
      failureCount: this.failureCount,
      lastFailureTime: this.lastFailureTime !== null ? new Date(this.lastFailureTime) : null,
      logs: [...this.logs],
    };
  }

  /**
   * Reset circuit breaker manually
   */
  reset(): void {
    this.state = 'closed';
    this.failureCount = 0;
    this.lastFailureTime = null;
    this.probing = false;
    this.logStateChange('closed', 'Manual reset');
  }

  private logStateChange(state: CircuitState, reason: string): void {
    this.logs.push({ timestamp: new Date(this.now()), state, reason });

    // Keep last 100 logs
    if (this.logs.length > 100) {
      this.logs = this.logs.slice(-100);
    }
  }
}

export type FailureClass = 'retryable' | 'fatal';

/**
 * Connection failures, request timeouts and 5xx responses are retryable;
 * everything else (4xx, malformed payloads, an open breaker) is fatal.
 */
export function classifyFailure(error: unknown): FailureClass {
  if (error instanceof TransportError || error instanceof ServerError) {
    return 'retryable';
  }
  return 'fatal';
}

/**
 * Check if an error should be retried by a wait loop
 */
export function isRetryableError(error: unknown): boolean {
  return error instanceof RetryableError || classifyFailure(error) === 'retryable';
}
