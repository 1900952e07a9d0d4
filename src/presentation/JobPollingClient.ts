import { CompletionOrchestrator, DEFAULT_MAX_RETRIES } from '../application/services/CompletionOrchestrator.js';
import { JobOperations } from '../application/services/JobOperations.js';
import type { EventHandler, EventType, PollingEvent } from '../core/entities/Event.js';
import type { JobId, JobStatus } from '../core/entities/Job.js';
import { createPollingConfig } from '../core/entities/PollingConfig.js';
import type { PollingConfig } from '../core/entities/PollingConfig.js';
import { systemClock } from '../core/interfaces/IClock.js';
import type { IClock } from '../core/interfaces/IClock.js';
import type { IJobTransport } from '../core/interfaces/IJobTransport.js';
import { EventBus } from '../infrastructure/events/EventBus.js';
import { DEFAULT_REQUEST_TIMEOUT_MS, JobApiClient } from '../infrastructure/http/JobApiClient.js';
import type { FetchLike } from '../infrastructure/http/JobApiClient.js';
import { BackoffCalculator } from '../utils/backoff.js';
import type { RandomSource } from '../utils/backoff.js';
import { CircuitBreaker } from '../utils/retry.js';
import type { CircuitBreakerOptions, CircuitBreakerStats, CircuitState } from '../utils/retry.js';

export interface JobPollingClientOptions {
  baseUrl?: string;
  pollingConfig?: Partial<PollingConfig>;
  circuitBreaker?: Partial<CircuitBreakerOptions>;
  /** Retry budget for retryable failures during one `waitForCompletion` */
  maxRetries?: number;
  requestTimeoutMs?: number;
  /** Replaces the HTTP transport entirely; `baseUrl` and `fetch` are then unused */
  transport?: IJobTransport;
  fetch?: FetchLike;
  clock?: IClock;
  random?: RandomSource;
}

export const DEFAULT_BASE_URL = 'http://localhost:5000';

/**
 * Resilient client for asynchronous jobs
 *
 * Each instance owns its circuit breaker, polling configuration and event
 * bus; nothing is shared between instances.
 */
export class JobPollingClient {
  readonly pollingConfig: PollingConfig;
  private readonly circuitBreaker: CircuitBreaker;
  private readonly events = new EventBus();
  private readonly operations: JobOperations;
  private readonly orchestrator: CompletionOrchestrator;

  constructor(options: JobPollingClientOptions = {}) {
    const clock = options.clock ?? systemClock;

    this.pollingConfig = createPollingConfig(options.pollingConfig);
    this.circuitBreaker = CircuitBreaker.fromOptions(options.circuitBreaker, () => clock.now());

    const transport =
      options.transport ??
      new JobApiClient(
        options.baseUrl ?? DEFAULT_BASE_URL,
        options.requestTimeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS,
        options.fetch
      );

    this.operations = new JobOperations(transport, this.circuitBreaker, this.events, clock);
    this.orchestrator = new CompletionOrchestrator(
      this.operations,
      this.pollingConfig,
      new BackoffCalculator(this.pollingConfig, options.random),
      this.events,
      clock,
      options.maxRetries ?? DEFAULT_MAX_RETRIES
    );
  }

  /**
   * Subscribe to an event
   */
  on<K extends EventType>(type: K, handler: EventHandler<K>): this {
    this.events.subscribe(type, handler);
    return this;
  }

  /**
   * Unsubscribe from an event
   */
  off<K extends EventType>(type: K, handler: EventHandler<K>): this {
    this.events.unsubscribe(type, handler);
    return this;
  }

  createJob(): Promise<JobId> {
    return this.operations.createJob();
  }

  createBatchJobs(count: number): Promise<JobId[]> {
    return this.operations.createBatch(count);
  }

  getStatus(jobId: JobId): Promise<JobStatus> {
    return this.operations.getStatus(jobId);
  }

  getBatchStatus(jobIds: readonly JobId[]): Promise<Record<JobId, JobStatus>> {
    return this.operations.getBatchStatus(jobIds);
  }

  waitForCompletion(jobId: JobId): Promise<JobStatus> {
    return this.orchestrator.waitForCompletion(jobId);
  }

  waitForBatchCompletion(jobIds: readonly JobId[]): Promise<Record<JobId, JobStatus>> {
    return this.orchestrator.waitForBatchCompletion(jobIds);
  }

  getEventHistory(): readonly PollingEvent[] {
    return this.events.getHistory();
  }

  clearEventHistory(): void {
    this.events.clearHistory();
  }

  getCircuitBreakerState(): CircuitState {
    return this.circuitBreaker.getState();
  }

  getCircuitBreakerStats(): CircuitBreakerStats {
    return this.circuitBreaker.getStats();
  }

  resetCircuitBreaker(): void {
    this.circuitBreaker.reset();
  }
}
