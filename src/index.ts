export { JobPollingClient, DEFAULT_BASE_URL } from './presentation/JobPollingClient.js';
export type { JobPollingClientOptions } from './presentation/JobPollingClient.js';

export { JobStatus, isTerminalStatus } from './core/entities/Job.js';
export type { BatchItemError, CreateJobResponse, JobId, StatusResponse } from './core/entities/Job.js';
export { EventType, ALL_EVENT_TYPES } from './core/entities/Event.js';
export type {
  BatchCreateData,
  BatchOperationEvent,
  BatchStatusData,
  CircuitBreakerClosedEvent,
  CircuitBreakerOpenedEvent,
  ErrorAction,
  ErrorOccurredData,
  ErrorOccurredEvent,
  EventHandler,
  EventMap,
  JobCompletedEvent,
  JobCreatedEvent,
  JobFailedEvent,
  PollingEvent,
  RetryAttemptedEvent,
  StatusChangedEvent,
  TimeoutData,
  TimeoutEvent,
} from './core/entities/Event.js';
export { createPollingConfig, DEFAULT_POLLING_CONFIG } from './core/entities/PollingConfig.js';
export type { PollingConfig } from './core/entities/PollingConfig.js';
export type { IJobTransport } from './core/interfaces/IJobTransport.js';
export { systemClock } from './core/interfaces/IClock.js';
export type { IClock } from './core/interfaces/IClock.js';
export * from './core/errors.js';

export { BackoffCalculator } from './utils/backoff.js';
export type { RandomSource } from './utils/backoff.js';
export { CircuitBreaker, classifyFailure, isRetryableError, DEFAULT_CIRCUIT_BREAKER_OPTIONS } from './utils/retry.js';
export type { CircuitBreakerOptions, CircuitBreakerStats, CircuitState, FailureClass } from './utils/retry.js';

export { EventBus } from './infrastructure/events/EventBus.js';
export { JobApiClient } from './infrastructure/http/JobApiClient.js';
export type { FetchLike } from './infrastructure/http/JobApiClient.js';
export { JobManager } from './infrastructure/server/JobManager.js';
export { JobServer } from './infrastructure/server/JobServer.js';
export { JobOperations } from './application/services/JobOperations.js';
export { CompletionOrchestrator, DEFAULT_MAX_RETRIES } from './application/services/CompletionOrchestrator.js';
