import type { BatchItemError, CreateJobResponse, JobId, JobStatus } from './Job.js';

/**
 * Lifecycle events published by the polling client
 */
export enum EventType {
  JobCreated = 'job_created',
  StatusChanged = 'status_changed',
  RetryAttempted = 'retry_attempted',
  ErrorOccurred = 'error_occurred',
  JobCompleted = 'job_completed',
  JobFailed = 'job_failed',
  Timeout = 'timeout',
  CircuitBreakerOpened = 'circuit_breaker_opened',
  CircuitBreakerClosed = 'circuit_breaker_closed',
  BatchOperation = 'batch_operation',
}

export const ALL_EVENT_TYPES: readonly EventType[] = Object.values(EventType);

interface BaseEvent<T extends EventType, D> {
  readonly type: T;
  readonly timestamp: Date;
  readonly data: Readonly<D>;
}

export interface JobCreatedEvent extends BaseEvent<EventType.JobCreated, { response: CreateJobResponse }> {
  readonly jobId: JobId;
}

export interface StatusChangedEvent extends BaseEvent<EventType.StatusChanged, { attempt: number }> {
  readonly jobId: JobId;
  readonly previousState: JobStatus | null;
  readonly currentState: JobStatus;
}

export interface RetryAttemptedEvent extends BaseEvent<EventType.RetryAttempted, { nextIntervalMs: number }> {
  readonly jobId: JobId;
  readonly error: Error;
  readonly retryCount: number;
}

export type ErrorAction = 'createJob' | 'getStatus' | 'waitForCompletion';

export interface ErrorOccurredData {
  action: ErrorAction;
  /** Present when the server answered with a non-2xx response */
  statusCode?: number;
  responseText?: string;
  /** Error class name for transport and payload failures */
  errorType?: string;
}

export interface ErrorOccurredEvent extends BaseEvent<EventType.ErrorOccurred, ErrorOccurredData> {
  /** null when no job id exists yet (job creation) */
  readonly jobId: JobId | null;
  readonly error: Error;
}

export interface JobCompletedEvent extends BaseEvent<EventType.JobCompleted, { finalStatus: JobStatus }> {
  readonly jobId: JobId;
}

export interface JobFailedEvent extends BaseEvent<EventType.JobFailed, { finalStatus: JobStatus }> {
  readonly jobId: JobId;
}

export interface TimeoutData {
  elapsedMs: number;
  completedJobs?: number;
  remainingJobs?: number;
}

export interface TimeoutEvent extends BaseEvent<EventType.Timeout, TimeoutData> {
  /** A single id, or the ids still outstanding when a batch wait times out */
  readonly jobId: JobId | JobId[];
}

export interface CircuitBreakerOpenedEvent
  extends BaseEvent<EventType.CircuitBreakerOpened, { message: string; failureCount: number }> {
  readonly jobId: JobId | null;
}

export interface CircuitBreakerClosedEvent extends BaseEvent<EventType.CircuitBreakerClosed, { message: string }> {
  readonly jobId: JobId | null;
}

export interface BatchCreateData {
  operation: 'create';
  successCount: number;
  errorCount: number;
  errors: string[];
}

export interface BatchStatusData {
  operation: 'statusCheck';
  statuses: Record<JobId, JobStatus>;
  errorCount: number;
  errors: BatchItemError[];
}

export interface BatchOperationEvent extends BaseEvent<EventType.BatchOperation, BatchCreateData | BatchStatusData> {
  readonly jobId: JobId[];
}

export interface EventMap {
  [EventType.JobCreated]: JobCreatedEvent;
  [EventType.StatusChanged]: StatusChangedEvent;
  [EventType.RetryAttempted]: RetryAttemptedEvent;
  [EventType.ErrorOccurred]: ErrorOccurredEvent;
  [EventType.JobCompleted]: JobCompletedEvent;
  [EventType.JobFailed]: JobFailedEvent;
  [EventType.Timeout]: TimeoutEvent;
  [EventType.CircuitBreakerOpened]: CircuitBreakerOpenedEvent;
  [EventType.CircuitBreakerClosed]: CircuitBreakerClosedEvent;
  [EventType.BatchOperation]: BatchOperationEvent;
}

export type PollingEvent = EventMap[EventType];

export type EventHandler<T extends EventType> = (event: EventMap[T]) => void;
