import { EventType } from '../../core/entities/Event.js';
import { JobStatus } from '../../core/entities/Job.js';
import type { BatchItemError, JobId } from '../../core/entities/Job.js';
import { systemClock } from '../../core/interfaces/IClock.js';
import type { IClock } from '../../core/interfaces/IClock.js';
import type { IJobTransport } from '../../core/interfaces/IJobTransport.js';
import { CircuitOpenError, HttpError, RetryableError, toError } from '../../core/errors.js';
import type { EventBus } from '../../infrastructure/events/EventBus.js';
import { CircuitBreaker, classifyFailure } from '../../utils/retry.js';

/**
 * Breaker-gated, event-emitting wrappers around the job transport
 *
 * One-shot calls always surface their failure after recording it on the
 * breaker and emitting exactly one error event. Batch calls collect
 * per-item failures instead of throwing.
 */
export class JobOperations {
  constructor(
    private readonly transport: IJobTransport,
    private readonly circuitBreaker: CircuitBreaker,
    private readonly events: EventBus,
    private readonly clock: IClock = systemClock
  ) {}

  async createJob(): Promise<JobId> {
    this.ensureCanExecute(null);

    try {
      const response = await this.transport.createJob();

      this.circuitBreaker.recordSuccess();
      this.events.emit({
        type: EventType.JobCreated,
        jobId: response.job_id,
        timestamp: this.timestamp(),
        data: { response },
      });

      return response.job_id;
    } catch (error) {
      this.circuitBreaker.recordFailure();
      this.events.emit({
        type: EventType.ErrorOccurred,
        jobId: null,
        timestamp: this.timestamp(),
        error: toError(error),
        data: { action: 'createJob' },
      });
      throw error;
    }
  }

  /**
   * Read a job's status. Retryable failures (transport errors, 5xx) are
   * rethrown as `RetryableError` with the original as `cause`.
   */
  async getStatus(jobId: JobId): Promise<JobStatus> {
    this.ensureCanExecute(jobId);

    let result: JobStatus;
    try {
      ({ result } = await this.transport.getStatus(jobId));
    } catch (error) {
      const err = toError(error);

      this.events.emit({
        type: EventType.ErrorOccurred,
        jobId,
        timestamp: this.timestamp(),
        error: err,
        data:
          err instanceof HttpError
            ? { action: 'getStatus', statusCode: err.statusCode, responseText: err.body }
            : { action: 'getStatus', errorType: err.name },
      });
      this.circuitBreaker.recordFailure();

      if (classifyFailure(err) === 'retryable') {
        throw new RetryableError(`Retryable error occurred: ${err.message}`, { cause: err });
      }
      throw error;
    }

    this.circuitBreaker.recordSuccess();
    return result;
  }

  async createBatch(count: number): Promise<JobId[]> {
    const jobIds: JobId[] = [];
    const errors: string[] = [];

    for (let i = 0; i < count; i++) {
      try {
        jobIds.push(await this.createJob());
      } catch (error) {
        errors.push(toError(error).message);
      }
    }

    this.events.emit({
      type: EventType.BatchOperation,
      jobId: [...jobIds],
      timestamp: this.timestamp(),
      data: {
        operation: 'create',
        successCount: jobIds.length,
        errorCount: errors.length,
        errors,
      },
    });

    return jobIds;
  }

  /**
   * Status of every id; a failed lookup is recorded as `error` for that id
   * and listed in the BatchOperation event, the other ids are still read.
   */
  async getBatchStatus(jobIds: readonly JobId[]): Promise<Record<JobId, JobStatus>> {
    // null prototype so ids such as "__proto__" are stored like any other key
    const statuses: Record<JobId, JobStatus> = Object.create(null);
    const errors: BatchItemError[] = [];

    for (const jobId of jobIds) {
      try {
        statuses[jobId] = await this.getStatus(jobId);
      } catch (error) {
        errors.push({ jobId, message: toError(error).message });
        statuses[jobId] = JobStatus.Error;
      }
    }

    this.events.emit({
      type: EventType.BatchOperation,
      jobId: [...jobIds],
      timestamp: this.timestamp(),
      data: {
        operation: 'statusCheck',
        statuses: { ...statuses },
        errorCount: errors.length,
        errors,
      },
    });

    return statuses;
  }

  private ensureCanExecute(jobId: JobId | null): void {
    const wasOpen = this.circuitBreaker.isOpen();

    if (!this.circuitBreaker.canExecute()) {
      this.events.emit({
        type: EventType.CircuitBreakerOpened,
        jobId,
        timestamp: this.timestamp(),
        data: {
          message: 'Circuit breaker is open',
          failureCount: this.circuitBreaker.getFailureCount(),
        },
      });
      throw new CircuitOpenError();
    }

    if (wasOpen) {
      this.events.emit({
        type: EventType.CircuitBreakerClosed,
        jobId,
        timestamp: this.timestamp(),
        data: { message: 'Reset timeout elapsed, allowing trial call' },
      });
    }
  }

  private timestamp(): Date {
    return new Date(this.clock.now());
  }
}
