import { EventType } from '../../core/entities/Event.js';
import { JobStatus, isTerminalStatus } from '../../core/entities/Job.js';
import type { JobId } from '../../core/entities/Job.js';
import type { PollingConfig } from '../../core/entities/PollingConfig.js';
import type { IClock } from '../../core/interfaces/IClock.js';
import {
  JobFailedError,
  RetryableError,
  RetryExhaustedError,
  TimeoutError,
  toError,
} from '../../core/errors.js';
import type { EventBus } from '../../infrastructure/events/EventBus.js';
import type { BackoffCalculator } from '../../utils/backoff.js';
import type { JobOperations } from './JobOperations.js';

export const DEFAULT_MAX_RETRIES = 3;

/**
 * Wait loops that poll jobs until they reach a terminal status
 */
export class CompletionOrchestrator {
  constructor(
    private readonly operations: JobOperations,
    private readonly config: PollingConfig,
    private readonly backoff: BackoffCalculator,
    private readonly events: EventBus,
    private readonly clock: IClock,
    private readonly maxRetries: number = DEFAULT_MAX_RETRIES
  ) {}

  /**
   * Poll a single job until it completes.
   *
   * Resolves with `completed`; rejects with `JobFailedError`, `TimeoutError`,
   * `RetryExhaustedError` or the first fatal error from the status lookup.
   * The retry budget covers the whole wait, not just consecutive failures.
   */
  async waitForCompletion(jobId: JobId): Promise<JobStatus> {
    const startTime = this.clock.now();
    let currentInterval = this.config.initialIntervalMs;
    let lastStatus: JobStatus | null = null;
    let retryCount = 0;

    while (true) {
      const elapsedMs = this.clock.now() - startTime;
      if (elapsedMs > this.config.timeoutMs) {
        this.events.emit({
          type: EventType.Timeout,
          jobId,
          timestamp: this.timestamp(),
          data: { elapsedMs },
        });
        throw new TimeoutError(
          `Job ${jobId} did not complete within ${this.config.timeoutMs}ms`,
          elapsedMs
        );
      }

      let status: JobStatus;
      try {
        status = await this.operations.getStatus(jobId);
      } catch (error) {
        if (error instanceof RetryableError) {
          retryCount++;
          if (retryCount > this.maxRetries) {
            throw new RetryExhaustedError(this.maxRetries, { cause: error });
          }

          currentInterval = this.backoff.next(currentInterval);
          this.events.emit({
            type: EventType.RetryAttempted,
            jobId,
            timestamp: this.timestamp(),
            error,
            retryCount,
            data: { nextIntervalMs: currentInterval },
          });
          await this.clock.sleep(currentInterval);
          continue;
        }

        this.emitWaitError(jobId, toError(error));
        throw error;
      }

      if (status !== lastStatus) {
        this.events.emit({
          type: EventType.StatusChanged,
          jobId,
          timestamp: this.timestamp(),
          previousState: lastStatus,
          currentState: status,
          data: { attempt: retryCount + 1 },
        });
        lastStatus = status;
      }

      if (status === JobStatus.Error) {
        this.events.emit({
          type: EventType.JobFailed,
          jobId,
          timestamp: this.timestamp(),
          data: { finalStatus: status },
        });
        throw new JobFailedError(jobId);
      }

      if (status === JobStatus.Completed) {
        this.events.emit({
          type: EventType.JobCompleted,
          jobId,
          timestamp: this.timestamp(),
          data: { finalStatus: status },
        });
        return status;
      }

      currentInterval = this.backoff.next(currentInterval);
      await this.clock.sleep(currentInterval);
    }
  }

  /**
   * Poll several jobs until each one is completed or errored.
   * A failed lookup counts as `error` for that job, as in `getBatchStatus`.
   */
  async waitForBatchCompletion(jobIds: readonly JobId[]): Promise<Record<JobId, JobStatus>> {
    const finalStatuses: Record<JobId, JobStatus> = Object.create(null);
    const outstanding = [...new Set(jobIds)];
    const startTime = this.clock.now();
    let currentInterval = this.config.initialIntervalMs;

    while (outstanding.length > 0) {
      const elapsedMs = this.clock.now() - startTime;
      if (elapsedMs > this.config.timeoutMs) {
        this.events.emit({
          type: EventType.Timeout,
          jobId: [...outstanding],
          timestamp: this.timestamp(),
          data: {
            elapsedMs,
            completedJobs: Object.keys(finalStatuses).length,
            remainingJobs: outstanding.length,
          },
        });
        throw new TimeoutError(
          `Batch operation did not complete within ${this.config.timeoutMs}ms`,
          elapsedMs
        );
      }

      const statuses = await this.operations.getBatchStatus(outstanding);

      for (const jobId of [...outstanding]) {
        const status = statuses[jobId];
        if (status === undefined || !isTerminalStatus(status)) {
          continue;
        }
        finalStatuses[jobId] = status;
        outstanding.splice(outstanding.indexOf(jobId), 1);
      }

      if (outstanding.length > 0) {
        currentInterval = this.config.escalateBatchBackoff
          ? this.backoff.next(currentInterval)
          : this.backoff.next(this.config.initialIntervalMs);
        await this.clock.sleep(currentInterval);
      }
    }

    return finalStatuses;
  }

  private timestamp(): Date {
    return new Date(this.clock.now());
  }

  private emitWaitError(jobId: JobId, error: Error): void {
    this.events.emit({
      type: EventType.ErrorOccurred,
      jobId,
      timestamp: this.timestamp(),
      error,
      data: { action: 'waitForCompletion' },
    });
  }
}
