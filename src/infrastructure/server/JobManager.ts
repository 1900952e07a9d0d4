import { randomUUID } from 'node:crypto';
import { JobStatus } from '../../core/entities/Job.js';
import type { JobId } from '../../core/entities/Job.js';

/**
 * A job as tracked by the simulated server
 */
export interface ServerJob {
  id: JobId;
  status: JobStatus;
  startedAt: number;
  processTimeMs: number;
}

export const DEFAULT_PROCESS_TIME_MS = 10000;

/**
 * In-memory job store for the simulated job server.
 * A pending job completes once its processing time has elapsed; the check
 * happens lazily on each status read.
 */
export class JobManager {
  private jobs: Map<JobId, ServerJob> = new Map();

  constructor(
    private readonly defaultProcessTimeMs: number = DEFAULT_PROCESS_TIME_MS,
    private readonly now: () => number = Date.now,
    private readonly generateId: () => JobId = randomUUID
  ) {}

  createJob(processTimeMs: number = this.defaultProcessTimeMs): ServerJob {
    const job: ServerJob = {
      id: this.generateId(),
      status: JobStatus.Pending,
      startedAt: this.now(),
      processTimeMs,
    };
    this.jobs.set(job.id, job);
    return { ...job };
  }

  /**
   * Current status, or null for an unknown id
   */
  getJobStatus(jobId: JobId): JobStatus | null {
    const job = this.jobs.get(jobId);
    if (!job) {
      return null;
    }

    if (job.status === JobStatus.Pending && this.now() - job.startedAt >= job.processTimeMs) {
      job.status = JobStatus.Completed;
    }

    return job.status;
  }

  /**
   * Force a job into the error state
   */
  failJob(jobId: JobId): boolean {
    const job = this.jobs.get(jobId);
    if (!job) {
      return false;
    }
    job.status = JobStatus.Error;
    return true;
  }

  getJobCount(): number {
    return this.jobs.size;
  }
}
