/**
 * Job domain entity as seen by the polling client
 */
export enum JobStatus {
  Pending = 'pending',
  Completed = 'completed',
  Error = 'error',
}

/**
 * Server-issued job identifier (UUID string form)
 */
export type JobId = string;

export const TERMINAL_STATUSES: ReadonlySet<JobStatus> = new Set([
  JobStatus.Completed,
  JobStatus.Error,
]);

export function isTerminalStatus(status: JobStatus): boolean {
  return TERMINAL_STATUSES.has(status);
}

/**
 * Body of a successful `POST /job`
 */
export interface CreateJobResponse {
  job_id: JobId;
  status?: JobStatus;
}

/**
 * Body of a successful `GET /status/:jobId`
 */
export interface StatusResponse {
  result: JobStatus;
}

/**
 * A per-item failure collected by a batch status check
 */
export interface BatchItemError {
  jobId: JobId;
  message: string;
}
