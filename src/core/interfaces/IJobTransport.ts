import type { CreateJobResponse, JobId, StatusResponse } from '../entities/Job.js';

/**
 * Transport to the job server
 *
 * Implementations reject with `TransportError` when no response arrives,
 * `HttpError` (`ServerError` / `ClientError`) for non-2xx responses and
 * `MalformedResponseError` when the body is not the expected payload.
 */
export interface IJobTransport {
  createJob(): Promise<CreateJobResponse>;

  getStatus(jobId: JobId): Promise<StatusResponse>;
}
