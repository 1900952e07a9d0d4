import fetch, { FetchError } from 'node-fetch';
import { z } from 'zod';
import type { IJobTransport } from '../../core/interfaces/IJobTransport.js';
import { JobStatus } from '../../core/entities/Job.js';
import type { CreateJobResponse, JobId, StatusResponse } from '../../core/entities/Job.js';
import { HttpError, MalformedResponseError, TransportError } from '../../core/errors.js';

export interface FetchLikeResponse {
  ok: boolean;
  status: number;
  text(): Promise<string>;
}

export interface FetchLikeInit {
  method?: string;
  headers?: Record<string, string>;
  timeout?: number;
}

/**
 * The subset of fetch used by the client; node-fetch by default
 */
export type FetchLike = (url: string, init?: FetchLikeInit) => Promise<FetchLikeResponse>;

const CreateJobResponseSchema = z
  .object({
    job_id: z.string().min(1),
    status: z.nativeEnum(JobStatus).optional(),
  })
  .passthrough();

const StatusResponseSchema = z.object({
  result: z.nativeEnum(JobStatus),
});

export const DEFAULT_REQUEST_TIMEOUT_MS = 10000;

/**
 * HTTP transport to the job server
 * - `POST /job` creates a job
 * - `GET /status/:jobId` reads its status
 */
export class JobApiClient implements IJobTransport {
  private readonly baseUrl: string;

  constructor(
    baseUrl: string,
    private readonly requestTimeoutMs: number = DEFAULT_REQUEST_TIMEOUT_MS,
    private readonly fetchImpl: FetchLike = fetch
  ) {
    this.baseUrl = baseUrl.replace(/\/+$/, '');
  }

  async createJob(): Promise<CreateJobResponse> {
    const url = `${this.baseUrl}/job`;
    const body = await this.request(url, 'POST');
    return this.parse(url, body, CreateJobResponseSchema);
  }

  async getStatus(jobId: JobId): Promise<StatusResponse> {
    const url = `${this.baseUrl}/status/${encodeURIComponent(jobId)}`;
    const body = await this.request(url, 'GET');
    return this.parse(url, body, StatusResponseSchema);
  }

  getBaseUrl(): string {
    return this.baseUrl;
  }

  private async request(url: string, method: 'GET' | 'POST'): Promise<string> {
    try {
      const res = await this.fetchImpl(url, {
        method,
        headers: { Accept: 'application/json' },
        timeout: this.requestTimeoutMs,
      });
      const text = await res.text();

      if (!res.ok) {
        throw HttpError.fromResponse(res.status, text, url);
      }

      return text;
    } catch (error) {
      throw toTransportError(error, method, url);
    }
  }

  private parse<S extends z.ZodTypeAny>(url: string, body: string, schema: S): z.infer<S> {
    let json: unknown;
    try {
      json = JSON.parse(body);
    } catch (error) {
      throw new MalformedResponseError(`Invalid JSON from ${url}`, body, { cause: error });
    }

    const result = schema.safeParse(json);
    if (!result.success) {
      const issues = result.error.errors.map((err) => `${err.path.join('.') || 'root'}: ${err.message}`);
      throw new MalformedResponseError(`Unexpected payload from ${url}: ${issues.join('; ')}`, body);
    }
    return result.data;
  }
}

/**
 * Map node-fetch failures onto the transport error kinds; anything else passes through
 */
function toTransportError(error: unknown, method: string, url: string): unknown {
  if (!(error instanceof FetchError)) {
    return error;
  }

  if (error.type === 'request-timeout' || error.type === 'body-timeout') {
    return new TransportError(`${method} ${url} timed out`, 'timeout', { cause: error });
  }
  return new TransportError(`${method} ${url} failed: ${error.message}`, 'connection', { cause: error });
}
