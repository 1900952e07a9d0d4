/**
 * Error taxonomy for the job polling client
 */

export class JobClientError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export type TransportErrorKind = 'connection' | 'timeout';

/**
 * The request never produced an HTTP response (refused, reset, timed out)
 */
export class TransportError extends JobClientError {
  constructor(
    message: string,
    public readonly kind: TransportErrorKind,
    options?: { cause?: unknown }
  ) {
    super(message, options);
  }
}

/**
 * Non-2xx HTTP response
 */
export class HttpError extends JobClientError {
  constructor(
    message: string,
    public readonly statusCode: number,
    public readonly body: string
  ) {
    super(message);
  }

  static fromResponse(statusCode: number, body: string, url: string): HttpError {
    const message = `HTTP ${statusCode} from ${url}`;
    if (statusCode >= 500 && statusCode < 600) {
      return new ServerError(message, statusCode, body);
    }
    return new ClientError(message, statusCode, body);
  }
}

export class ServerError extends HttpError {}

export class ClientError extends HttpError {}

/**
 * Response body did not match the expected payload
 */
export class MalformedResponseError extends JobClientError {
  constructor(
    message: string,
    public readonly body: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
  }
}

/**
 * Raised by status lookups when the underlying failure is worth retrying
 */
export class RetryableError extends JobClientError {}

export class CircuitOpenError extends JobClientError {
  constructor(message: string = 'Circuit breaker is open') {
    super(message);
  }
}

export class TimeoutError extends JobClientError {
  constructor(
    message: string,
    public readonly elapsedMs: number
  ) {
    super(message);
  }
}

export class RetryExhaustedError extends JobClientError {
  constructor(
    public readonly maxRetries: number,
    options?: { cause?: unknown }
  ) {
    super(`Max retries (${maxRetries}) exceeded`, options);
  }
}

export class JobFailedError extends JobClientError {
  constructor(public readonly jobId: string) {
    super(`Job ${jobId} failed with error status`);
  }
}

export class ConfigError extends JobClientError {
  constructor(public readonly issues: string[]) {
    super(`Invalid configuration:\n${issues.map((issue) => `  - ${issue}`).join('\n')}`);
  }
}

export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
