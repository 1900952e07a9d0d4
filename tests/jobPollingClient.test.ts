import { FetchError } from 'node-fetch';
import { EventType } from '../src/core/entities/Event.js';
import type { PollingEvent } from '../src/core/entities/Event.js';
import { JobStatus } from '../src/core/entities/Job.js';
import { CircuitOpenError, ConfigError, TimeoutError } from '../src/core/errors.js';
import type { FetchLike, FetchLikeInit, FetchLikeResponse } from '../src/infrastructure/http/JobApiClient.js';
import { JobManager } from '../src/infrastructure/server/JobManager.js';
import { JobPollingClient } from '../src/presentation/JobPollingClient.js';
import type { JobPollingClientOptions } from '../src/presentation/JobPollingClient.js';
import { sequentialIds } from './helpers/InMemoryTransport.js';
import { ManualClock } from './helpers/ManualClock.js';

function response(status: number, body: string): FetchLikeResponse {
  return {
    ok: status >= 200 && status < 300,
    status,
    text: async () => body,
  };
}

/**
 * Answers the job API routes straight from a JobManager
 */
function routeTo(manager: JobManager): FetchLike {
  return async (url, init) => {
    const path = new URL(url).pathname;

    if (init?.method === 'POST' && path === '/job') {
      const job = manager.createJob();
      return response(201, JSON.stringify({ job_id: job.id, status: job.status }));
    }

    const match = /^\/status\/([^/]+)$/.exec(path);
    if (init?.method === 'GET' && match) {
      const status = manager.getJobStatus(decodeURIComponent(match[1]));
      return status === null
        ? response(404, '{"error":"Job not found"}')
        : response(200, JSON.stringify({ result: status }));
    }

    return response(404, 'Not Found');
  };
}

describe('JobPollingClient', () => {
  let clock: ManualClock;
  let manager: JobManager;
  let fetchMock: jest.Mock<Promise<FetchLikeResponse>, [string, FetchLikeInit?]>;

  beforeEach(() => {
    clock = new ManualClock();
    manager = new JobManager(2000, () => clock.now(), sequentialIds());
    fetchMock = jest.fn<Promise<FetchLikeResponse>, [string, FetchLikeInit?]>(routeTo(manager));
  });

  function createClient(options: JobPollingClientOptions = {}): JobPollingClient {
    return new JobPollingClient({
      baseUrl: 'http://jobs.test',
      fetch: fetchMock,
      clock,
      random: () => 0.5,
      ...options,
    });
  }

  function typesOf(events: readonly PollingEvent[]): EventType[] {
    return events.map((event) => event.type);
  }

  it('should create a job and wait for it to complete', async () => {
    const client = createClient();

    const jobId = await client.createJob();
    const status = await client.waitForCompletion(jobId);

    expect(jobId).toBe('job-1');
    expect(status).toBe(JobStatus.Completed);
    expect(clock.sleeps).toEqual([1000, 2000]);
    expect(typesOf(client.getEventHistory())).toEqual([
      EventType.JobCreated,
      EventType.StatusChanged,
      EventType.StatusChanged,
      EventType.JobCompleted,
    ]);
    expect(client.getCircuitBreakerState()).toBe('closed');
  });

  it('should pass the request timeout to every request', async () => {
    const client = createClient({ requestTimeoutMs: 1500 });

    await client.createJob();

    expect(fetchMock).toHaveBeenCalledWith('http://jobs.test/job', {
      method: 'POST',
      headers: { Accept: 'application/json' },
      timeout: 1500,
    });
  });

  it('should return the created ids when some creations fail', async () => {
    const route = routeTo(manager);
    let call = 0;
    fetchMock.mockImplementation(async (url, init) => {
      call++;
      if (call === 2 || call === 4) {
        throw new FetchError('connect ECONNREFUSED 127.0.0.1:5000', 'system');
      }
      return route(url, init);
    });
    const client = createClient();

    const jobIds = await client.createBatchJobs(5);

    expect(jobIds).toEqual(['job-1', 'job-2', 'job-3']);
    const batch = client.getEventHistory().filter((e) => e.type === EventType.BatchOperation);
    expect(batch).toHaveLength(1);
    expect(batch[0].data).toMatchObject({ operation: 'create', successCount: 3, errorCount: 2 });
  });

  it('should report the same status for repeated reads of an unchanged job', async () => {
    const client = createClient();
    const jobId = await client.createJob();

    await expect(client.getStatus(jobId)).resolves.toBe(JobStatus.Pending);
    await expect(client.getStatus(jobId)).resolves.toBe(JobStatus.Pending);
  });

  it('should resolve every job in a batch', async () => {
    const client = createClient();
    const jobIds = await client.createBatchJobs(3);

    await expect(client.getBatchStatus(jobIds)).resolves.toEqual({
      'job-1': 'pending',
      'job-2': 'pending',
      'job-3': 'pending',
    });
    await expect(client.waitForBatchCompletion(jobIds)).resolves.toEqual({
      'job-1': 'completed',
      'job-2': 'completed',
      'job-3': 'completed',
    });
  });

  it('should support chained subscription and unsubscription', async () => {
    const client = createClient();
    const handler = jest.fn();

    expect(client.on(EventType.JobCreated, handler)).toBe(client);
    await client.createJob();
    expect(client.off(EventType.JobCreated, handler)).toBe(client);
    await client.createJob();

    expect(handler).toHaveBeenCalledTimes(1);
    expect(handler.mock.calls[0][0]).toMatchObject({ type: EventType.JobCreated, jobId: 'job-1' });
  });

  it('should open the breaker after five failed calls and stop calling the server', async () => {
    const client = createClient();

    for (let i = 0; i < 5; i++) {
      await client.getStatus('missing').catch(() => undefined);
    }

    expect(client.getCircuitBreakerState()).toBe('open');
    await expect(client.getStatus('missing')).rejects.toBeInstanceOf(CircuitOpenError);
    expect(fetchMock).toHaveBeenCalledTimes(5);
    expect(client.getCircuitBreakerStats().failureCount).toBe(5);

    client.resetCircuitBreaker();
    expect(client.getCircuitBreakerState()).toBe('closed');
  });

  it('should let a trial call through once the reset timeout has elapsed', async () => {
    const client = createClient({ circuitBreaker: { failureThreshold: 1, resetTimeoutMs: 30000 } });
    await client.getStatus('missing').catch(() => undefined);
    const jobId = await client.createJob().catch(() => 'rejected');
    expect(jobId).toBe('rejected');

    clock.advance(30000);

    await expect(client.createJob()).resolves.toBe('job-1');
    expect(client.getCircuitBreakerState()).toBe('closed');
    expect(typesOf(client.getEventHistory())).toEqual([
      EventType.ErrorOccurred,
      EventType.CircuitBreakerOpened,
      EventType.CircuitBreakerClosed,
      EventType.JobCreated,
    ]);
  });

  it('should keep breakers independent between instances', async () => {
    const first = createClient({ circuitBreaker: { failureThreshold: 1 } });
    const second = createClient({ circuitBreaker: { failureThreshold: 1 } });

    await first.getStatus('missing').catch(() => undefined);

    expect(first.getCircuitBreakerState()).toBe('open');
    expect(second.getCircuitBreakerState()).toBe('closed');
  });

  it('should time out with a single Timeout event and no completion', async () => {
    manager = new JobManager(60000, () => clock.now(), sequentialIds());
    fetchMock.mockImplementation(routeTo(manager));
    const client = createClient({ pollingConfig: { timeoutMs: 5000 } });
    const jobId = await client.createJob();

    const error = await client.waitForCompletion(jobId).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(TimeoutError);
    const history = typesOf(client.getEventHistory());
    expect(history.filter((type) => type === EventType.Timeout)).toHaveLength(1);
    expect(history).not.toContain(EventType.JobCompleted);
  });

  it('should clear the event history', async () => {
    const client = createClient();
    await client.createJob();

    client.clearEventHistory();

    expect(client.getEventHistory()).toEqual([]);
  });

  it('should reject an invalid polling configuration', () => {
    expect(() => createClient({ pollingConfig: { initialIntervalMs: 6000, maxIntervalMs: 5000 } })).toThrow(
      ConfigError
    );
    expect(() => createClient({ pollingConfig: { multiplier: 0.5 } })).toThrow(ConfigError);
  });
});
