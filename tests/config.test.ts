import { getConfig, parseArgs } from '../src/config.js';
import { ConfigError } from '../src/core/errors.js';

describe('parseArgs', () => {
  it('should split the command from flags', () => {
    expect(parseArgs(['run', '--jobs', '3', '--debug'])).toEqual({
      command: 'run',
      args: { jobs: '3', debug: true },
    });
  });

  it('should treat a flag followed by another flag as a switch', () => {
    expect(parseArgs(['--debug', '--port', '8080'])).toEqual({
      command: undefined,
      args: { debug: true, port: '8080' },
    });
  });
});

describe('getConfig', () => {
  it('should fall back to the defaults', () => {
    const config = getConfig([], {});

    expect(config).toEqual({
      command: 'run',
      debug: false,
      client: { baseUrl: 'http://localhost:5000', requestTimeoutMs: 10000 },
      polling: {
        initialIntervalMs: 500,
        maxIntervalMs: 5000,
        multiplier: 2,
        jitterFactor: 0.1,
        timeoutMs: 300000,
        escalateBatchBackoff: true,
      },
      circuitBreaker: { failureThreshold: 5, resetTimeoutMs: 60000 },
      retry: { maxRetries: 3 },
      server: { port: 5000, processTimeMs: 10000 },
      run: { jobs: 1 },
    });
  });

  it('should read environment variables', () => {
    const config = getConfig([], {
      JOB_API_URL: 'http://jobs.internal:8080',
      POLL_TIMEOUT_MS: '60000',
      CB_FAILURE_THRESHOLD: '2',
      POLL_ESCALATE_BATCH_BACKOFF: 'false',
      DEBUG: 'true',
    });

    expect(config.client.baseUrl).toBe('http://jobs.internal:8080');
    expect(config.polling.timeoutMs).toBe(60000);
    expect(config.circuitBreaker.failureThreshold).toBe(2);
    expect(config.polling.escalateBatchBackoff).toBe(false);
    expect(config.debug).toBe(true);
  });

  it('should prefer CLI arguments over environment variables', () => {
    const config = getConfig(['serve', '--port', '6000', '--process-time', '2000'], { PORT: '7000' });

    expect(config.command).toBe('serve');
    expect(config.server).toEqual({ port: 6000, processTimeMs: 2000 });
  });

  it('should report every invalid setting', () => {
    let caught: unknown;
    try {
      getConfig(['--base-url', 'not a url', '--jitter', '1.5'], {});
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(ConfigError);
    expect(caught).toMatchObject({
      issues: ['client.baseUrl: Invalid job API URL format', 'polling.jitterFactor: Number must be less than 1'],
    });
  });

  it('should reject an initial interval above the maximum', () => {
    expect(() => getConfig(['--initial-interval', '8000'], {})).toThrow(ConfigError);
  });

  it('should reject an unknown command', () => {
    expect(() => getConfig(['deploy'], {})).toThrow(ConfigError);
  });

  it('should reject non-numeric values', () => {
    expect(() => getConfig([], { JOB_COUNT: 'many' })).toThrow(ConfigError);
  });
});
