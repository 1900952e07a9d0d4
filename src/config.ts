import * as dotenv from 'dotenv';
import { z } from 'zod';
import { ConfigError } from './core/errors.js';

// Load environment variables from .env file
dotenv.config();

export type CommandName = 'serve' | 'run';

export interface Config {
  command: CommandName;
  debug: boolean;
  client: {
    baseUrl: string;
    requestTimeoutMs: number;
  };
  polling: {
    initialIntervalMs: number;
    maxIntervalMs: number;
    multiplier: number;
    jitterFactor: number;
    timeoutMs: number;
    escalateBatchBackoff: boolean;
  };
  circuitBreaker: {
    failureThreshold: number;
    resetTimeoutMs: number;
  };
  retry: {
    maxRetries: number;
  };
  server: {
    port: number;
    processTimeMs: number;
  };
  run: {
    jobs: number;
  };
}

// Zod validation schema
const ConfigSchema = z.object({
  command: z.enum(['serve', 'run']),
  debug: z.boolean(),
  client: z.object({
    baseUrl: z.string().url('Invalid job API URL format'),
    requestTimeoutMs: z.number().int().positive(),
  }),
  polling: z
    .object({
      initialIntervalMs: z.number().positive(),
      maxIntervalMs: z.number().positive(),
      multiplier: z.number().min(1),
      jitterFactor: z.number().min(0).lt(1),
      timeoutMs: z.number().positive(),
      escalateBatchBackoff: z.boolean(),
    })
    .refine((polling) => polling.initialIntervalMs <= polling.maxIntervalMs, {
      message: 'initialIntervalMs must not exceed maxIntervalMs',
      path: ['initialIntervalMs'],
    }),
  circuitBreaker: z.object({
    failureThreshold: z.number().int().min(1),
    resetTimeoutMs: z.number().int().min(0),
  }),
  retry: z.object({
    maxRetries: z.number().int().min(0).max(100),
  }),
  server: z.object({
    port: z.number().int().min(1).max(65535),
    processTimeMs: z.number().int().min(0),
  }),
  run: z.object({
    jobs: z.number().int().min(1).max(1000),
  }),
});

type CliArgs = Record<string, string | boolean>;

/**
 * Parse command line arguments
 * Usage: job-poller run --base-url http://localhost:5000 --jobs 3 --debug
 */
export function parseArgs(argv: readonly string[]): { command?: string; args: CliArgs } {
  const args: CliArgs = {};
  let command: string | undefined;

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];

    if (arg.startsWith('--')) {
      const key = arg.slice(2);

      // Check if next arg is a value or another flag
      if (i + 1 < argv.length && !argv[i + 1].startsWith('--')) {
        args[key] = argv[++i];
      } else {
        args[key] = true;
      }
    } else if (command === undefined) {
      command = arg;
    }
  }

  return { command, args };
}

/**
 * Get configuration from CLI arguments, then environment variables, then defaults.
 * Throws ConfigError listing every invalid setting.
 */
export function getConfig(
  argv: readonly string[] = process.argv.slice(2),
  env: NodeJS.ProcessEnv = process.env
): Config {
  const { command, args: cliArgs } = parseArgs(argv);

  const getString = (cliKey: string, envKey: string, defaultValue: string): string => {
    const cliValue = cliArgs[cliKey];
    if (typeof cliValue === 'string') return cliValue;
    return env[envKey] || defaultValue;
  };

  const getBoolean = (cliKey: string, envKey: string, defaultValue: boolean): boolean => {
    const cliValue = cliArgs[cliKey];
    if (cliValue !== undefined) return cliValue === true || cliValue === 'true';
    const envValue = env[envKey];
    return envValue === 'true' ? true : envValue === 'false' ? false : defaultValue;
  };

  const getNumber = (cliKey: string, envKey: string, defaultValue: number): number => {
    const cliValue = cliArgs[cliKey];
    if (typeof cliValue === 'string') return Number(cliValue);
    const envValue = env[envKey];
    return envValue ? Number(envValue) : defaultValue;
  };

  const rawConfig = {
    command: command ?? 'run',
    debug: getBoolean('debug', 'DEBUG', false),
    client: {
      baseUrl: getString('base-url', 'JOB_API_URL', 'http://localhost:5000'),
      requestTimeoutMs: getNumber('request-timeout', 'REQUEST_TIMEOUT_MS', 10000),
    },
    polling: {
      initialIntervalMs: getNumber('initial-interval', 'POLL_INITIAL_INTERVAL_MS', 500),
      maxIntervalMs: getNumber('max-interval', 'POLL_MAX_INTERVAL_MS', 5000),
      multiplier: getNumber('multiplier', 'POLL_MULTIPLIER', 2),
      jitterFactor: getNumber('jitter', 'POLL_JITTER_FACTOR', 0.1),
      timeoutMs: getNumber('timeout', 'POLL_TIMEOUT_MS', 300000),
      escalateBatchBackoff: getBoolean('escalate-batch-backoff', 'POLL_ESCALATE_BATCH_BACKOFF', true),
    },
    circuitBreaker: {
      failureThreshold: getNumber('failure-threshold', 'CB_FAILURE_THRESHOLD', 5),
      resetTimeoutMs: getNumber('reset-timeout', 'CB_RESET_TIMEOUT_MS', 60000),
    },
    retry: {
      maxRetries: getNumber('max-retries', 'MAX_RETRIES', 3),
    },
    server: {
      port: getNumber('port', 'PORT', 5000),
      processTimeMs: getNumber('process-time', 'JOB_PROCESS_TIME_MS', 10000),
    },
    run: {
      jobs: getNumber('jobs', 'JOB_COUNT', 1),
    },
  };

  // Validate configuration
  const result = ConfigSchema.safeParse(rawConfig);
  if (!result.success) {
    throw new ConfigError(
      result.error.errors.map((err) => `${err.path.join('.') || 'root'}: ${err.message}`)
    );
  }
  return result.data;
}

/**
 * Print configuration summary
 */
export function printConfigInfo(config: Config): void {
  console.error('─'.repeat(60));
  console.error(`Job poller (${config.command})${config.debug ? ' (Debug Mode)' : ''}`);

  if (config.command === 'serve') {
    console.error(`  Port: ${config.server.port}`);
    console.error(`  Job processing time: ${config.server.processTimeMs}ms`);
  } else {
    const { polling, circuitBreaker } = config;
    console.error(`  Job API: ${config.client.baseUrl} (request timeout ${config.client.requestTimeoutMs}ms)`);
    console.error(
      `  Polling: ${polling.initialIntervalMs}-${polling.maxIntervalMs}ms x${polling.multiplier} ` +
        `(jitter ${polling.jitterFactor}, timeout ${polling.timeoutMs}ms)`
    );
    console.error(
      `  Circuit breaker: ${circuitBreaker.failureThreshold} failures / ${circuitBreaker.resetTimeoutMs}ms reset`
    );
    console.error(`  Retries: ${config.retry.maxRetries} | Jobs: ${config.run.jobs}`);
  }

  console.error('─'.repeat(60));
}
