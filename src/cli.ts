#!/usr/bin/env node

/**
 * Job poller - command line entry point
 *
 *   job-poller serve   run the simulated job server
 *   job-poller run     create jobs against a server and wait for them
 */

import { getConfig, printConfigInfo } from './config.js';
import type { Config } from './config.js';
import { ALL_EVENT_TYPES } from './core/entities/Event.js';
import type { PollingEvent } from './core/entities/Event.js';
import { ConfigError } from './core/errors.js';
import { JobManager } from './infrastructure/server/JobManager.js';
import { JobServer } from './infrastructure/server/JobServer.js';
import { JobPollingClient } from './presentation/JobPollingClient.js';

export function formatEvent(event: PollingEvent, debug: boolean): string {
  const ids = Array.isArray(event.jobId) ? `[${event.jobId.join(', ')}]` : event.jobId ?? '-';
  let line = `[cli] ${event.timestamp.toISOString()} ${event.type} ${ids}`;

  if ('error' in event) {
    line += ` error=${event.error.message}`;
  }
  if (debug) {
    line += ` data=${JSON.stringify(event.data)}`;
  }
  return line;
}

async function serve(config: Config): Promise<void> {
  const server = new JobServer(new JobManager(config.server.processTimeMs), config.server.port);
  await server.start();

  const shutdown = async (signal: string) => {
    console.error(`[cli] Received ${signal}, shutting down...`);
    try {
      await server.stop();
      process.exit(0);
    } catch (error) {
      console.error('[cli] Error while stopping job server:', error);
      process.exit(1);
    }
  };

  process.on('SIGINT', () => void shutdown('SIGINT'));
  process.on('SIGTERM', () => void shutdown('SIGTERM'));
}

export async function runJobs(config: Config, client?: JobPollingClient): Promise<void> {
  const poller =
    client ??
    new JobPollingClient({
      baseUrl: config.client.baseUrl,
      requestTimeoutMs: config.client.requestTimeoutMs,
      pollingConfig: config.polling,
      circuitBreaker: config.circuitBreaker,
      maxRetries: config.retry.maxRetries,
    });

  for (const type of ALL_EVENT_TYPES) {
    poller.on(type, (event) => console.error(formatEvent(event, config.debug)));
  }

  if (config.run.jobs === 1) {
    const jobId = await poller.createJob();
    const status = await poller.waitForCompletion(jobId);
    console.error(`[cli] Job ${jobId} finished: ${status}`);
    return;
  }

  const jobIds = await poller.createBatchJobs(config.run.jobs);
  if (jobIds.length === 0) {
    throw new Error('No jobs could be created');
  }
  const statuses = await poller.waitForBatchCompletion(jobIds);
  for (const [jobId, status] of Object.entries(statuses)) {
    console.error(`[cli] Job ${jobId} finished: ${status}`);
  }
}

async function main(): Promise<void> {
  try {
    const config = getConfig();
    printConfigInfo(config);

    if (config.command === 'serve') {
      await serve(config);
    } else {
      await runJobs(config);
    }
  } catch (error) {
    if (error instanceof ConfigError) {
      console.error(`[cli] ${error.message}`);
      console.error('[cli] Check your .env file and CLI arguments');
    } else {
      console.error('[cli] Fatal error:', error);
    }
    process.exit(1);
  }
}

if (require.main === module) {
  void main();
}
