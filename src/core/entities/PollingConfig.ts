import { z } from 'zod';
import { ConfigError } from '../errors.js';

export interface PollingConfig {
  /** First sleep between polls, before backoff kicks in */
  readonly initialIntervalMs: number;
  readonly maxIntervalMs: number;
  readonly multiplier: number;
  /** Fraction of the interval used as +/- random jitter */
  readonly jitterFactor: number;
  /** Overall deadline for a wait loop */
  readonly timeoutMs: number;
  /** Grow the batch wait interval across rounds instead of resleeping the initial one */
  readonly escalateBatchBackoff: boolean;
}

export const DEFAULT_POLLING_CONFIG: PollingConfig = Object.freeze({
  initialIntervalMs: 500,
  maxIntervalMs: 5000,
  multiplier: 2,
  jitterFactor: 0.1,
  timeoutMs: 300000,
  escalateBatchBackoff: true,
});

export const PollingConfigSchema = z
  .object({
    initialIntervalMs: z.number().positive('initialIntervalMs must be positive'),
    maxIntervalMs: z.number().positive('maxIntervalMs must be positive'),
    multiplier: z.number().min(1, 'multiplier must be >= 1'),
    jitterFactor: z
      .number()
      .min(0, 'jitterFactor must be >= 0')
      .lt(1, 'jitterFactor must be < 1'),
    timeoutMs: z.number().positive('timeoutMs must be positive'),
    escalateBatchBackoff: z.boolean(),
  })
  .refine((config) => config.initialIntervalMs <= config.maxIntervalMs, {
    message: 'initialIntervalMs must not exceed maxIntervalMs',
    path: ['initialIntervalMs'],
  });

/**
 * Merge overrides onto the defaults and validate the result
 */
export function createPollingConfig(overrides: Partial<PollingConfig> = {}): PollingConfig {
  const result = PollingConfigSchema.safeParse({ ...DEFAULT_POLLING_CONFIG, ...overrides });
  if (!result.success) {
    throw new ConfigError(
      result.error.errors.map((err) => `${err.path.join('.') || 'root'}: ${err.message}`)
    );
  }
  return Object.freeze(result.data);
}
