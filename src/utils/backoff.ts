import type { PollingConfig } from '../core/entities/PollingConfig.js';

/**
 * Source of uniform random numbers in [0, 1)
 */
export type RandomSource = () => number;

/**
 * Jittered exponential backoff
 *
 * `next(current)` grows the interval by `multiplier`, caps it at
 * `maxIntervalMs` and then spreads it by +/- `jitterFactor`. Never negative.
 */
export class BackoffCalculator {
  constructor(
    private readonly config: Pick<PollingConfig, 'maxIntervalMs' | 'multiplier' | 'jitterFactor'>,
    private readonly random: RandomSource = Math.random
  ) {}

  next(currentMs: number): number {
    const base = Math.min(currentMs * this.config.multiplier, this.config.maxIntervalMs);
    return this.addJitter(base);
  }

  private addJitter(intervalMs: number): number {
    const spread = intervalMs * this.config.jitterFactor;
    const jitter = (this.random() * 2 - 1) * spread;
    return Math.max(0, intervalMs + jitter);
  }
}
