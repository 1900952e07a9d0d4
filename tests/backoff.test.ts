import { BackoffCalculator } from '../src/utils/backoff.js';

describe('BackoffCalculator', () => {
  const config = { maxIntervalMs: 5000, multiplier: 2, jitterFactor: 0.1 };

  it('should multiply the interval when jitter draws the midpoint', () => {
    const backoff = new BackoffCalculator(config, () => 0.5);

    expect(backoff.next(500)).toBe(1000);
    expect(backoff.next(1000)).toBe(2000);
  });

  it('should cap the interval at maxIntervalMs before jitter', () => {
    const backoff = new BackoffCalculator(config, () => 0.5);

    expect(backoff.next(4000)).toBe(5000);
    expect(backoff.next(100000)).toBe(5000);
  });

  it('should spread the interval by +/- jitterFactor', () => {
    expect(new BackoffCalculator(config, () => 0).next(500)).toBe(900);
    expect(new BackoffCalculator(config, () => 0.75).next(500)).toBe(1050);
    expect(new BackoffCalculator(config, () => 0.999999).next(500)).toBeCloseTo(1100, 3);
  });

  it('should never return a negative interval', () => {
    const wideJitter = new BackoffCalculator({ ...config, jitterFactor: 1.5 }, () => 0);

    expect(wideJitter.next(100)).toBe(0);
  });

  it('should return 0 for a zero interval', () => {
    expect(new BackoffCalculator(config, () => 0).next(0)).toBe(0);
  });

  it('should stay within the jitter band for any random draw', () => {
    const backoff = new BackoffCalculator(config);

    for (const current of [0, 1, 250, 500, 2499, 2500, 4000, 10000]) {
      const base = Math.min(current * config.multiplier, config.maxIntervalMs);
      for (let i = 0; i < 50; i++) {
        const next = backoff.next(current);
        expect(next).toBeGreaterThanOrEqual(Math.max(0, base * (1 - config.jitterFactor)));
        expect(next).toBeLessThanOrEqual(base * (1 + config.jitterFactor));
      }
    }
  });

  it('should never exceed maxIntervalMs plus jitter when applied repeatedly', () => {
    const backoff = new BackoffCalculator(config);
    let interval = 500;

    for (let i = 0; i < 20; i++) {
      interval = backoff.next(interval);
      expect(interval).toBeLessThanOrEqual(config.maxIntervalMs * (1 + config.jitterFactor));
    }
  });
});
