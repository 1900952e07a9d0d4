import type { IClock } from '../../src/core/interfaces/IClock.js';

/**
 * Clock whose sleep advances time instantly
 */
export class ManualClock implements IClock {
  readonly sleeps: number[] = [];

  constructor(private current: number = 0) {}

  now(): number {
    return this.current;
  }

  advance(ms: number): void {
    this.current += ms;
  }

  async sleep(ms: number): Promise<void> {
    this.sleeps.push(ms);
    this.current += ms;
  }
}
