/**
 * Time source and suspension used by the breaker and the wait loops
 */
export interface IClock {
  now(): number;
  sleep(ms: number): Promise<void>;
}

export const systemClock: IClock = {
  now: () => Date.now(),
  sleep: (ms: number) => new Promise((resolve) => setTimeout(resolve, ms)),
};
