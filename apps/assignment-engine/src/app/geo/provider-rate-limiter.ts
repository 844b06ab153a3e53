import { setTimeout as sleep } from 'timers/promises';

export interface RateLimiterClock {
  now(): number;
  sleep(ms: number): Promise<void>;
}

export const systemClock: RateLimiterClock = {
  now: () => Date.now(),
  sleep: async (ms) => {
    await sleep(ms);
  }
};

/**
 * Serializes calls and keeps at least `minIntervalMs` between the end of one
 * call and the start of the next.
 */
export class ProviderRateLimiter {
  private lastCallAt: number | null = null;

  /** Settles when the previously scheduled call has finished */
  private tail: Promise<void> = Promise.resolve();

  constructor(
    private readonly minIntervalMs: number,
    private readonly clock: RateLimiterClock = systemClock
  ) {}

  schedule<T>(task: () => Promise<T>): Promise<T> {
    const run = this.tail.then(() => this.runSpaced(task));
    this.tail = run.then(
      () => undefined,
      () => undefined
    );
    return run;
  }

  private async runSpaced<T>(task: () => Promise<T>): Promise<T> {
    if (this.lastCallAt !== null) {
      const waitMs = this.lastCallAt + this.minIntervalMs - this.clock.now();
      if (waitMs > 0) {
        await this.clock.sleep(waitMs);
      }
    }

    try {
      return await task();
    } finally {
      this.lastCallAt = this.clock.now();
    }
  }
}
