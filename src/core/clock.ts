export interface Clock {
  now(): number;
  sleep(ms: number): Promise<void>;
}

export const systemClock: Clock = {
  now: () => Date.now(),
  sleep: (ms) => new Promise((resolve) => setTimeout(resolve, ms)),
};

/**
 * Last-call-timestamp guard. Calls are chained so that concurrent callers on
 * the same instance are still spaced by `minIntervalMs`.
 */
export class RateLimiter {
  private lastRequestAt: number | undefined;
  private tail: Promise<void> = Promise.resolve();

  constructor(
    private readonly minIntervalMs: number,
    private readonly clock: Clock = systemClock,
  ) {}

  acquire(): Promise<void> {
    const next = this.tail.then(() => this.waitTurn());
    this.tail = next;
    return next;
  }

  private async waitTurn(): Promise<void> {
    if (this.lastRequestAt !== undefined) {
      const elapsed = this.clock.now() - this.lastRequestAt;
      if (elapsed < this.minIntervalMs) {
        await this.clock.sleep(this.minIntervalMs - elapsed);
      }
    }
    this.lastRequestAt = this.clock.now();
  }
}
