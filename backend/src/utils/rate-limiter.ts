type Sleep = (ms: number) => Promise<void>;

const defaultSleep: Sleep = ms => new Promise(resolve => setTimeout(resolve, ms));

/** Spaces calls out to at most `requestsPerSecond`; callers are served in arrival order. */
export class RateLimiter {
  private nextSlot = 0;
  private minIntervalMs: number;

  constructor(
    opts: { requestsPerSecond: number },
    private readonly now: () => number = Date.now,
    private readonly sleep: Sleep = defaultSleep,
  ) {
    this.minIntervalMs = opts.requestsPerSecond > 0 ? 1000 / opts.requestsPerSecond : 0;
  }

  async waitForSlot(): Promise<void> {
    const now = this.now();
    const slot = Math.max(now, this.nextSlot);
    this.nextSlot = slot + this.minIntervalMs;
    if (slot > now) {
      await this.sleep(slot - now);
    }
  }
}
