// ---------------------------------------------------------------------------
// Client-side request throttle: at most `requestsPerSecond` requests on
// average, enforced over a sliding window.  A request that would exceed the
// limit waits for the oldest one to leave the window.  Nothing is retried
// here.
//
// Whole rates use a one-second window; a fractional rate widens it, so 0.5
// allows one request every two seconds and 2.5 allows two every 800 ms.
// ---------------------------------------------------------------------------

const SECOND_MS = 1_000;

export class RateLimiter {
  private readonly limit: number;
  /** Window duration in milliseconds. */
  private readonly windowMs: number;
  /** Start times (ms) of the requests inside the current window. */
  private readonly issued: number[] = [];

  constructor(requestsPerSecond: number) {
    if (!Number.isFinite(requestsPerSecond) || requestsPerSecond <= 0) {
      throw new RangeError(
        `requestsPerSecond must be a positive number, got ${requestsPerSecond}`,
      );
    }
    this.limit = Math.max(1, Math.floor(requestsPerSecond));
    this.windowMs = (SECOND_MS * this.limit) / requestsPerSecond;
  }

  /**
   * Resolve once a request may be issued, and count it.
   *
   * @returns  Milliseconds spent waiting.
   */
  async acquire(): Promise<number> {
    let waited = 0;

    for (;;) {
      const now = Date.now();
      while (this.issued.length > 0 && now - this.issued[0] >= this.windowMs) {
        this.issued.shift();
      }

      if (this.issued.length < this.limit) {
        this.issued.push(now);
        return waited;
      }

      const delay = this.issued[0] + this.windowMs - now;
      await sleep(delay);
      waited += delay;
    }
  }
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
