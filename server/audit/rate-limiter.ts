const sleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

/**
 * Enforces a minimum gap of `delayMs` between consecutive `wait()` calls.
 * Callers that arrive concurrently are queued and released one at a time.
 * Elapsed time is measured with `performance.now()`, which is monotonic.
 */
export class RateLimiter {
  private last: number;
  private tail: Promise<void> = Promise.resolve();

  constructor(readonly delayMs: number) {
    this.last = performance.now();
  }

  wait(): Promise<void> {
    const turn = this.tail.then(async () => {
      const elapsed = performance.now() - this.last;
      if (elapsed < this.delayMs) {
        await sleep(this.delayMs - elapsed);
      }
      this.last = performance.now();
    });
    this.tail = turn;
    return turn;
  }
}

/** One {@link RateLimiter} per host, created on first use. */
export class HostRateLimiter {
  private limiters = new Map<string, RateLimiter>();

  constructor(readonly delayMs: number) {}

  wait(host: string): Promise<void> {
    let limiter = this.limiters.get(host);
    if (!limiter) {
      limiter = new RateLimiter(this.delayMs);
      this.limiters.set(host, limiter);
    }
    return limiter.wait();
  }
}
