import { describe, it, expect } from "vitest";
import { HostRateLimiter, RateLimiter } from "../server/audit/rate-limiter";

describe("RateLimiter", () => {
  it("spaces consecutive calls by at least the delay", async () => {
    const limiter = new RateLimiter(40);
    const start = performance.now();

    await limiter.wait();
    await limiter.wait();
    await limiter.wait();

    expect(performance.now() - start).toBeGreaterThanOrEqual(115);
  });

  it("releases concurrent callers one at a time", async () => {
    const limiter = new RateLimiter(30);
    const released: number[] = [];

    await Promise.all(
      [0, 1, 2].map((i) => limiter.wait().then(() => released.push(performance.now())))
    );

    expect(released).toHaveLength(3);
    expect(released[1] - released[0]).toBeGreaterThanOrEqual(25);
    expect(released[2] - released[1]).toBeGreaterThanOrEqual(25);
  });

  it("does not wait when the delay is zero", async () => {
    const limiter = new RateLimiter(0);
    const start = performance.now();
    await limiter.wait();
    await limiter.wait();
    expect(performance.now() - start).toBeLessThan(50);
  });
});

describe("HostRateLimiter", () => {
  it("keeps separate schedules per host", async () => {
    const limiter = new HostRateLimiter(60);
    const start = performance.now();

    await Promise.all([limiter.wait("a.example"), limiter.wait("b.example")]);

    // Both hosts wait out one delay in parallel rather than two in sequence.
    expect(performance.now() - start).toBeLessThan(110);
  });
});
