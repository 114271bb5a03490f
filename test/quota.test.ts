import { describe, expect, test } from "vitest";

import {
  clearRateLimitBuckets,
  consumeRateLimit,
  enforceRateLimit,
  trackedRateLimitBuckets,
} from "../src/utils/quota.js";

describe("rate limiting", () => {
  test("throws once the bucket is exhausted", () => {
    clearRateLimitBuckets();
    const ip = "127.0.0.1";
    const route = "simulateTokenomics";

    for (let i = 0; i < 30; i += 1) {
      enforceRateLimit(ip, route);
    }

    expect(() => enforceRateLimit(ip, route)).toThrowError(/Rate limit exceeded/);
  });

  test("reports retry time and resets after the window", () => {
    clearRateLimitBuckets();
    const now = 1_000_000;

    for (let i = 0; i < 30; i += 1) {
      consumeRateLimit("10.1.1.1", "simulateTokenomics", now);
    }

    expect(consumeRateLimit("10.1.1.1", "simulateTokenomics", now + 500)).toEqual({
      allowed: false,
      remaining: 0,
      retryAfter: 60,
    });
    expect(
      consumeRateLimit("10.1.1.1", "simulateTokenomics", now + 60_000),
    ).toEqual({ allowed: true, remaining: 29, retryAfter: 0 });
  });

  test("keeps separate buckets per client", () => {
    clearRateLimitBuckets();
    const first = consumeRateLimit("10.0.0.1", "simulateTokenomics", 0);
    const second = consumeRateLimit("10.0.0.2", "simulateTokenomics", 0);

    expect(first.remaining).toBe(29);
    expect(second.remaining).toBe(29);
  });

  test("bounds the number of tracked clients", () => {
    clearRateLimitBuckets();

    for (let i = 0; i <= 10_000; i += 1) {
      consumeRateLimit(`client-${i}`, "simulateTokenomics", 0);
    }

    expect(trackedRateLimitBuckets()).toBe(10_000);
  });
});
