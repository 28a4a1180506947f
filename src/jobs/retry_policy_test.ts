import { describe, expect, it } from "vitest";
import { RetryPolicy } from "./retry_policy.ts";

describe("RetryPolicy", () => {
  it("doubles the delay per attempt", () => {
    const policy = new RetryPolicy({
      baseDelayMs: 1000,
      maxDelayMs: 60_000,
      random: () => 0.5,
    });

    expect([1, 2, 3, 4].map((attempt) => policy.delayFor(attempt))).toEqual([
      1000,
      2000,
      4000,
      8000,
    ]);
  });

  it("treats attempt 0 like the first attempt", () => {
    const policy = new RetryPolicy({ baseDelayMs: 1000, random: () => 0.5 });

    expect(policy.delayFor(0)).toBe(1000);
  });

  it("caps the delay", () => {
    const policy = new RetryPolicy({
      baseDelayMs: 1000,
      maxDelayMs: 3000,
      random: () => 0.5,
    });

    expect(policy.delayFor(3)).toBe(3000);
    expect(policy.delayFor(40)).toBe(3000);
  });

  it("moves the delay by up to the jitter ratio", () => {
    const low = new RetryPolicy({ baseDelayMs: 1000, jitterRatio: 0.1, random: () => 0 });
    const high = new RetryPolicy({
      baseDelayMs: 1000,
      jitterRatio: 0.1,
      random: () => 0.75,
    });

    expect(low.delayFor(1)).toBe(900);
    expect(high.delayFor(1)).toBe(1050);
  });

  it("never exceeds the cap after jitter", () => {
    const policy = new RetryPolicy({
      baseDelayMs: 1000,
      maxDelayMs: 3000,
      jitterRatio: 0.1,
      random: () => 0.75,
    });

    expect(policy.delayFor(5)).toBe(3000);
  });

  it("retries until the attempt limit", () => {
    const policy = new RetryPolicy({ maxAttempts: 3 });

    expect(policy.shouldRetry(1)).toBe(true);
    expect(policy.shouldRetry(2)).toBe(true);
    expect(policy.shouldRetry(3)).toBe(false);
  });

  it("uses the documented defaults", () => {
    const policy = new RetryPolicy({ random: () => 0.5 });

    expect(policy.maxAttempts).toBe(5);
    expect(policy.delayFor(1)).toBe(60_000);
    expect(policy.delayFor(10)).toBe(3_600_000);
  });
});
