import { describe, expect, it } from "vitest";
import { RuleCache, ruleCacheKey } from "./rule_cache.ts";
import type { RecurrenceTarget } from "./types.ts";

const target: RecurrenceTarget = {
  id: 7,
  kind: "cron",
  spec: "0 9 * * *",
  timezone: "UTC",
  createdAt: new Date("2024-01-01T00:00:00Z"),
};

describe("ruleCacheKey", () => {
  it("prefixes the schedule id", () => {
    expect(ruleCacheKey(target)).toMatch(/^7:[0-9a-f]{16}$/);
  });

  it("changes when the spec or timezone changes", () => {
    const base = ruleCacheKey(target);
    expect(ruleCacheKey({ ...target, spec: "0 10 * * *" })).not.toBe(base);
    expect(ruleCacheKey({ ...target, timezone: "Europe/Paris" })).not.toBe(base);
    expect(ruleCacheKey({ ...target })).toBe(base);
  });
});

describe("RuleCache", () => {
  it("computes once per key", () => {
    const cache = new RuleCache<number>(4);
    let computed = 0;

    expect(cache.getOrCompute("a", () => ++computed)).toBe(1);
    expect(cache.getOrCompute("a", () => ++computed)).toBe(1);

    expect(cache.getStats()).toEqual({ size: 1, capacity: 4, hits: 1, misses: 1 });
  });

  it("evicts the least recently used entry", () => {
    const cache = new RuleCache<string>(2);
    cache.getOrCompute("a", () => "A");
    cache.getOrCompute("b", () => "B");
    cache.getOrCompute("a", () => "A");
    cache.getOrCompute("c", () => "C");

    expect(cache.has("a")).toBe(true);
    expect(cache.has("b")).toBe(false);
    expect(cache.has("c")).toBe(true);
    expect(cache.getStats().size).toBe(2);
  });

  it("rejects a non-positive capacity", () => {
    expect(() => new RuleCache(0)).toThrow(RangeError);
  });
});
