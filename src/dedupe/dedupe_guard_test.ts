import { describe, expect, it } from "vitest";
import {
  dedupeKey,
  type DedupeRedisClient,
  InMemoryDedupeGuard,
  NoopDedupeGuard,
  RedisDedupeGuard,
} from "./dedupe_guard.ts";

/**
 * In-process stand-in for the Redis commands the guard issues.
 */
class FakeRedis implements DedupeRedisClient {
  readonly store = new Map<string, { value: string; ttl: number }>();
  quitCalled = false;

  async set(
    key: string,
    value: string,
    _secondsToken: "EX",
    seconds: number,
    _nx: "NX",
  ): Promise<"OK" | null> {
    await Promise.resolve();
    if (this.store.has(key)) return null;
    this.store.set(key, { value, ttl: seconds });
    return "OK";
  }

  async del(key: string): Promise<number> {
    await Promise.resolve();
    return this.store.delete(key) ? 1 : 0;
  }

  async quit(): Promise<"OK"> {
    await Promise.resolve();
    this.quitCalled = true;
    return "OK";
  }
}

const plannedAt = new Date("2024-03-10T14:00:00Z");

describe("dedupeKey", () => {
  it("combines the schedule id and the occurrence instant", () => {
    expect(dedupeKey(7, plannedAt)).toBe("dedupe:7:2024-03-10T14:00:00.000Z");
  });
});

describe("RedisDedupeGuard", () => {
  it("grants the key once and stores it with the TTL", async () => {
    const redis = new FakeRedis();
    const guard = new RedisDedupeGuard({ client: redis, ttlSeconds: 60 });

    expect(await guard.tryAcquire(7, plannedAt)).toBe(true);
    expect(await guard.tryAcquire(7, plannedAt)).toBe(false);
    expect(redis.store.get("dedupe:7:2024-03-10T14:00:00.000Z")).toEqual({
      value: "1",
      ttl: 60,
    });
  });

  it("defaults to a TTL matching the claim lease", async () => {
    const redis = new FakeRedis();
    const guard = new RedisDedupeGuard({ client: redis });

    await guard.tryAcquire(1, plannedAt);

    expect(redis.store.get(dedupeKey(1, plannedAt))?.ttl).toBe(120);
  });

  it("frees the key on release", async () => {
    const redis = new FakeRedis();
    const guard = new RedisDedupeGuard({ client: redis });

    await guard.tryAcquire(7, plannedAt);
    await guard.release(7, plannedAt);

    expect(await guard.tryAcquire(7, plannedAt)).toBe(true);
  });

  it("closes the client", async () => {
    const redis = new FakeRedis();
    await new RedisDedupeGuard({ client: redis }).close();
    expect(redis.quitCalled).toBe(true);
  });
});

describe("InMemoryDedupeGuard", () => {
  it("keeps occurrences independent", async () => {
    const guard = new InMemoryDedupeGuard();

    expect(await guard.tryAcquire(1, plannedAt)).toBe(true);
    expect(await guard.tryAcquire(2, plannedAt)).toBe(true);
    expect(await guard.tryAcquire(1, new Date("2024-03-11T14:00:00Z"))).toBe(true);
    expect(await guard.tryAcquire(1, plannedAt)).toBe(false);
  });

  it("grants the key again once it expires", async () => {
    let now = 1_000_000;
    const guard = new InMemoryDedupeGuard({ ttlSeconds: 10, now: () => now });

    expect(await guard.tryAcquire(1, plannedAt)).toBe(true);
    now += 9_999;
    expect(await guard.tryAcquire(1, plannedAt)).toBe(false);
    now += 1;
    expect(await guard.tryAcquire(1, plannedAt)).toBe(true);
  });
});

describe("NoopDedupeGuard", () => {
  it("always grants the key", async () => {
    const guard = new NoopDedupeGuard();
    expect(await guard.tryAcquire(1, plannedAt)).toBe(true);
    expect(await guard.tryAcquire(1, plannedAt)).toBe(true);
  });
});
