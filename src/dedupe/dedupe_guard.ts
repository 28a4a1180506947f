import { Redis } from "ioredis";
import { logger } from "../utils/logger.ts";

/**
 * Best-effort, cross-process guard taken around resolving and inserting one
 * occurrence. Losing it only costs a wasted attempt: the unique constraint on
 * jobs is what prevents duplicates.
 */
export interface DedupeGuard {
  readonly name: string;
  /**
   * @returns true if this caller holds the key, false if someone else does
   */
  tryAcquire(scheduleId: number, plannedAt: Date): Promise<boolean>;
  release(scheduleId: number, plannedAt: Date): Promise<void>;
  close(): Promise<void>;
}

/**
 * Key shared by every instance for one occurrence.
 */
export function dedupeKey(scheduleId: number, plannedAt: Date): string {
  return `dedupe:${scheduleId}:${plannedAt.toISOString()}`;
}

/**
 * The subset of the ioredis client the guard uses.
 */
export interface DedupeRedisClient {
  set(
    key: string,
    value: string,
    secondsToken: "EX",
    seconds: number,
    nx: "NX",
  ): Promise<"OK" | null>;
  del(key: string): Promise<number>;
  quit(): Promise<"OK">;
}

export interface RedisDedupeGuardOptions {
  client: DedupeRedisClient;
  /** Key expiry in seconds (default: 120, the schedule claim lease) */
  ttlSeconds?: number;
}

/**
 * Guard backed by `SET key 1 EX ttl NX`.
 *
 * @example
 * ```typescript
 * const guard = RedisDedupeGuard.fromUrl("redis://localhost:6379/0", 120);
 * if (await guard.tryAcquire(scheduleId, plannedAt)) {
 *   try {
 *     // resolve and insert the job
 *   } finally {
 *     await guard.release(scheduleId, plannedAt);
 *   }
 * }
 * ```
 */
export class RedisDedupeGuard implements DedupeGuard {
  static readonly DEFAULT_TTL_SECONDS = 120;

  readonly name = "redis";

  private readonly client: DedupeRedisClient;
  private readonly ttlSeconds: number;

  constructor(options: RedisDedupeGuardOptions) {
    this.client = options.client;
    this.ttlSeconds = options.ttlSeconds ?? RedisDedupeGuard.DEFAULT_TTL_SECONDS;
  }

  static fromUrl(redisUrl: string, ttlSeconds?: number): RedisDedupeGuard {
    const client = new Redis(redisUrl, {
      maxRetriesPerRequest: 3,
      lazyConnect: true,
    });
    client.on("error", (error: Error) => {
      logger.warn(`[DedupeGuard] Redis connection error: ${error.message}`);
    });
    return new RedisDedupeGuard({ client, ttlSeconds });
  }

  async tryAcquire(scheduleId: number, plannedAt: Date): Promise<boolean> {
    const result = await this.client.set(
      dedupeKey(scheduleId, plannedAt),
      "1",
      "EX",
      this.ttlSeconds,
      "NX",
    );
    return result === "OK";
  }

  async release(scheduleId: number, plannedAt: Date): Promise<void> {
    await this.client.del(dedupeKey(scheduleId, plannedAt));
  }

  async close(): Promise<void> {
    await this.client.quit();
  }
}

/**
 * Guard for a single process: a key map with expiry.
 */
export class InMemoryDedupeGuard implements DedupeGuard {
  readonly name = "memory";

  private readonly expiries = new Map<string, number>();
  private readonly ttlMs: number;
  private readonly now: () => number;

  constructor(options: { ttlSeconds?: number; now?: () => number } = {}) {
    this.ttlMs = (options.ttlSeconds ?? RedisDedupeGuard.DEFAULT_TTL_SECONDS) * 1000;
    this.now = options.now ?? Date.now;
  }

  async tryAcquire(scheduleId: number, plannedAt: Date): Promise<boolean> {
    await Promise.resolve();

    const key = dedupeKey(scheduleId, plannedAt);
    const now = this.now();
    const expiresAt = this.expiries.get(key);
    if (expiresAt !== undefined && expiresAt > now) {
      return false;
    }
    this.expiries.set(key, now + this.ttlMs);
    return true;
  }

  async release(scheduleId: number, plannedAt: Date): Promise<void> {
    await Promise.resolve();
    this.expiries.delete(dedupeKey(scheduleId, plannedAt));
  }

  async close(): Promise<void> {
    await Promise.resolve();
    this.expiries.clear();
  }
}

/**
 * Guard that always grants the key. Correctness then rests on the database.
 */
export class NoopDedupeGuard implements DedupeGuard {
  readonly name = "disabled";

  async tryAcquire(_scheduleId: number, _plannedAt: Date): Promise<boolean> {
    return await Promise.resolve(true);
  }

  async release(): Promise<void> {
    await Promise.resolve();
  }

  async close(): Promise<void> {
    await Promise.resolve();
  }
}
