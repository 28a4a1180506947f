import { createHash } from "node:crypto";
import type { RecurrenceTarget, RuleCacheStats } from "./types.ts";

/**
 * Builds the cache key for a schedule's compiled rule.
 *
 * The hash covers everything that changes the compiled result, so editing a
 * schedule's spec or zone never serves a stale rule for the same id.
 */
export function ruleCacheKey(target: RecurrenceTarget): string {
  const digest = createHash("sha256")
    .update(
      [
        target.kind,
        target.spec,
        target.timezone,
        target.createdAt.toISOString(),
      ].join("\u0000"),
    )
    .digest("hex")
    .slice(0, 16);
  return `${target.id}:${digest}`;
}

/**
 * Bounded least-recently-used cache for compiled recurrence rules.
 *
 * Relies on Map preserving insertion order: a hit re-inserts the entry at the
 * end, and eviction removes from the front.
 */
export class RuleCache<V> {
  private readonly capacity: number;
  private readonly entries = new Map<string, V>();
  private hits = 0;
  private misses = 0;

  constructor(capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`Rule cache capacity must be a positive integer, got ${capacity}`);
    }
    this.capacity = capacity;
  }

  /**
   * Returns the cached value for `key`, compiling and storing it on a miss.
   */
  getOrCompute(key: string, compute: () => V): V {
    const cached = this.entries.get(key);
    if (cached !== undefined) {
      this.hits++;
      this.entries.delete(key);
      this.entries.set(key, cached);
      return cached;
    }

    this.misses++;
    const value = compute();
    this.entries.set(key, value);
    while (this.entries.size > this.capacity) {
      const oldest = this.entries.keys().next();
      if (oldest.done) break;
      this.entries.delete(oldest.value);
    }
    return value;
  }

  has(key: string): boolean {
    return this.entries.has(key);
  }

  clear(): void {
    this.entries.clear();
    this.hits = 0;
    this.misses = 0;
  }

  getStats(): RuleCacheStats {
    return {
      size: this.entries.size,
      capacity: this.capacity,
      hits: this.hits,
      misses: this.misses,
    };
  }
}
