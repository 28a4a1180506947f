import type { IANAZone } from "luxon";
import { logger } from "../utils/logger.ts";
import { InvalidRecurrenceError } from "./errors.ts";
import { RuleCache, ruleCacheKey } from "./rule_cache.ts";
import {
  type CompiledEntry,
  compileCron,
  compileRecurrenceRule,
  parseOneShot,
} from "./rule_compilers.ts";
import {
  instantToWallClock,
  isValidTimezone,
  loadZone,
  wallClockToInstant,
} from "./timezone.ts";
import type { RecurrenceKind, RecurrenceTarget, RuleCacheStats } from "./types.ts";

/** Candidates that map at or before the lower bound (DST overlap) are skipped */
const MAX_RESOLVE_STEPS = 64;

/**
 * Options for configuring the RecurrenceResolver.
 */
export interface RecurrenceResolverOptions {
  /** Maximum compiled rules kept in memory (default: 512) */
  cacheSize?: number;
}

/**
 * Computes the next occurrence of a schedule.
 *
 * Resolution is deterministic and has no side effects beyond the compiled-rule
 * cache. Cron and RRULE fields are evaluated as wall-clock time in the
 * schedule's IANA zone and returned as UTC instants, so a "09:00 daily" rule
 * stays at 09:00 local across DST changes.
 *
 * The lower bound is always exclusive: an occurrence equal to `after` is never
 * returned. `null` means the schedule has no further occurrences.
 *
 * @example
 * ```typescript
 * const resolver = new RecurrenceResolver({ cacheSize: 256 });
 *
 * const next = resolver.resolve(
 *   {
 *     id: 1,
 *     kind: "recurrence_rule",
 *     spec: "FREQ=DAILY;BYHOUR=9;BYMINUTE=0",
 *     timezone: "America/Chicago",
 *     createdAt: new Date("2024-01-01T14:23:17Z"),
 *   },
 *   new Date("2024-03-09T15:00:00Z"),
 * );
 * // 2024-03-10T14:00:00.000Z (09:00 CDT)
 * ```
 */
export class RecurrenceResolver {
  static readonly DEFAULT_CACHE_SIZE = 512;

  private readonly cache: RuleCache<CompiledEntry>;

  constructor(options: RecurrenceResolverOptions = {}) {
    this.cache = new RuleCache(
      options.cacheSize ?? RecurrenceResolver.DEFAULT_CACHE_SIZE,
    );
  }

  // ============== Resolution ==============

  /**
   * Next occurrence strictly after `after`, or null when exhausted.
   *
   * @throws InvalidRecurrenceError if the spec or timezone is malformed
   */
  resolve(target: RecurrenceTarget, after: Date): Date | null {
    const zone = this.zoneFor(target.kind, target.spec, target.timezone);

    if (target.kind === "one_shot") {
      const at = parseOneShot(target.spec, zone);
      return at.getTime() > after.getTime() ? at : null;
    }

    const entry = this.compiled(target, zone);
    let cursor = instantToWallClock(after, zone);

    for (let step = 0; step < MAX_RESOLVE_STEPS; step++) {
      const local = entry.rule.nextAfter(cursor);
      if (local === null) {
        return null;
      }

      const instant = wallClockToInstant(local, zone);
      if (instant.getTime() > after.getTime()) {
        return instant;
      }
      cursor = local;
    }

    logger.warn(
      `[Recurrence] Schedule ${target.id} produced no occurrence after ${after.toISOString()} within ${MAX_RESOLVE_STEPS} steps`,
    );
    return null;
  }

  /**
   * Lists up to `count` consecutive occurrences after `after`.
   */
  upcoming(target: RecurrenceTarget, after: Date, count: number): Date[] {
    const occurrences: Date[] = [];
    let cursor = after;
    while (occurrences.length < count) {
      const next = this.resolve(target, cursor);
      if (next === null) break;
      occurrences.push(next);
      cursor = next;
    }
    return occurrences;
  }

  /**
   * The instant a recurrence rule is anchored to.
   * One-shot schedules return their instant; cron schedules their creation time.
   */
  deriveStart(target: RecurrenceTarget): Date {
    const zone = this.zoneFor(target.kind, target.spec, target.timezone);

    switch (target.kind) {
      case "one_shot":
        return parseOneShot(target.spec, zone);
      case "cron":
        return target.createdAt;
      case "recurrence_rule": {
        const { startLocal } = this.compiled(target, zone);
        return startLocal === null ? target.createdAt : wallClockToInstant(startLocal, zone);
      }
    }
  }

  // ============== Validation ==============

  /**
   * Checks that a spec and timezone can be compiled, without caching.
   *
   * @throws InvalidRecurrenceError describing the first problem found
   */
  validate(kind: RecurrenceKind, spec: string, timezone: string): void {
    const zone = this.zoneFor(kind, spec, timezone);
    switch (kind) {
      case "one_shot":
        parseOneShot(spec, zone);
        return;
      case "cron":
        compileCron(spec);
        return;
      case "recurrence_rule":
        compileRecurrenceRule(spec, new Date(), zone);
        return;
    }
  }

  // ============== Cache ==============

  getCacheStats(): RuleCacheStats {
    return this.cache.getStats();
  }

  clearCache(): void {
    this.cache.clear();
  }

  // ============== Private Helpers ==============

  private compiled(target: RecurrenceTarget, zone: IANAZone): CompiledEntry {
    return this.cache.getOrCompute(ruleCacheKey(target), () =>
      target.kind === "cron"
        ? compileCron(target.spec)
        : compileRecurrenceRule(target.spec, target.createdAt, zone)
    );
  }

  private zoneFor(kind: RecurrenceKind, spec: string, timezone: string): IANAZone {
    if (!isValidTimezone(timezone)) {
      throw new InvalidRecurrenceError(kind, spec, `unknown timezone '${timezone}'`);
    }
    return loadZone(timezone);
  }
}
