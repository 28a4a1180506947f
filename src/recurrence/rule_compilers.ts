import { CronExpressionParser } from "cron-parser";
import { RRule, type Options as RRuleOptions } from "rrule";
import type { IANAZone } from "luxon";
import { truncateToSeconds } from "../utils/datetime.ts";
import { InvalidRecurrenceError } from "./errors.ts";
import { instantToWallClock, wallClockToInstant } from "./timezone.ts";
import type { CompiledRule } from "./types.ts";

/** Upper bound on candidates inspected per lookup */
const MAX_CRON_STEPS = 1000;

const ONE_SHOT_PATTERN = /^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}(?::\d{2}(?:\.\d+)?)?/;
const OFFSET_SUFFIX = /(?:Z|[+-]\d{2}(?::?\d{2})?)$/i;
const UTC_UNTIL = /(?:^|;)UNTIL=\d{8}T\d{6}Z(?:;|$)/i;

/**
 * A compiled recurrence rule plus the wall-clock start it was anchored to.
 */
export interface CompiledEntry {
  rule: CompiledRule;
  /** Floating wall-clock anchor (UTC fields hold local time); null for cron */
  startLocal: Date | null;
}

// ============== One-shot ==============

/**
 * Parses a one-shot instant.
 *
 * A value with a `Z` or numeric offset is an absolute instant; one without is
 * read as wall-clock time in `zone`.
 */
export function parseOneShot(spec: string, zone: IANAZone): Date {
  const text = spec.trim();
  if (!ONE_SHOT_PATTERN.test(text)) {
    throw new InvalidRecurrenceError("one_shot", spec, "expected an ISO-8601 date-time");
  }

  const instant = OFFSET_SUFFIX.test(text)
    ? new Date(text)
    : wallClockToInstant(new Date(`${text}Z`), zone);

  if (Number.isNaN(instant.getTime())) {
    throw new InvalidRecurrenceError("one_shot", spec, "not a valid date-time");
  }
  return truncateToSeconds(instant);
}

// ============== Cron ==============

/**
 * Compiles a cron expression. Evaluation happens on floating wall-clock dates,
 * so the parser runs in UTC and the resolver applies the schedule's zone.
 */
export function compileCron(spec: string): CompiledEntry {
  const expression = spec.trim();
  const fieldCount = expression.split(/\s+/).length;
  if (fieldCount !== 5 && fieldCount !== 6) {
    throw new InvalidRecurrenceError(
      "cron",
      spec,
      `expected 5 or 6 fields, got ${fieldCount}`,
    );
  }

  try {
    CronExpressionParser.parse(expression, { tz: "UTC" });
  } catch (error) {
    throw new InvalidRecurrenceError("cron", spec, describe(error));
  }

  return {
    startLocal: null,
    rule: {
      nextAfter(afterLocal: Date): Date | null {
        try {
          const interval = CronExpressionParser.parse(expression, {
            currentDate: afterLocal,
            tz: "UTC",
          });
          for (let step = 0; step < MAX_CRON_STEPS; step++) {
            const next = interval.next().toDate();
            if (next.getTime() > afterLocal.getTime()) {
              return next;
            }
          }
          return null;
        } catch (error) {
          throw new InvalidRecurrenceError("cron", spec, describe(error));
        }
      },
    },
  };
}

// ============== Recurrence rule ==============

/**
 * Compiles an RRULE against a start derived from the schedule's creation time.
 *
 * Any DTSTART in the text is replaced by the derived start. An UNTIL given in
 * UTC (trailing `Z`) is converted to the schedule's wall clock so the bound
 * compares against floating occurrences.
 */
export function compileRecurrenceRule(
  spec: string,
  createdAt: Date,
  zone: IANAZone,
): CompiledEntry {
  const text = spec.trim().replace(/^RRULE:/i, "");
  if (text.length === 0) {
    throw new InvalidRecurrenceError("recurrence_rule", spec, "empty rule");
  }

  let parsed: Partial<RRuleOptions>;
  try {
    parsed = RRule.parseString(text);
  } catch (error) {
    throw new InvalidRecurrenceError("recurrence_rule", spec, describe(error));
  }

  if (parsed.freq === undefined || parsed.freq === null) {
    throw new InvalidRecurrenceError("recurrence_rule", spec, "FREQ is required");
  }

  const startLocal = deriveStartLocal(parsed, createdAt, zone);
  const until = parsed.until && UTC_UNTIL.test(text)
    ? instantToWallClock(parsed.until, zone)
    : parsed.until ?? null;

  let rule: RRule;
  try {
    rule = new RRule({ ...parsed, dtstart: startLocal, until, tzid: null });
  } catch (error) {
    throw new InvalidRecurrenceError("recurrence_rule", spec, describe(error));
  }

  return {
    startLocal,
    rule: {
      nextAfter: (afterLocal: Date) => rule.after(afterLocal, false),
    },
  };
}

/**
 * Derives the wall-clock anchor for a rule.
 *
 * The creation instant is first read as wall-clock time in the schedule's
 * zone. When the rule names BYHOUR, BYMINUTE or BYSECOND, those local fields
 * are snapped to the earliest named values (unnamed lower fields become zero).
 * If that lands before the local creation time it moves forward by one unit
 * of the next larger field. Without those parts the local creation time is the
 * anchor.
 */
export function deriveStartLocal(
  parsed: Partial<RRuleOptions>,
  createdAt: Date,
  zone: IANAZone,
): Date {
  const base = instantToWallClock(truncateToSeconds(createdAt), zone);
  const hours = toList(parsed.byhour);
  const minutes = toList(parsed.byminute);
  const seconds = toList(parsed.bysecond);

  if (hours.length === 0 && minutes.length === 0 && seconds.length === 0) {
    return base;
  }

  const start = new Date(base.getTime());
  const second = seconds.length > 0 ? Math.min(...seconds) : 0;
  const minute = minutes.length > 0 ? Math.min(...minutes) : 0;

  if (hours.length > 0) {
    start.setUTCHours(Math.min(...hours), minute, second);
    if (start.getTime() < base.getTime()) start.setUTCDate(start.getUTCDate() + 1);
  } else if (minutes.length > 0) {
    start.setUTCMinutes(minute, second);
    if (start.getTime() < base.getTime()) start.setUTCHours(start.getUTCHours() + 1);
  } else {
    start.setUTCSeconds(second);
    if (start.getTime() < base.getTime()) start.setUTCMinutes(start.getUTCMinutes() + 1);
  }
  return start;
}

function toList(value: number | number[] | null | undefined): number[] {
  if (value === null || value === undefined) return [];
  return Array.isArray(value) ? value : [value];
}

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
