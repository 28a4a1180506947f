import { createHash } from "node:crypto";
import { truncateToSeconds } from "../utils/datetime.ts";
import { InvalidSelectionSeedError } from "./errors.ts";

const SEED_PATTERN = /^[0-9a-f]{16}$/;

/**
 * Derives the selection seed for one occurrence of a schedule.
 *
 * The occurrence time is truncated to whole seconds and rendered in UTC
 * before hashing, so the same (schedule, occurrence) pair always yields the
 * same seed regardless of which process or timezone computes it.
 *
 * @example
 * ```typescript
 * generateSelectionSeed(42, new Date("2024-03-10T14:00:00.500Z"));
 * // first 16 hex chars of sha256("42:2024-03-10T14:00:00.000Z")
 * ```
 */
export function generateSelectionSeed(scheduleId: number, plannedAt: Date): string {
  const material = `${scheduleId}:${truncateToSeconds(plannedAt).toISOString()}`;
  return createHash("sha256").update(material).digest("hex").slice(0, 16);
}

/**
 * Type guard for stored or supplied seeds.
 */
export function isSelectionSeed(value: string): boolean {
  return SEED_PATTERN.test(value);
}

/**
 * @throws InvalidSelectionSeedError if `value` is not a valid seed
 */
export function assertSelectionSeed(value: string): string {
  if (!isSelectionSeed(value)) {
    throw new InvalidSelectionSeedError(value);
  }
  return value;
}
