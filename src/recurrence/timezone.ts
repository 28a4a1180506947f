import { IANAZone } from "luxon";

const MINUTE_MS = 60_000;
const DAY_MS = 86_400_000;

/**
 * Returns true when `name` is an IANA zone the runtime knows.
 */
export function isValidTimezone(name: string): boolean {
  return name.length > 0 && IANAZone.isValidZone(name);
}

/**
 * Loads an IANA zone. Callers validate the name first with
 * {@link isValidTimezone}.
 */
export function loadZone(name: string): IANAZone {
  return IANAZone.create(name);
}

/**
 * Converts a real instant into a floating wall-clock Date whose UTC fields
 * hold the local time in `zone`.
 *
 * @example
 * ```typescript
 * instantToWallClock(new Date("2024-03-10T14:00:00Z"), loadZone("America/Chicago"))
 *   .toISOString(); // "2024-03-10T09:00:00.000Z"
 * ```
 */
export function instantToWallClock(instant: Date, zone: IANAZone): Date {
  const ms = instant.getTime();
  return new Date(ms + zone.offset(ms) * MINUTE_MS);
}

/**
 * Converts a floating wall-clock Date (local time in `zone`) into a real instant.
 *
 * DST handling:
 * - a local time that occurs twice (fall-back overlap) maps to the earlier instant
 * - a local time that does not exist (spring-forward gap) is read with the
 *   pre-transition offset, which lands it after the gap by the gap's length
 *   (02:30 in a 02:00 to 03:00 gap becomes 03:30)
 */
export function wallClockToInstant(local: Date, zone: IANAZone): Date {
  const localMs = local.getTime();
  const offsetBefore = zone.offset(localMs - DAY_MS);
  const offsetAfter = zone.offset(localMs + DAY_MS);

  const candidates = [offsetBefore, offsetAfter]
    .map((offset) => localMs - offset * MINUTE_MS)
    .filter((ms) => zone.offset(ms) * MINUTE_MS === localMs - ms)
    .sort((a, b) => a - b);

  if (candidates.length > 0) {
    return new Date(candidates[0]);
  }

  return new Date(localMs - offsetBefore * MINUTE_MS);
}
