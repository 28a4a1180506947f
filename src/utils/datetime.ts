/**
 * Datetime utilities for consistent timestamp handling across the application.
 *
 * **Key Principles:**
 * - Database timestamps use SQLite format: "YYYY-MM-DD HH:MM:SS" (no timezone suffix)
 * - All timestamps are stored and compared in UTC
 * - Occurrence times are second-precision; sub-second parts never reach storage
 *   so `(scheduleId, plannedAt)` compares equal across processes
 *
 * @module datetime
 */

/**
 * Formats a Date object for SQLite database operations.
 *
 * **Output format:** `"YYYY-MM-DD HH:MM:SS"` (UTC, no timezone suffix)
 *
 * This format matches SQLite's CURRENT_TIMESTAMP format, enabling correct
 * string-based comparisons in SQL queries.
 *
 * @example
 * ```typescript
 * const date = new Date("2026-01-02T18:08:36.123Z");
 * formatForSqlite(date); // "2026-01-02 18:08:36"
 * ```
 */
export function formatForSqlite(date: Date): string {
  return date.toISOString().replace("T", " ").slice(0, 19);
}

/**
 * Parses a timestamp string from the database into a Date object.
 *
 * Accepts the SQLite format (`"2026-01-02 18:08:36"`) and full ISO strings.
 * Both are interpreted as UTC.
 */
export function parseSqliteTimestamp(timestamp: string): Date {
  if (!timestamp.includes("T")) {
    return new Date(timestamp + "Z");
  }
  return new Date(timestamp);
}

/**
 * Nullable variant of {@link parseSqliteTimestamp} for optional columns.
 */
export function parseNullableTimestamp(timestamp: string | null): Date | null {
  return timestamp === null ? null : parseSqliteTimestamp(timestamp);
}

/**
 * Drops the millisecond part of a Date.
 *
 * @example
 * ```typescript
 * truncateToSeconds(new Date("2024-03-10T14:00:00.750Z")).toISOString();
 * // "2024-03-10T14:00:00.000Z"
 * ```
 */
export function truncateToSeconds(date: Date): Date {
  return new Date(Math.floor(date.getTime() / 1000) * 1000);
}
