import { describe, expect, it } from "vitest";
import {
  formatForSqlite,
  parseNullableTimestamp,
  parseSqliteTimestamp,
  truncateToSeconds,
} from "./datetime.ts";

describe("formatForSqlite", () => {
  it("produces the SQLite timestamp format", () => {
    expect(formatForSqlite(new Date("2026-01-02T18:08:36.123Z"))).toBe(
      "2026-01-02 18:08:36",
    );
  });

  it("drops milliseconds without rounding", () => {
    expect(formatForSqlite(new Date("2026-01-02T18:08:36.999Z"))).toBe(
      "2026-01-02 18:08:36",
    );
  });
});

describe("parseSqliteTimestamp", () => {
  it("reads SQLite format as UTC", () => {
    expect(parseSqliteTimestamp("2026-01-02 18:08:36").toISOString()).toBe(
      "2026-01-02T18:08:36.000Z",
    );
  });

  it("reads ISO format", () => {
    expect(
      parseSqliteTimestamp("2026-01-02T18:08:36.000Z").toISOString(),
    ).toBe("2026-01-02T18:08:36.000Z");
  });

  it("round-trips through formatForSqlite at second precision", () => {
    const date = new Date("2024-03-10T14:00:00.000Z");
    expect(parseSqliteTimestamp(formatForSqlite(date)).getTime()).toBe(
      date.getTime(),
    );
  });
});

describe("parseNullableTimestamp", () => {
  it("passes null through", () => {
    expect(parseNullableTimestamp(null)).toBeNull();
  });

  it("parses present values", () => {
    expect(parseNullableTimestamp("2024-01-01 00:00:00")?.toISOString()).toBe(
      "2024-01-01T00:00:00.000Z",
    );
  });
});

describe("truncateToSeconds", () => {
  it("drops the millisecond part", () => {
    expect(
      truncateToSeconds(new Date("2024-03-10T14:00:00.750Z")).toISOString(),
    ).toBe("2024-03-10T14:00:00.000Z");
  });
});
