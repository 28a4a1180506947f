/**
 * Tests for TestSetupBuilder to verify the builder creates valid test contexts.
 */

import { stat } from "node:fs/promises";
import { describe, expect, it } from "vitest";
import { TestSetupBuilder } from "./test_setup_builder.ts";

describe("TestSetupBuilder", () => {
  it("creates a migrated database and the full service graph", async () => {
    const ctx = await TestSetupBuilder.create().build();

    try {
      const tables = await ctx.db.queryAll<{ name: string }>(
        "SELECT name FROM sqlite_master WHERE type = 'table' AND name NOT LIKE 'sqlite_%' ORDER BY name",
      );
      expect(tables.map((t) => t.name)).toEqual([
        "contentItems",
        "jobs",
        "publishedRecords",
        "schedules",
        "schemaVersion",
        "selectionHistory",
        "templates",
        "variants",
      ]);
      expect(ctx.clock.now().toISOString()).toBe("2024-01-01T00:00:00.000Z");
      expect(ctx.dedupeGuard.name).toBe("memory");
      expect(ctx.schedulerTick.isRunning()).toBe(false);
      expect(ctx.worker.isRunning()).toBe(false);
    } finally {
      await ctx.cleanup();
    }
  });

  it("seeds templates, content items and schedules by name", async () => {
    const ctx = await TestSetupBuilder.create()
      .withStartTime(new Date("2024-05-01T06:00:00Z"))
      .withTemplate("greetings", [{ text: "Hello", weight: 2 }, { text: "Hi" }])
      .withContentItem("notice", "Office closed", ["media/sign.png"])
      .withSchedule("daily", { kind: "cron", spec: "0 9 * * *", template: "greetings" })
      .withSchedule("once", {
        kind: "one_shot",
        spec: "2024-05-02T12:00:00Z",
        contentItem: "notice",
      })
      .build();

    try {
      const template = ctx.templates.get("greetings");
      expect(template?.variants.map((v) => [v.text, v.weight])).toEqual([
        ["Hello", 2],
        ["Hi", 1],
      ]);
      expect(ctx.contentItems.get("notice")?.mediaRefs).toEqual(["media/sign.png"]);

      const daily = ctx.schedules.get("daily");
      expect(daily?.templateId).toBe(template?.id);
      expect(daily?.nextRunAt?.toISOString()).toBe("2024-05-01T09:00:00.000Z");
      expect(ctx.schedules.get("once")?.contentItemId).toBe(ctx.contentItems.get("notice")?.id);
    } finally {
      await ctx.cleanup();
    }
  });

  it("rejects schedules that reference unknown fixtures and cleans up", async () => {
    await expect(
      TestSetupBuilder.create()
        .withSchedule("orphan", { kind: "cron", spec: "0 9 * * *", template: "missing" })
        .build(),
    ).rejects.toThrow("Unknown test fixture 'missing'");
  });

  it("uses a no-op dedupe guard when asked", async () => {
    const ctx = await TestSetupBuilder.create().withoutDedupeGuard().build();

    try {
      expect(ctx.dedupeGuard.name).toBe("disabled");
    } finally {
      await ctx.cleanup();
    }
  });

  it("removes the temp directory on cleanup", async () => {
    const ctx = await TestSetupBuilder.create().build();
    await ctx.cleanup();

    await expect(stat(ctx.tempDir)).rejects.toThrow();
  });
});
