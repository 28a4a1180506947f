import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { TestSetupBuilder } from "../test/test_setup_builder.ts";
import type { TestContext } from "../test/types.ts";

describe("SelectionHistoryStore", () => {
  let ctx: TestContext;
  let templateId: number;
  let variantA: number;
  let variantB: number;
  let first: number;
  let second: number;

  beforeEach(async () => {
    ctx = await TestSetupBuilder.create()
      .withTemplate("greetings", [{ text: "Hello" }, { text: "Hi there" }])
      .withSchedule("first", { kind: "cron", spec: "0 * * * *", template: "greetings" })
      .withSchedule("second", { kind: "cron", spec: "30 * * * *", template: "greetings" })
      .build();

    const template = ctx.templates.get("greetings");
    if (!template) throw new Error("fixture missing");
    templateId = template.id;
    variantA = template.variants[0].id;
    variantB = template.variants[1].id;
    first = ctx.schedules.get("first")?.id ?? -1;
    second = ctx.schedules.get("second")?.id ?? -1;

    await record(first, "2024-01-01T09:00:00Z", variantA);
    await record(first, "2024-01-01T10:00:00Z", variantB);
    await record(second, "2024-01-01T09:30:00Z", variantB);
  });

  afterEach(async () => {
    await ctx.cleanup();
  });

  async function record(scheduleId: number, at: string, variantId: number): Promise<number> {
    const plannedAt = new Date(at);
    return await ctx.db.transaction(async (tx) => {
      const job = await ctx.jobStore.insertPlanned(
        tx,
        {
          scheduleId,
          plannedAt,
          variantId,
          selectionPolicy: "uniform_random",
          selectionSeed: "0123456789abcdef",
        },
        ctx.clock.now(),
      );
      await ctx.historyStore.record(
        tx,
        { templateId, variantId, scheduleId, jobId: job.id, plannedAt },
        ctx.clock.now(),
      );
      return job.id;
    });
  }

  const query = (scope: "schedule" | "template", before: string, limit = 10) =>
    ctx.historyStore.recentVariantIds({
      scope,
      scheduleId: first,
      templateId,
      before: new Date(before),
      limit,
    });

  it("returns a schedule's recent selections newest first", async () => {
    expect(await query("schedule", "2024-01-01T11:00:00Z")).toEqual([variantB, variantA]);
  });

  it("only counts occurrences strictly before the cutoff", async () => {
    expect(await query("schedule", "2024-01-01T10:00:00Z")).toEqual([variantA]);
  });

  it("spans every schedule of the template in template scope", async () => {
    expect(await query("template", "2024-01-01T11:00:00Z")).toEqual([
      variantB,
      variantB,
      variantA,
    ]);
  });

  it("honours the limit", async () => {
    expect(await query("schedule", "2024-01-01T11:00:00Z", 1)).toEqual([variantB]);
    expect(await query("schedule", "2024-01-01T11:00:00Z", 0)).toEqual([]);
  });

  it("lists entries for a schedule", async () => {
    const entries = await ctx.historyStore.listForSchedule(first);

    expect(entries.map((e) => [e.variantId, e.plannedAt.toISOString()])).toEqual([
      [variantB, "2024-01-01T10:00:00.000Z"],
      [variantA, "2024-01-01T09:00:00.000Z"],
    ]);
  });

  it("returns texts of recent publications", async () => {
    const jobId = await record(first, "2024-01-01T11:00:00Z", variantB);
    await ctx.db.transaction((tx) =>
      ctx.jobStore.recordPublication(tx, {
        jobId,
        externalId: "ext-9",
        variantId: variantB,
        publishedAt: new Date("2024-01-01T11:00:02Z"),
      })
    );

    expect(await ctx.historyStore.recentPublishedTexts(5)).toEqual(["Hi there"]);
  });
});
