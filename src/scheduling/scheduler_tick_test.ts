import { afterEach, describe, expect, it } from "vitest";
import { InMemoryDedupeGuard, NoopDedupeGuard } from "../dedupe/dedupe_guard.ts";
import type { DedupeGuard } from "../dedupe/dedupe_guard.ts";
import { EventType } from "../events/event_types.ts";
import { TestSetupBuilder } from "../test/test_setup_builder.ts";
import type { TestContext } from "../test/types.ts";
import { generateSelectionSeed } from "../variants/seed.ts";
import { SchedulerTick } from "./scheduler_tick.ts";

let ctx: TestContext;

afterEach(async () => {
  await ctx.cleanup();
});

const builder = () =>
  TestSetupBuilder.create()
    .withTemplate("greetings", [
      { text: "Good morning" },
      { text: "Hello there" },
      { text: "Hi everyone" },
    ])
    .withContentItem("notice", "Office closed today");

function scheduleId(name: string): number {
  const schedule = ctx.schedules.get(name);
  if (!schedule) throw new Error(`missing schedule ${name}`);
  return schedule.id;
}

function variantIds(): number[] {
  return ctx.templates.get("greetings")?.variants.map((v) => v.id) ?? [];
}

async function countJobs(): Promise<number> {
  const row = await ctx.db.queryOne<{ count: number }>("SELECT COUNT(*) AS count FROM jobs");
  return row?.count ?? 0;
}

const at = (iso: string) => new Date(iso);

// =====================
// Job creation
// =====================

describe("SchedulerTick - job creation", () => {
  it("creates an enqueued job for a due schedule and advances it", async () => {
    ctx = await builder()
      .withSchedule("hourly", { kind: "cron", spec: "0 * * * *", template: "greetings" })
      .build();
    const id = scheduleId("hourly");
    const enqueued: number[] = [];
    ctx.eventBus.subscribe(EventType.JOB_ENQUEUED, (event) => {
      enqueued.push(event.payload.jobId);
    });

    ctx.clock.set(at("2024-01-01T01:00:00Z"));
    const result = await ctx.schedulerTick.tick();

    expect(result.claimed).toBe(1);
    expect(result.outcomes.created).toBe(1);
    expect(enqueued).toEqual(result.jobIds);

    const job = await ctx.jobStore.getByIdOrThrow(result.jobIds[0]);
    expect(job.status).toBe("enqueued");
    expect(job.plannedAt.toISOString()).toBe("2024-01-01T01:00:00.000Z");
    expect(job.selectionPolicy).toBe("uniform_random");
    expect(job.selectionSeed).toBe(generateSelectionSeed(id, at("2024-01-01T01:00:00Z")));
    expect(variantIds()).toContain(job.variantId);

    const schedule = await ctx.scheduleStore.getByIdOrThrow(id);
    expect(schedule.nextRunAt?.toISOString()).toBe("2024-01-01T02:00:00.000Z");
    expect(schedule.lastRunAt?.toISOString()).toBe("2024-01-01T01:00:00.000Z");
    expect(schedule.claimedBy).toBeNull();

    const history = await ctx.historyStore.listForSchedule(id);
    expect(history.map((h) => [h.jobId, h.variantId])).toEqual([[job.id, job.variantId]]);
  });

  it("does nothing before the schedule is due", async () => {
    ctx = await builder()
      .withSchedule("hourly", { kind: "cron", spec: "0 * * * *", template: "greetings" })
      .build();

    ctx.clock.set(at("2024-01-01T00:59:59Z"));
    const result = await ctx.schedulerTick.tick();

    expect(result.claimed).toBe(0);
    expect(await countJobs()).toBe(0);
  });

  it("creates fixed-content jobs without a variant", async () => {
    ctx = await builder()
      .withSchedule("notice", { kind: "cron", spec: "0 9 * * *", contentItem: "notice" })
      .build();

    ctx.clock.set(at("2024-01-01T09:00:00Z"));
    const result = await ctx.schedulerTick.tick();
    const job = await ctx.jobStore.getByIdOrThrow(result.jobIds[0]);

    expect(job.variantId).toBeNull();
    expect(job.selectionSeed).toBeNull();
    expect(await ctx.historyStore.listForSchedule(scheduleId("notice"))).toEqual([]);
  });

  it("disables a one-shot schedule once it has fired", async () => {
    ctx = await builder()
      .withSchedule("once", {
        kind: "one_shot",
        spec: "2024-01-01T12:00:00Z",
        contentItem: "notice",
      })
      .build();

    ctx.clock.set(at("2024-01-01T12:00:30Z"));
    const result = await ctx.schedulerTick.tick();
    const schedule = await ctx.scheduleStore.getByIdOrThrow(scheduleId("once"));

    expect(result.outcomes.created).toBe(1);
    expect(schedule.enabled).toBe(false);
    expect(schedule.disabledReason).toBe("exhausted");
    expect(schedule.nextRunAt).toBeNull();
    expect(schedule.lastRunAt?.toISOString()).toBe("2024-01-01T12:00:00.000Z");
  });

  it("rotates round-robin picks across ticks", async () => {
    ctx = await builder()
      .withSchedule("hourly", {
        kind: "cron",
        spec: "0 * * * *",
        template: "greetings",
        selectionPolicy: "round_robin",
      })
      .build();
    const [a, b, c] = variantIds();

    const picks: (number | null)[] = [];
    for (let hour = 1; hour <= 4; hour++) {
      ctx.clock.set(new Date(Date.UTC(2024, 0, 1, hour)));
      const result = await ctx.schedulerTick.tick();
      picks.push((await ctx.jobStore.getByIdOrThrow(result.jobIds[0])).variantId);
    }

    expect(picks).toEqual([a, b, c, a]);
    expect((await ctx.scheduleStore.getByIdOrThrow(scheduleId("hourly"))).roundRobinCursor)
      .toBe(0);
  });

  it("never repeats a variant within the no-repeat window", async () => {
    ctx = await builder()
      .withSchedule("hourly", {
        kind: "cron",
        spec: "0 * * * *",
        template: "greetings",
        selectionPolicy: "no_repeat_window",
        noRepeatWindow: 2,
      })
      .build();

    const picks: (number | null)[] = [];
    for (let hour = 1; hour <= 9; hour++) {
      ctx.clock.set(new Date(Date.UTC(2024, 0, 1, hour)));
      const result = await ctx.schedulerTick.tick();
      picks.push((await ctx.jobStore.getByIdOrThrow(result.jobIds[0])).variantId);
    }

    for (let i = 2; i < picks.length; i++) {
      expect(new Set([picks[i - 2], picks[i - 1], picks[i]]).size).toBe(3);
    }
  });
});

// =====================
// Missed occurrences
// =====================

describe("SchedulerTick - missed occurrences", () => {
  it("fires once after an outage and resumes from the present", async () => {
    ctx = await builder()
      .withSchedule("hourly", { kind: "cron", spec: "0 * * * *", contentItem: "notice" })
      .build();

    ctx.clock.set(at("2024-01-01T05:30:00Z"));
    const first = await ctx.schedulerTick.tick();
    const second = await ctx.schedulerTick.tick();

    expect(first.outcomes.created).toBe(1);
    expect(second.claimed).toBe(0);
    const jobs = await ctx.jobStore.listBySchedule(scheduleId("hourly"));
    expect(jobs.map((job) => job.plannedAt.toISOString())).toEqual([
      "2024-01-01T01:00:00.000Z",
    ]);
    expect(
      (await ctx.scheduleStore.getByIdOrThrow(scheduleId("hourly"))).nextRunAt?.toISOString(),
    ).toBe("2024-01-01T06:00:00.000Z");
  });

  it("catches up one occurrence per tick when missed runs are kept", async () => {
    ctx = await builder()
      .withSchedulerConfig({ skipMissedOccurrences: false })
      .withSchedule("hourly", { kind: "cron", spec: "0 * * * *", contentItem: "notice" })
      .build();

    ctx.clock.set(at("2024-01-01T03:30:00Z"));
    for (let i = 0; i < 4; i++) {
      await ctx.schedulerTick.tick();
    }

    const jobs = await ctx.jobStore.listBySchedule(scheduleId("hourly"));
    expect(jobs.map((job) => job.plannedAt.toISOString())).toEqual([
      "2024-01-01T03:00:00.000Z",
      "2024-01-01T02:00:00.000Z",
      "2024-01-01T01:00:00.000Z",
    ]);
  });
});

// =====================
// Concurrency
// =====================

describe("SchedulerTick - concurrent instances", () => {
  it("creates each occurrence once when two instances tick together", async () => {
    ctx = await builder()
      .withSchedule("a", { kind: "cron", spec: "0 * * * *", template: "greetings" })
      .withSchedule("b", { kind: "cron", spec: "0 * * * *", template: "greetings" })
      .withSchedule("c", { kind: "cron", spec: "0 * * * *", contentItem: "notice" })
      .build();
    const other = ctx.createSchedulerTick("test-instance-b");

    ctx.clock.set(at("2024-01-01T01:00:00Z"));
    const [mine, theirs] = await Promise.all([ctx.schedulerTick.tick(), other.tick()]);

    expect(mine.outcomes.created + theirs.outcomes.created).toBe(3);
    expect(mine.claimed + theirs.claimed).toBe(3);
    expect(await countJobs()).toBe(3);
  });

  it("relies on the unique occurrence key when the guard is disabled", async () => {
    ctx = await builder()
      .withoutDedupeGuard()
      .withSchedule("hourly", { kind: "cron", spec: "0 * * * *", template: "greetings" })
      .build();
    const id = scheduleId("hourly");
    const other = ctx.createSchedulerTick("test-instance-b");

    ctx.clock.set(at("2024-01-01T01:00:00Z"));
    await ctx.schedulerTick.tick();
    // Another instance still working from the pre-advance view of the schedule
    await ctx.scheduleStore.setNextRunAt(id, at("2024-01-01T01:00:00Z"), ctx.clock.now());
    const replay = await other.tick();

    expect(replay.outcomes.duplicate).toBe(1);
    expect(await countJobs()).toBe(1);
    expect((await ctx.historyStore.listForSchedule(id)).length).toBe(1);
    expect((await ctx.scheduleStore.getByIdOrThrow(id)).nextRunAt?.toISOString()).toBe(
      "2024-01-01T02:00:00.000Z",
    );
  });

  it("leaves an occurrence to the instance holding its dedupe key", async () => {
    const guard = new InMemoryDedupeGuard();
    ctx = await builder()
      .withSchedule("hourly", { kind: "cron", spec: "0 * * * *", template: "greetings" })
      .build();
    const id = scheduleId("hourly");
    const tick = ctx.createSchedulerTick("test-instance-b", guard);
    await guard.tryAcquire(id, at("2024-01-01T01:00:00Z"));

    ctx.clock.set(at("2024-01-01T01:00:00Z"));
    const result = await tick.tick();

    expect(result.outcomes.locked).toBe(1);
    expect(await countJobs()).toBe(0);
    const schedule = await ctx.scheduleStore.getByIdOrThrow(id);
    expect(schedule.nextRunAt?.toISOString()).toBe("2024-01-01T01:00:00.000Z");
    expect(schedule.claimedBy).toBeNull();
  });

  it("takes over an occurrence whose dedupe key outlived the claim lease", async () => {
    ctx = await builder()
      .withSchedule("hourly", { kind: "cron", spec: "0 * * * *", template: "greetings" })
      .build();
    const id = scheduleId("hourly");
    // A holder that took the key and never released it
    const guard = new InMemoryDedupeGuard({
      ttlSeconds: 172_800,
      now: () => ctx.clock.now().getTime(),
    });
    await guard.tryAcquire(id, at("2024-01-01T01:00:00Z"));

    ctx.clock.set(at("2024-01-01T06:00:00Z"));
    const result = await ctx.createSchedulerTick("test-instance-b", guard).tick();

    expect(result.outcomes.locked).toBe(0);
    expect(result.outcomes.created).toBe(1);
    const job = await ctx.jobStore.getByOccurrence(id, at("2024-01-01T01:00:00Z"));
    expect(job?.status).toBe("enqueued");
    expect((await ctx.scheduleStore.getByIdOrThrow(id)).nextRunAt?.toISOString()).toBe(
      "2024-01-01T06:00:00.000Z",
    );
  });

  it("carries on when the dedupe guard is unreachable", async () => {
    const broken: DedupeGuard = {
      name: "broken",
      tryAcquire: () => Promise.reject(new Error("connection refused")),
      release: () => Promise.reject(new Error("connection refused")),
      close: () => Promise.resolve(),
    };
    ctx = await builder()
      .withSchedule("hourly", { kind: "cron", spec: "0 * * * *", template: "greetings" })
      .build();

    ctx.clock.set(at("2024-01-01T01:00:00Z"));
    const result = await ctx.createSchedulerTick("test-instance-b", broken).tick();

    expect(result.outcomes.created).toBe(1);
  });

  it("works the same with a no-op guard", async () => {
    ctx = await builder()
      .withSchedule("hourly", { kind: "cron", spec: "0 * * * *", template: "greetings" })
      .build();

    ctx.clock.set(at("2024-01-01T01:00:00Z"));
    const result = await ctx
      .createSchedulerTick("test-instance-b", new NoopDedupeGuard())
      .tick();

    expect(result.outcomes.created).toBe(1);
  });
});

// =====================
// Problem schedules
// =====================

describe("SchedulerTick - problem schedules", () => {
  it("skips an occurrence when no variant is eligible", async () => {
    ctx = await builder()
      .withTemplate("empty", [{ text: "Retired", active: false }])
      .withSchedule("hourly", { kind: "cron", spec: "0 * * * *", template: "empty" })
      .build();
    const id = scheduleId("hourly");

    ctx.clock.set(at("2024-01-01T01:00:00Z"));
    const result = await ctx.schedulerTick.tick();

    expect(result.outcomes.skipped).toBe(1);
    expect(await countJobs()).toBe(0);
    const schedule = await ctx.scheduleStore.getByIdOrThrow(id);
    expect(schedule.enabled).toBe(true);
    expect(schedule.nextRunAt?.toISOString()).toBe("2024-01-01T02:00:00.000Z");
    expect(schedule.lastRunAt).toBeNull();
  });

  it("disables a schedule whose stored spec no longer parses", async () => {
    ctx = await builder()
      .withSchedule("broken", { kind: "cron", spec: "0 * * * *", contentItem: "notice" })
      .withSchedule("healthy", { kind: "cron", spec: "0 * * * *", contentItem: "notice" })
      .build();
    await ctx.db.execute("UPDATE schedules SET spec = ? WHERE id = ?", [
      "whenever",
      scheduleId("broken"),
    ]);

    ctx.clock.set(at("2024-01-01T01:00:00Z"));
    const result = await ctx.schedulerTick.tick();

    expect(result.outcomes).toMatchObject({ created: 1, disabled: 1 });
    const broken = await ctx.scheduleStore.getByIdOrThrow(scheduleId("broken"));
    expect(broken.enabled).toBe(false);
    expect(broken.disabledReason).toBe("invalid_spec");
    expect(await ctx.jobStore.listBySchedule(scheduleId("broken"))).toEqual([]);
  });

  it("disables a schedule whose stored policy is unknown", async () => {
    ctx = await builder()
      .withSchedule("hourly", { kind: "cron", spec: "0 * * * *", template: "greetings" })
      .build();
    await ctx.db.execute("UPDATE schedules SET selectionPolicy = 'most_liked' WHERE id = ?", [
      scheduleId("hourly"),
    ]);

    ctx.clock.set(at("2024-01-01T01:00:00Z"));
    const result = await ctx.schedulerTick.tick();

    expect(result.outcomes.disabled).toBe(1);
    const row = await ctx.db.queryOne<{ enabled: number; disabledReason: string }>(
      "SELECT enabled, disabledReason FROM schedules WHERE id = ?",
      [scheduleId("hourly")],
    );
    expect(row).toEqual({ enabled: 0, disabledReason: "invalid_spec" });
  });
});

// =====================
// Maintenance
// =====================

describe("SchedulerTick - maintenance", () => {
  it("initializes schedules that have no next run", async () => {
    ctx = await builder()
      .withSchedule("hourly", { kind: "cron", spec: "0 * * * *", template: "greetings" })
      .build();
    const id = scheduleId("hourly");
    await ctx.db.execute("UPDATE schedules SET nextRunAt = NULL WHERE id = ?", [id]);

    const initialized = await ctx.schedulerTick.initializeSchedules(at("2024-01-01T07:10:00Z"));

    expect(initialized).toBe(1);
    expect((await ctx.scheduleStore.getByIdOrThrow(id)).nextRunAt?.toISOString()).toBe(
      "2024-01-01T08:00:00.000Z",
    );
  });

  it("reports overdue schedules and stuck jobs", async () => {
    ctx = await builder()
      .withSchedule("hourly", { kind: "cron", spec: "0 * * * *", template: "greetings" })
      .build();

    ctx.clock.set(at("2024-01-01T01:00:00Z"));
    const result = await ctx.schedulerTick.tick();
    await ctx.stateMachine.claim(result.jobIds[0], "test-instance-a");

    expect(await ctx.schedulerTick.healthCheck(at("2024-01-01T01:04:00Z"))).toEqual({
      overdueSchedules: 0,
      stuckJobs: 0,
      healthy: true,
    });
    expect(await ctx.schedulerTick.healthCheck(at("2024-01-01T02:11:00Z"))).toEqual({
      overdueSchedules: 1,
      stuckJobs: 1,
      healthy: true,
    });
  });

  it("reports unhealthy when many schedules are overdue", async () => {
    ctx = await builder().build();
    const templateId = ctx.templates.get("greetings")?.id ?? null;
    for (let i = 0; i < 11; i++) {
      await ctx.scheduleStore.create(
        { name: `s${i}`, kind: "cron", spec: "0 * * * *", templateId },
        ctx.clock.now(),
      );
    }

    const report = await ctx.schedulerTick.healthCheck(at("2024-01-01T02:00:00Z"));

    expect(report).toEqual({ overdueSchedules: 11, stuckJobs: 0, healthy: false });
  });

  it("runs ticks in the background until stopped", async () => {
    ctx = await builder()
      .withSchedule("hourly", { kind: "cron", spec: "0 * * * *", template: "greetings" })
      .build();
    ctx.clock.set(at("2024-01-01T01:00:00Z"));
    const enqueued = new Promise<number>((resolve) => {
      ctx.eventBus.subscribe(EventType.JOB_ENQUEUED, (event) => {
        resolve(event.payload.jobId);
      });
    });

    ctx.schedulerTick.start();
    const jobId = await enqueued;
    await ctx.schedulerTick.stop();

    expect((await ctx.jobStore.getByIdOrThrow(jobId)).status).toBe("enqueued");
    expect(ctx.schedulerTick.getStatus()).toEqual({
      isRunning: false,
      isProcessing: false,
      consecutiveFailures: 0,
    });
  });

  it("exposes default health thresholds", () => {
    expect(SchedulerTick.DEFAULT_CONFIG).toEqual({
      overdueGraceMs: 300_000,
      stuckJobMs: 600_000,
    });
  });
});
