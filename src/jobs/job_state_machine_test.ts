import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { TestSetupBuilder } from "../test/test_setup_builder.ts";
import type { TestContext } from "../test/types.ts";
import {
  InvalidTransitionError,
  JobAlreadyClaimedError,
  JobNotCancellableError,
  JobNotFoundError,
} from "./errors.ts";
import { ALLOWED_TRANSITIONS, canTransition, isTerminalStatus } from "./job_state_machine.ts";
import { JOB_STATUSES, type Job } from "./types.ts";

describe("job transition table", () => {
  it("allows exactly the documented edges", () => {
    const edges = JOB_STATUSES.flatMap((from) =>
      JOB_STATUSES.filter((to) => canTransition(from, to)).map((to) => `${from}->${to}`)
    );

    expect(edges).toEqual([
      "planned->enqueued",
      "planned->cancelled",
      "enqueued->running",
      "enqueued->cancelled",
      "running->succeeded",
      "running->failed",
      "failed->running",
      "failed->dead_letter",
    ]);
  });

  it("marks succeeded, dead_letter and cancelled as terminal", () => {
    expect(JOB_STATUSES.filter(isTerminalStatus)).toEqual([
      "succeeded",
      "dead_letter",
      "cancelled",
    ]);
    expect(ALLOWED_TRANSITIONS.succeeded).toEqual([]);
  });
});

describe("JobStateMachine", () => {
  let ctx: TestContext;

  beforeEach(async () => {
    ctx = await TestSetupBuilder.create()
      .withContentItem("notice", "Office closed today")
      .withSchedule("notice-once", {
        kind: "one_shot",
        spec: "2024-06-01T12:00:00Z",
        contentItem: "notice",
      })
      .build();
  });

  afterEach(async () => {
    await ctx.cleanup();
  });

  const plannedJob = (): Promise<Job> => {
    const schedule = ctx.schedules.get("notice-once");
    if (!schedule) throw new Error("fixture missing");
    return ctx.db.transaction((tx) =>
      ctx.jobStore.insertPlanned(
        tx,
        {
          scheduleId: schedule.id,
          plannedAt: new Date("2024-06-01T12:00:00Z"),
          variantId: null,
          selectionPolicy: null,
          selectionSeed: null,
        },
        ctx.clock.now(),
      )
    );
  };

  it("walks a job through a successful run", async () => {
    const job = await plannedJob();

    ctx.clock.set(new Date("2024-06-01T12:00:00Z"));
    const enqueued = await ctx.stateMachine.transition(job.id, "enqueued");
    ctx.clock.advance(2_000);
    const running = await ctx.stateMachine.claim(job.id, "worker-1");
    ctx.clock.advance(3_000);
    const succeeded = await ctx.stateMachine.transition(job.id, "succeeded");

    expect(enqueued.enqueuedAt?.toISOString()).toBe("2024-06-01T12:00:00.000Z");
    expect(enqueued.availableAt?.toISOString()).toBe("2024-06-01T12:00:00.000Z");
    expect(running.attempt).toBe(1);
    expect(running.startedAt?.toISOString()).toBe("2024-06-01T12:00:02.000Z");
    expect(running.processInstanceId).toBe("worker-1");
    expect(succeeded.status).toBe("succeeded");
    expect(succeeded.finishedAt?.toISOString()).toBe("2024-06-01T12:00:05.000Z");
    expect(succeeded.lastError).toBeNull();
  });

  it("increments the attempt on every run and clears finishedAt", async () => {
    const job = await plannedJob();
    await ctx.stateMachine.transition(job.id, "enqueued");
    await ctx.stateMachine.claim(job.id, "worker-1");
    const failed = await ctx.stateMachine.transition(job.id, "failed", {
      lastError: "TransientPublishError: busy",
    });

    const retried = await ctx.stateMachine.claim(job.id, "worker-2");

    expect(failed.finishedAt).not.toBeNull();
    expect(retried.attempt).toBe(2);
    expect(retried.finishedAt).toBeNull();
    expect(retried.processInstanceId).toBe("worker-2");
    expect(retried.lastError).toBe("TransientPublishError: busy");
  });

  it("rejects an edge that is not in the table and leaves the job alone", async () => {
    const job = await plannedJob();

    const error = await ctx.stateMachine
      .transition(job.id, "succeeded")
      .catch((e: unknown) => e);

    expect(error).toBeInstanceOf(InvalidTransitionError);
    expect(error instanceof InvalidTransitionError && [error.from, error.to]).toEqual([
      "planned",
      "succeeded",
    ]);
    expect((await ctx.jobStore.getByIdOrThrow(job.id)).status).toBe("planned");
  });

  it("never leaves a terminal status", async () => {
    const job = await plannedJob();
    await ctx.stateMachine.cancel(job.id);

    for (const target of JOB_STATUSES) {
      await expect(ctx.stateMachine.transition(job.id, target)).rejects.toBeInstanceOf(
        InvalidTransitionError,
      );
    }
  });

  it("throws JobNotFoundError for unknown jobs", async () => {
    await expect(ctx.stateMachine.transition(404, "enqueued")).rejects.toBeInstanceOf(
      JobNotFoundError,
    );
    await expect(ctx.stateMachine.claim(404, "worker-1")).rejects.toBeInstanceOf(
      JobNotFoundError,
    );
  });

  it("rolls the transition back with the surrounding transaction", async () => {
    const job = await plannedJob();

    await expect(
      ctx.db.transaction(async (tx) => {
        await ctx.stateMachine.transitionInTransaction(tx, job.id, "enqueued");
        throw new Error("later write failed");
      }),
    ).rejects.toThrow("later write failed");

    expect((await ctx.jobStore.getByIdOrThrow(job.id)).status).toBe("planned");
  });

  // =====================
  // Claiming
  // =====================

  it("lets only one of two concurrent claims win", async () => {
    const job = await plannedJob();
    await ctx.stateMachine.transition(job.id, "enqueued");

    const results = await Promise.allSettled([
      ctx.stateMachine.claim(job.id, "worker-1"),
      ctx.stateMachine.claim(job.id, "worker-2"),
    ]);

    const fulfilled = results.filter((r) => r.status === "fulfilled");
    const rejected = results.filter(
      (r): r is PromiseRejectedResult => r.status === "rejected",
    );
    expect(fulfilled).toHaveLength(1);
    expect(rejected).toHaveLength(1);
    expect(rejected[0].reason).toBeInstanceOf(JobAlreadyClaimedError);
    expect((await ctx.jobStore.getByIdOrThrow(job.id)).attempt).toBe(1);
  });

  it("refuses to claim a planned job", async () => {
    const job = await plannedJob();

    await expect(ctx.stateMachine.claim(job.id, "worker-1")).rejects.toBeInstanceOf(
      JobAlreadyClaimedError,
    );
  });

  // =====================
  // Cancelling
  // =====================

  it("cancels planned and enqueued jobs with a reason", async () => {
    const job = await plannedJob();
    await ctx.stateMachine.transition(job.id, "enqueued");

    const cancelled = await ctx.stateMachine.cancel(job.id, "campaign withdrawn");

    expect(cancelled.status).toBe("cancelled");
    expect(cancelled.lastError).toBe("campaign withdrawn");
    expect(cancelled.finishedAt).not.toBeNull();
  });

  it("refuses to cancel a running job", async () => {
    const job = await plannedJob();
    await ctx.stateMachine.transition(job.id, "enqueued");
    await ctx.stateMachine.claim(job.id, "worker-1");

    await expect(ctx.stateMachine.cancel(job.id)).rejects.toBeInstanceOf(
      JobNotCancellableError,
    );
  });
});
