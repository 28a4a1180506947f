import { describe, expect, it } from "vitest";
import { DryRunPublisher } from "./dry_run_publisher.ts";
import {
  classifyPublishError,
  PermanentPublishError,
  PublishTimeoutError,
  TransientPublishError,
} from "./errors.ts";

describe("classifyPublishError", () => {
  it("treats permanent errors as permanent", () => {
    expect(classifyPublishError(new PermanentPublishError("bad request", 400))).toBe(
      "permanent",
    );
  });

  it("treats transient, timeout and unknown errors as transient", () => {
    expect(classifyPublishError(new TransientPublishError("rate limited", 429))).toBe(
      "transient",
    );
    expect(classifyPublishError(new PublishTimeoutError(100))).toBe("transient");
    expect(classifyPublishError(new Error("socket hang up"))).toBe("transient");
    expect(classifyPublishError("weird")).toBe("transient");
  });

  it("keeps identifying fields on the error", () => {
    const error = new PublishTimeoutError(2500);
    expect(error.name).toBe("PublishTimeoutError");
    expect(error.timeoutMs).toBe(2500);
    expect(error.message).toBe("Publish did not complete within 2500ms");
    expect(error).toBeInstanceOf(TransientPublishError);
  });
});

describe("DryRunPublisher", () => {
  it("returns the same id for the same idempotency key", async () => {
    const publisher = new DryRunPublisher();
    const content = { text: "hello", mediaRefs: [], idempotencyKey: "job-1" };

    const first = await publisher.publish(content, new AbortController().signal);
    const second = await publisher.publish(content, new AbortController().signal);

    expect(first.externalId).toMatch(/^dry-run-[0-9a-f]{12}$/);
    expect(second.externalId).toBe(first.externalId);
    expect(publisher.getPublished()).toHaveLength(2);
  });

  it("refuses to publish once aborted", async () => {
    const publisher = new DryRunPublisher();
    const controller = new AbortController();
    controller.abort();

    await expect(
      publisher.publish(
        { text: "hello", mediaRefs: [], idempotencyKey: "job-2" },
        controller.signal,
      ),
    ).rejects.toThrow();
    expect(publisher.getPublished()).toHaveLength(0);
  });
});
