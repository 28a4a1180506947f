import { createHash } from "node:crypto";
import { logger } from "../utils/logger.ts";
import type { Publisher, PublishContent, PublishResult } from "./types.ts";

/**
 * Publisher that logs instead of posting and returns a synthetic id derived
 * from the idempotency key, so repeated calls for one job agree.
 */
export class DryRunPublisher implements Publisher {
  readonly name = "dry-run";

  private readonly published: PublishContent[] = [];

  async publish(content: PublishContent, signal: AbortSignal): Promise<PublishResult> {
    signal.throwIfAborted();
    await Promise.resolve();

    this.published.push(content);
    const externalId = `dry-run-${
      createHash("sha256").update(content.idempotencyKey).digest("hex").slice(0, 12)
    }`;

    logger.info(
      `[DryRunPublisher] Would publish ${content.idempotencyKey} as ${externalId}: ` +
        `${content.text.slice(0, 50)}${content.text.length > 50 ? "..." : ""}`,
    );
    return { externalId };
  }

  /**
   * Everything this publisher was asked to publish, oldest first.
   */
  getPublished(): readonly PublishContent[] {
    return this.published;
  }
}
