/**
 * What gets sent to the external service for one job.
 */
export interface PublishContent {
  text: string;
  mediaRefs: string[];
  /** Stable per job; publishers that support it pass it upstream */
  idempotencyKey: string;
}

export interface PublishResult {
  /** Identifier the external service assigned to the post */
  externalId: string;
}

/**
 * Port to the external publishing service.
 *
 * Implementations throw TransientPublishError or PermanentPublishError.
 * Anything else is treated as transient. The signal aborts when the
 * worker's publish timeout elapses.
 */
export interface Publisher {
  readonly name: string;
  publish(content: PublishContent, signal: AbortSignal): Promise<PublishResult>;
}
