/**
 * Base error class for failures reported by a publisher.
 */
export class PublishError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "PublishError";
  }
}

/**
 * A failure worth retrying: rate limits, upstream 5xx, network trouble.
 */
export class TransientPublishError extends PublishError {
  /** Upstream status code, when the failure came from an HTTP response */
  public readonly statusCode: number | null;

  constructor(message: string, statusCode: number | null = null) {
    super(message);
    this.name = "TransientPublishError";
    this.statusCode = statusCode;
  }
}

/**
 * The publisher did not answer within the configured timeout.
 */
export class PublishTimeoutError extends TransientPublishError {
  public readonly timeoutMs: number;

  constructor(timeoutMs: number) {
    super(`Publish did not complete within ${timeoutMs}ms`);
    this.name = "PublishTimeoutError";
    this.timeoutMs = timeoutMs;
  }
}

/**
 * A failure that retrying will not fix: bad request, auth, rejected content,
 * missing content.
 */
export class PermanentPublishError extends PublishError {
  public readonly statusCode: number | null;

  constructor(message: string, statusCode: number | null = null) {
    super(message);
    this.name = "PermanentPublishError";
    this.statusCode = statusCode;
  }
}

export type PublishErrorClass = "transient" | "permanent";

/**
 * Classifies anything a publisher threw. Unknown errors are transient.
 */
export function classifyPublishError(error: unknown): PublishErrorClass {
  return error instanceof PermanentPublishError ? "permanent" : "transient";
}
