import { ValidationError } from "../validation/errors.ts";

/**
 * Base error class for variant-selection errors.
 */
export class VariantSelectionError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "VariantSelectionError";
  }
}

/**
 * Thrown when a caller-supplied selection seed is not 16 lowercase hex characters.
 */
export class InvalidSelectionSeedError extends ValidationError {
  public readonly seed: string;

  constructor(seed: string) {
    super(`Selection seed '${seed}' must be 16 lowercase hex characters`);
    this.name = "InvalidSelectionSeedError";
    this.seed = seed;
  }
}

/**
 * Thrown when a stored selection policy string is not recognised.
 */
export class InvalidSelectionPolicyError extends ValidationError {
  public readonly policy: string;

  constructor(policy: string) {
    super(`Unknown selection policy '${policy}'`);
    this.name = "InvalidSelectionPolicyError";
    this.policy = policy;
  }
}

/**
 * Thrown when a template or content item referenced by a schedule does not exist.
 */
export class ContentNotFoundError extends VariantSelectionError {
  public readonly contentType: "template" | "variant" | "content_item";
  public readonly contentId: number;

  constructor(contentType: "template" | "variant" | "content_item", contentId: number) {
    super(`${contentType} ${contentId} not found`);
    this.name = "ContentNotFoundError";
    this.contentType = contentType;
    this.contentId = contentId;
  }
}
