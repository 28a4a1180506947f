import type { Variant } from "./types.ts";

/**
 * Options for configuring the ContentValidator.
 */
export interface ContentValidatorOptions {
  /** Maximum text length in characters (default: 280) */
  maxLength?: number;
  /** Similarity above which two texts count as near-duplicates (default: 0.9) */
  similarityThreshold?: number;
}

/**
 * Why a variant was left out of the selection pool.
 */
export interface RejectedVariant {
  variant: Variant;
  reason: string;
}

/**
 * A recently published text that a candidate closely matches.
 */
export interface NearDuplicate {
  text: string;
  similarity: number;
}

/**
 * Decides which variant texts may be published.
 *
 * Eligibility (non-empty, within the length bound) is enforced. Near-duplicate
 * detection is advisory: callers log it and carry on.
 */
export class ContentValidator {
  static readonly DEFAULT_CONFIG = {
    maxLength: 280,
    similarityThreshold: 0.9,
  } as const;

  private readonly maxLength: number;
  private readonly similarityThreshold: number;

  constructor(options: ContentValidatorOptions = {}) {
    this.maxLength = options.maxLength ?? ContentValidator.DEFAULT_CONFIG.maxLength;
    this.similarityThreshold = options.similarityThreshold ??
      ContentValidator.DEFAULT_CONFIG.similarityThreshold;
  }

  /**
   * Reason the text cannot be published, or null when it can.
   */
  checkText(text: string): string | null {
    if (text.trim().length === 0) {
      return "text is empty";
    }
    const length = [...text].length;
    if (length > this.maxLength) {
      return `text exceeds ${this.maxLength} characters: ${length}`;
    }
    return null;
  }

  /**
   * Splits variants into the eligible pool and the rejected ones.
   */
  partition(variants: readonly Variant[]): {
    eligible: Variant[];
    rejected: RejectedVariant[];
  } {
    const eligible: Variant[] = [];
    const rejected: RejectedVariant[] = [];
    for (const variant of variants) {
      const reason = this.checkText(variant.text);
      if (reason === null) {
        eligible.push(variant);
      } else {
        rejected.push({ variant, reason });
      }
    }
    return { eligible, rejected };
  }

  /**
   * First recent text that `text` duplicates exactly or closely, if any.
   */
  findNearDuplicate(text: string, recentTexts: readonly string[]): NearDuplicate | null {
    for (const recent of recentTexts) {
      if (recent === text) {
        return { text: recent, similarity: 1 };
      }
      const similarity = bigramSimilarity(text, recent);
      if (similarity > this.similarityThreshold) {
        return { text: recent, similarity };
      }
    }
    return null;
  }
}

/**
 * Sørensen–Dice coefficient over character bigrams, in [0, 1].
 *
 * @example
 * ```typescript
 * bigramSimilarity("night", "nacht"); // 0.25
 * ```
 */
export function bigramSimilarity(a: string, b: string): number {
  if (a === b) return 1;
  if (a.length < 2 || b.length < 2) return 0;

  const counts = new Map<string, number>();
  for (let i = 0; i < a.length - 1; i++) {
    const bigram = a.slice(i, i + 2);
    counts.set(bigram, (counts.get(bigram) ?? 0) + 1);
  }

  let overlap = 0;
  for (let i = 0; i < b.length - 1; i++) {
    const bigram = b.slice(i, i + 2);
    const remaining = counts.get(bigram) ?? 0;
    if (remaining > 0) {
      counts.set(bigram, remaining - 1);
      overlap++;
    }
  }

  return (2 * overlap) / (a.length - 1 + b.length - 1);
}
