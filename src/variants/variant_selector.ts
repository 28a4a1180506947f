import { logger } from "../utils/logger.ts";
import { ContentValidator } from "./content_validator.ts";
import { SeededRandom } from "./rng.ts";
import { assertSelectionSeed, generateSelectionSeed } from "./seed.ts";
import type {
  RandomPolicyKind,
  SelectionOutcome,
  SelectionRequest,
  Variant,
} from "./types.ts";

/**
 * Options for configuring the VariantSelector.
 */
export interface VariantSelectorOptions {
  /** Eligibility rules; defaults to a validator with a 280-character bound */
  validator?: ContentValidator;
}

/**
 * Picks the variant for one occurrence of a template-based schedule.
 *
 * Selection is a pure function of the request: the seed is derived from the
 * schedule id and occurrence time (unless supplied), every draw uses a fresh
 * PRNG seeded from it, and pools are ordered by variant id before drawing.
 * Re-running with the same request returns the same variant.
 *
 * Pipeline:
 * 1. drop inactive variants and those failing content validation
 * 2. apply the no-repeat window when configured (falls back to the full pool
 *    if it would remove everything)
 * 3. draw according to the policy
 *
 * @example
 * ```typescript
 * const selector = new VariantSelector({ validator: new ContentValidator({ maxLength: 280 }) });
 *
 * const outcome = selector.select({
 *   scheduleId: 3,
 *   plannedAt: new Date("2024-03-10T14:00:00Z"),
 *   policy: { kind: "weighted_random" },
 *   variants,
 *   noRepeatWindow: 0,
 *   recentVariantIds: [],
 *   roundRobinCursor: null,
 * });
 * // outcome?.variant, outcome?.seed
 * ```
 */
export class VariantSelector {
  private readonly validator: ContentValidator;

  constructor(options: VariantSelectorOptions = {}) {
    this.validator = options.validator ?? new ContentValidator();
  }

  /**
   * Selects a variant, or returns null when no variant is eligible.
   *
   * @throws InvalidSelectionSeedError if `request.seed` is malformed
   */
  select(request: SelectionRequest): SelectionOutcome | null {
    const seed = request.seed === undefined
      ? generateSelectionSeed(request.scheduleId, request.plannedAt)
      : assertSelectionSeed(request.seed);

    const { eligible, rejected } = this.validator.partition(
      request.variants.filter((variant) => variant.active),
    );
    for (const { variant, reason } of rejected) {
      logger.debug(
        `[VariantSelector] Variant ${variant.id} not eligible for schedule ${request.scheduleId}: ${reason}`,
      );
    }

    if (eligible.length === 0) {
      return null;
    }

    const { pool, fellBack } = this.applyNoRepeatWindow(
      sortById(eligible),
      request,
    );
    const rng = new SeededRandom(seed);
    const policy = request.policy;

    switch (policy.kind) {
      case "round_robin": {
        const last = request.roundRobinCursor === null
          ? -1
          : Math.min(Math.max(request.roundRobinCursor, -1), pool.length - 1);
        const next = (last + 1) % pool.length;
        return {
          variant: pool[next],
          seed,
          roundRobinCursor: next,
          poolSize: pool.length,
          noRepeatFallback: fellBack,
        };
      }
      case "uniform_random":
      case "weighted_random":
        return this.draw(policy.kind, pool, rng, seed, request, fellBack);
      case "no_repeat_window":
        return this.draw(policy.then, pool, rng, seed, request, fellBack);
    }
  }

  private draw(
    kind: RandomPolicyKind,
    pool: Variant[],
    rng: SeededRandom,
    seed: string,
    request: SelectionRequest,
    fellBack: boolean,
  ): SelectionOutcome {
    const variant = kind === "weighted_random"
      ? pickWeighted(pool, rng)
      : pool[rng.nextInt(pool.length)];
    return {
      variant,
      seed,
      roundRobinCursor: request.roundRobinCursor,
      poolSize: pool.length,
      noRepeatFallback: fellBack,
    };
  }

  private applyNoRepeatWindow(
    eligible: Variant[],
    request: SelectionRequest,
  ): { pool: Variant[]; fellBack: boolean } {
    if (request.noRepeatWindow <= 0) {
      return { pool: eligible, fellBack: false };
    }

    const excluded = new Set(
      request.recentVariantIds.slice(0, request.noRepeatWindow),
    );
    const filtered = eligible.filter((variant) => !excluded.has(variant.id));
    if (filtered.length > 0) {
      return { pool: filtered, fellBack: false };
    }

    logger.warn(
      `[VariantSelector] No-repeat window of ${request.noRepeatWindow} excludes every variant for schedule ${request.scheduleId}; using the full pool`,
    );
    return { pool: eligible, fellBack: true };
  }
}

/**
 * Cumulative-weight draw. A pool whose weights sum to zero or less is drawn
 * uniformly instead.
 */
function pickWeighted(pool: Variant[], rng: SeededRandom): Variant {
  const weights = pool.map((variant) =>
    Number.isFinite(variant.weight) && variant.weight > 0 ? variant.weight : 0
  );
  const total = weights.reduce((sum, weight) => sum + weight, 0);
  if (total <= 0) {
    return pool[rng.nextInt(pool.length)];
  }

  const target = rng.next() * total;
  let cumulative = 0;
  for (let i = 0; i < pool.length; i++) {
    cumulative += weights[i];
    if (target < cumulative) {
      return pool[i];
    }
  }
  // Floating-point residue: fall back to the last weighted entry
  let lastWeighted = pool.length - 1;
  while (lastWeighted > 0 && weights[lastWeighted] === 0) lastWeighted--;
  return pool[lastWeighted];
}

function sortById(variants: Variant[]): Variant[] {
  return [...variants].sort((a, b) => a.id - b.id);
}
