import { InvalidSelectionPolicyError } from "./errors.ts";

/**
 * A candidate text belonging to a template.
 */
export interface Variant {
  id: number;
  templateId: number;
  text: string;
  /** Relative weight for weighted selection; 0 never wins a weighted draw */
  weight: number;
  active: boolean;
  /** Display order within the template */
  position: number;
}

/**
 * Fixed content published verbatim by schedules that don't use a template.
 */
export interface ContentItem {
  id: number;
  text: string;
  mediaRefs: string[];
}

/**
 * Random policies the no-repeat window can delegate to.
 */
export type RandomPolicyKind = "uniform_random" | "weighted_random";

/**
 * How a variant is chosen for an occurrence.
 *
 * Parsed once from the stored string when a schedule row is read, so selection
 * code switches over a closed set.
 */
export type SelectionPolicy =
  | { kind: "uniform_random" }
  | { kind: "weighted_random" }
  | { kind: "round_robin" }
  | { kind: "no_repeat_window"; then: RandomPolicyKind };

/**
 * Where the no-repeat window looks for recent selections.
 * - schedule: only this schedule's history
 * - template: every schedule using the same template
 */
export type NoRepeatScope = "schedule" | "template";

export function isNoRepeatScope(value: string): value is NoRepeatScope {
  return value === "schedule" || value === "template";
}

/**
 * Parses a stored policy string.
 *
 * Accepted forms: `uniform_random`, `weighted_random`, `round_robin`,
 * `no_repeat_window` (uniform draw) and `no_repeat_window:weighted_random`.
 *
 * @throws InvalidSelectionPolicyError for anything else
 */
export function parseSelectionPolicy(value: string): SelectionPolicy {
  switch (value) {
    case "uniform_random":
    case "weighted_random":
    case "round_robin":
      return { kind: value };
    case "no_repeat_window":
    case "no_repeat_window:uniform_random":
      return { kind: "no_repeat_window", then: "uniform_random" };
    case "no_repeat_window:weighted_random":
      return { kind: "no_repeat_window", then: "weighted_random" };
    default:
      throw new InvalidSelectionPolicyError(value);
  }
}

/**
 * Inverse of {@link parseSelectionPolicy}; the canonical stored form.
 */
export function formatSelectionPolicy(policy: SelectionPolicy): string {
  if (policy.kind === "no_repeat_window") {
    return policy.then === "uniform_random"
      ? "no_repeat_window"
      : `no_repeat_window:${policy.then}`;
  }
  return policy.kind;
}

/**
 * Everything the selector needs for one occurrence. History and the cursor are
 * loaded by the caller so selection itself stays pure.
 */
export interface SelectionRequest {
  scheduleId: number;
  plannedAt: Date;
  policy: SelectionPolicy;
  /** Active variants of the template, in any order */
  variants: readonly Variant[];
  /** Size of the no-repeat window; 0 disables it */
  noRepeatWindow: number;
  /** Variant ids of recent selections in scope, most recent first */
  recentVariantIds: readonly number[];
  /** Round-robin position of the last pick, null before the first */
  roundRobinCursor: number | null;
  /** Overrides the derived seed (previews and retries) */
  seed?: string;
}

/**
 * Result of a successful selection.
 */
export interface SelectionOutcome {
  variant: Variant;
  seed: string;
  /** Cursor to persist; unchanged for non round-robin policies */
  roundRobinCursor: number | null;
  /** Number of variants the final draw chose from */
  poolSize: number;
  /** True when the no-repeat filter removed every variant and was ignored */
  noRepeatFallback: boolean;
}
