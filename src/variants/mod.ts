/**
 * Variant Module
 *
 * Content for schedules and the deterministic choice between variants:
 * - Templates, variants and fixed content items in SQLite
 * - Seeded selection policies (uniform, weighted, round-robin, no-repeat)
 * - Content eligibility and advisory near-duplicate checks
 */

export { VariantSelector } from "./variant_selector.ts";
export type { VariantSelectorOptions } from "./variant_selector.ts";
export { bigramSimilarity, ContentValidator } from "./content_validator.ts";
export type {
  ContentValidatorOptions,
  NearDuplicate,
  RejectedVariant,
} from "./content_validator.ts";
export { ContentStore } from "./content_store.ts";
export type { ContentStoreOptions, NewVariant } from "./content_store.ts";
export { SelectionHistoryStore } from "./selection_history_store.ts";
export type {
  RecentSelectionQuery,
  SelectionHistoryEntry,
} from "./selection_history_store.ts";
export { assertSelectionSeed, generateSelectionSeed, isSelectionSeed } from "./seed.ts";
export { SeededRandom } from "./rng.ts";

export {
  ContentNotFoundError,
  InvalidSelectionPolicyError,
  InvalidSelectionSeedError,
  VariantSelectionError,
} from "./errors.ts";

export {
  formatSelectionPolicy,
  isNoRepeatScope,
  parseSelectionPolicy,
} from "./types.ts";
export type {
  ContentItem,
  NoRepeatScope,
  RandomPolicyKind,
  SelectionOutcome,
  SelectionPolicy,
  SelectionRequest,
  Variant,
} from "./types.ts";
