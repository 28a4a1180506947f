import type { SqlExecutor } from "../database/types.ts";
import type { RecurrenceResolver } from "../recurrence/recurrence_resolver.ts";
import { logger } from "../utils/logger.ts";
import type { ContentStore } from "../variants/content_store.ts";
import type { ContentValidator } from "../variants/content_validator.ts";
import type { SelectionHistoryStore } from "../variants/selection_history_store.ts";
import type { SelectionOutcome } from "../variants/types.ts";
import type { VariantSelector } from "../variants/variant_selector.ts";
import { InvalidScheduleConfigError } from "./errors.ts";
import type { ScheduleStore } from "./schedule_store.ts";
import type { Schedule } from "./types.ts";

export interface SelectionServiceOptions {
  scheduleStore: ScheduleStore;
  contentStore: ContentStore;
  historyStore: SelectionHistoryStore;
  selector: VariantSelector;
  validator: ContentValidator;
  resolver: RecurrenceResolver;
  /** Published texts compared against for near-duplicates (default: 20) */
  duplicateLookback?: number;
}

/**
 * A previewed pick for one upcoming occurrence.
 */
export interface PreviewEntry {
  plannedAt: Date;
  /** Null when no variant is eligible */
  outcome: SelectionOutcome | null;
}

/**
 * Loads what the selector needs for a schedule and runs it.
 *
 * Used by the scheduler when creating a job and by previews, which run the
 * same selection without writing anything.
 */
export class SelectionService {
  private readonly scheduleStore: ScheduleStore;
  private readonly contentStore: ContentStore;
  private readonly historyStore: SelectionHistoryStore;
  private readonly selector: VariantSelector;
  private readonly validator: ContentValidator;
  private readonly resolver: RecurrenceResolver;
  private readonly duplicateLookback: number;

  constructor(options: SelectionServiceOptions) {
    this.scheduleStore = options.scheduleStore;
    this.contentStore = options.contentStore;
    this.historyStore = options.historyStore;
    this.selector = options.selector;
    this.validator = options.validator;
    this.resolver = options.resolver;
    this.duplicateLookback = options.duplicateLookback ?? 20;
  }

  /**
   * Selects the variant for one occurrence of a template-based schedule.
   *
   * @returns The outcome, or null when the template has no eligible variant
   * @throws InvalidScheduleConfigError if the schedule has no template
   */
  async selectForOccurrence(
    schedule: Schedule,
    plannedAt: Date,
    executor?: SqlExecutor,
  ): Promise<SelectionOutcome | null> {
    const templateId = requireTemplate(schedule);
    const variants = await this.contentStore.getActiveVariants(templateId, executor);
    const recentVariantIds = await this.historyStore.recentVariantIds(
      {
        scope: schedule.noRepeatScope,
        scheduleId: schedule.id,
        templateId,
        before: plannedAt,
        limit: schedule.noRepeatWindow,
      },
      executor,
    );

    const outcome = this.selector.select({
      scheduleId: schedule.id,
      plannedAt,
      policy: schedule.selectionPolicy,
      variants,
      noRepeatWindow: schedule.noRepeatWindow,
      recentVariantIds,
      roundRobinCursor: schedule.roundRobinCursor,
    });

    if (outcome) {
      await this.warnOnNearDuplicate(schedule.id, outcome, executor);
    }
    return outcome;
  }

  /**
   * The variant the scheduler would pick for `plannedAt`, given the current
   * history and cursor. Writes nothing.
   *
   * @throws ScheduleNotFoundError if the schedule does not exist
   * @throws InvalidScheduleConfigError if the schedule has no template
   */
  async previewSelection(
    scheduleId: number,
    plannedAt: Date,
  ): Promise<SelectionOutcome | null> {
    const schedule = await this.scheduleStore.getByIdOrThrow(scheduleId);
    return await this.selectForOccurrence(schedule, plannedAt);
  }

  /**
   * Previews the next `count` occurrences after `after`, carrying the
   * round-robin cursor and no-repeat history forward from one pick to the next.
   *
   * @throws ScheduleNotFoundError if the schedule does not exist
   * @throws InvalidScheduleConfigError if the schedule has no template
   */
  async previewUpcoming(
    scheduleId: number,
    after: Date,
    count: number,
  ): Promise<PreviewEntry[]> {
    const schedule = await this.scheduleStore.getByIdOrThrow(scheduleId);
    const templateId = requireTemplate(schedule);
    const occurrences = this.resolver.upcoming(schedule, after, count);
    if (occurrences.length === 0) {
      return [];
    }

    const variants = await this.contentStore.getActiveVariants(templateId);
    const recent = await this.historyStore.recentVariantIds({
      scope: schedule.noRepeatScope,
      scheduleId: schedule.id,
      templateId,
      before: occurrences[0],
      limit: schedule.noRepeatWindow,
    });

    let cursor = schedule.roundRobinCursor;
    const entries: PreviewEntry[] = [];
    for (const plannedAt of occurrences) {
      const outcome = this.selector.select({
        scheduleId: schedule.id,
        plannedAt,
        policy: schedule.selectionPolicy,
        variants,
        noRepeatWindow: schedule.noRepeatWindow,
        recentVariantIds: recent,
        roundRobinCursor: cursor,
      });
      if (outcome) {
        cursor = outcome.roundRobinCursor;
        recent.unshift(outcome.variant.id);
      }
      entries.push({ plannedAt, outcome });
    }
    return entries;
  }

  private async warnOnNearDuplicate(
    scheduleId: number,
    outcome: SelectionOutcome,
    executor?: SqlExecutor,
  ): Promise<void> {
    let recentTexts: string[];
    try {
      recentTexts = await this.historyStore.recentPublishedTexts(
        this.duplicateLookback,
        executor,
      );
    } catch (error) {
      logger.warn(
        `[SelectionService] Near-duplicate check skipped for schedule ${scheduleId}:`,
        error,
      );
      return;
    }

    const duplicate = this.validator.findNearDuplicate(outcome.variant.text, recentTexts);
    if (duplicate) {
      logger.warn(
        `[SelectionService] Variant ${outcome.variant.id} for schedule ${scheduleId} ` +
          `closely matches a recent post (similarity ${duplicate.similarity.toFixed(2)})`,
      );
    }
  }
}

function requireTemplate(schedule: Schedule): number {
  if (schedule.templateId === null) {
    throw new InvalidScheduleConfigError(
      `Schedule ${schedule.id} publishes fixed content and has no variants to select`,
    );
  }
  return schedule.templateId;
}
