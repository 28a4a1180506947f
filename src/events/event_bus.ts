import { logger } from "../utils/logger.ts";
import type {
  Event,
  EventPayloads,
  EventSubscriber,
  EventType,
} from "./event_types.ts";

type SubscriberSets = { [K in EventType]?: Set<EventSubscriber<K>> };

/**
 * In-process pub/sub between the scheduler tick and the publish worker.
 *
 * Delivery is synchronous up to the first await of each subscriber; a failing
 * subscriber is logged and never affects the publisher or its siblings.
 *
 * @example
 * ```typescript
 * const eventBus = new EventBus();
 * const off = eventBus.subscribe(EventType.JOB_ENQUEUED, (event) => {
 *   worker.wake(event.payload.jobId);
 * });
 * eventBus.publish(EventType.JOB_ENQUEUED, { jobId: 12, scheduleId: 3 });
 * off();
 * ```
 */
export class EventBus {
  private subscribers: SubscriberSets = {};

  /** @returns A function that removes this subscriber */
  subscribe<T extends EventType>(
    type: T,
    subscriber: EventSubscriber<T>,
  ): () => void {
    const set: Set<EventSubscriber<T>> = this.subscribers[type] ?? new Set();
    set.add(subscriber);
    this.subscribers[type] = set;

    return () => {
      set.delete(subscriber);
    };
  }

  /**
   * Deliver an event to the current subscribers of its type.
   *
   * @returns How many subscribers were notified
   */
  publish<T extends EventType>(type: T, payload: EventPayloads[T]): number {
    const set: Set<EventSubscriber<T>> | undefined = this.subscribers[type];
    if (!set || set.size === 0) {
      return 0;
    }

    const event: Event<T> = { type, payload, timestamp: new Date() };
    const snapshot = Array.from(set);
    for (const subscriber of snapshot) {
      this.deliver(subscriber, event);
    }
    return snapshot.length;
  }

  getSubscriberCount(type: EventType): number {
    return this.subscribers[type]?.size ?? 0;
  }

  clear(): void {
    this.subscribers = {};
  }

  private deliver<T extends EventType>(
    subscriber: EventSubscriber<T>,
    event: Event<T>,
  ): void {
    const report = (error: unknown) => {
      logger.error(`[EventBus] Subscriber for '${event.type}' failed:`, error);
    };

    try {
      const result = subscriber(event);
      if (result instanceof Promise) {
        result.catch(report);
      }
    } catch (error) {
      report(error);
    }
  }
}
