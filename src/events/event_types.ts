/**
 * All event types in the application.
 */
export const EventType = {
  /** Fired after a scheduler tick commits a job into the enqueued state */
  JOB_ENQUEUED: "job.enqueued",
  /** Fired when a publish attempt ends (terminal or scheduled for retry) */
  JOB_FINISHED: "job.finished",
} as const;

export type EventType = (typeof EventType)[keyof typeof EventType];

/**
 * Payload types for each event.
 * Maps EventType to the data structure passed to subscribers.
 */
export interface EventPayloads {
  [EventType.JOB_ENQUEUED]: {
    jobId: number;
    scheduleId: number;
  };
  [EventType.JOB_FINISHED]: {
    jobId: number;
    scheduleId: number;
    status: "succeeded" | "failed" | "dead_letter";
  };
}

/** Generic event structure */
export interface Event<T extends EventType = EventType> {
  type: T;
  payload: EventPayloads[T];
  timestamp: Date;
}

/** Subscriber callback type */
export type EventSubscriber<T extends EventType> = (
  event: Event<T>,
) => void | Promise<void>;
