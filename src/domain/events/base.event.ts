import { v4 as uuidv4 } from 'uuid';

export type JobEventName = 'job.queued' | 'job.completed' | 'job.failed' | 'job.poisoned';

export interface JobEventPayload {
  jobId: string;
}

/**
 * Base Domain Event
 * Every event concerns one job; subclasses only name themselves and type the payload.
 */
export abstract class DomainEvent<TPayload extends JobEventPayload = JobEventPayload> {
  readonly eventId: string = uuidv4();
  readonly occurredAt: Date = new Date();

  abstract readonly eventName: JobEventName;

  protected constructor(readonly payload: TPayload) {}

  get jobId(): string {
    return this.payload.jobId;
  }

  toJSON(): Record<string, unknown> {
    return {
      eventId: this.eventId,
      eventName: this.eventName,
      jobId: this.jobId,
      occurredAt: this.occurredAt.toISOString(),
      payload: this.payload,
    };
  }
}
