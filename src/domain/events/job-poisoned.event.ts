import { DomainEvent } from './base.event';

export interface JobPoisonedEventPayload {
  /** Empty when the message body could not be parsed. */
  jobId: string;
  originalMessageId: string;
  errorCode: string;
  errorDetail: string;
  deliveryCount: number;
}

export class JobPoisonedEvent extends DomainEvent<JobPoisonedEventPayload> {
  readonly eventName = 'job.poisoned';

  constructor(payload: JobPoisonedEventPayload) {
    super(payload);
  }
}
