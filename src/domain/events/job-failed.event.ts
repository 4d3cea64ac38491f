import { DomainEvent } from './base.event';

/**
 * An attempt failed and the message went back for redelivery.
 * Terminal failures are `JobPoisonedEvent` instead.
 */
export interface JobFailedEventPayload {
  jobId: string;
  errorCode: string;
  errorDetail: string;
  deliveryCount: number;
  maxRetries: number;
}

export class JobFailedEvent extends DomainEvent<JobFailedEventPayload> {
  readonly eventName = 'job.failed';

  constructor(payload: JobFailedEventPayload) {
    super(payload);
  }
}
