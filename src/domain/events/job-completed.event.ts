import { DomainEvent } from './base.event';

export interface JobCompletedEventPayload {
  jobId: string;
  resultRef: string;
  attempt: number;
  durationMs: number;
}

export class JobCompletedEvent extends DomainEvent<JobCompletedEventPayload> {
  readonly eventName = 'job.completed';

  constructor(payload: JobCompletedEventPayload) {
    super(payload);
  }
}
