import { DomainEvent } from './base.event';

/**
 * Emitted when ingestion has stored the content and enqueued the work message
 */
export interface JobQueuedEventPayload {
  jobId: string;
  sourceName: string;
  contentRef: string;
  sizeBytes: number;
}

export class JobQueuedEvent extends DomainEvent<JobQueuedEventPayload> {
  readonly eventName = 'job.queued';

  constructor(payload: JobQueuedEventPayload) {
    super(payload);
  }
}
