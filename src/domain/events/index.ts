/**
 * Domain Events Barrel Export
 */
export { DomainEvent, type JobEventName, type JobEventPayload } from './base.event';
export { JobQueuedEvent, type JobQueuedEventPayload } from './job-queued.event';
export { JobCompletedEvent, type JobCompletedEventPayload } from './job-completed.event';
export { JobFailedEvent, type JobFailedEventPayload } from './job-failed.event';
export { JobPoisonedEvent, type JobPoisonedEventPayload } from './job-poisoned.event';
