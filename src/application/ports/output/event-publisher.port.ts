import type { DomainEvent } from '../../../domain/events/base.event';

/**
 * Event Publisher Port (Driven Port)
 * Lifecycle notifications for a job. Callers treat publishing as best-effort:
 * a failed publish is logged and never changes the outcome of the job.
 */
export interface EventPublisherPort {
  publish(event: DomainEvent): Promise<void>;
}
