import { Injectable } from '@nestjs/common';
import type { EventPublisherPort } from '../../../application/ports/output/event-publisher.port';
import { DomainEvent } from '../../../domain/events/base.event';
import { PinoLoggerService } from '../../../shared/logging/pino-logger.service';

/**
 * Log Event Publisher Adapter
 * Writes domain events to the structured log, one line per event.
 */
@Injectable()
export class LogEventPublisherAdapter implements EventPublisherPort {
  private readonly logger: PinoLoggerService;

  constructor(logger: PinoLoggerService) {
    this.logger = logger.forContext(LogEventPublisherAdapter.name);
  }

  async publish(event: DomainEvent): Promise<void> {
    this.logger.forJob(event.jobId).info({ event: event.toJSON() }, `[EVENT] ${event.eventName}`);
  }
}
