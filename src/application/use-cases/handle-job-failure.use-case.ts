import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { AppConfig } from '../../config/configuration';
import type {
  HandleJobFailureCommand,
  HandleJobFailurePort,
  HandleJobFailureResult,
} from '../ports/input/handle-job-failure.port';
import type { JobRecordRepositoryPort } from '../ports/output/job-record-repository.port';
import type { JobQueuePort, LeasedMessage, PoisonRecord } from '../ports/output/job-queue.port';
import type { EventPublisherPort } from '../ports/output/event-publisher.port';
import {
  EVENT_PUBLISHER_PORT,
  JOB_QUEUE_PORT,
  JOB_RECORD_REPOSITORY_PORT,
} from '../../infrastructure/injection-tokens';
import { JobStatus } from '../../domain/value-objects/job-status.vo';
import { DomainEvent } from '../../domain/events/base.event';
import { JobFailedEvent } from '../../domain/events/job-failed.event';
import { JobPoisonedEvent } from '../../domain/events/job-poisoned.event';
import {
  MaxRetriesExceededError,
  PipelineError,
  describeError,
} from '../../domain/errors/pipeline.errors';

function messageOf(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Handle Job Failure Use Case (failure policy / poison router)
 *
 * - Retryable error with `deliveryCount < maxRetries`: mark the job failed
 *   and abandon the lease so the broker redelivers it.
 * - Anything else: mark failed, publish a poison record, then complete the
 *   lease. A retryable error that ran out of attempts is reported as
 *   MAX_RETRIES_EXCEEDED.
 *
 * The lease is only completed once the poison record is published. Every
 * collaborator failure in here is logged and swallowed into the result; this
 * use case never throws.
 */
@Injectable()
export class HandleJobFailureUseCase implements HandleJobFailurePort {
  private readonly logger = new Logger(HandleJobFailureUseCase.name);

  constructor(
    @Inject(JOB_RECORD_REPOSITORY_PORT) private readonly jobRepository: JobRecordRepositoryPort,
    @Inject(JOB_QUEUE_PORT) private readonly jobQueue: JobQueuePort,
    @Inject(EVENT_PUBLISHER_PORT) private readonly eventPublisher: EventPublisherPort,
    private readonly configService: ConfigService<AppConfig>,
  ) {}

  async execute(command: HandleJobFailureCommand): Promise<HandleJobFailureResult> {
    const { lease, jobId, error } = command;
    const { maxRetries } = this.configService.getOrThrow('failurePolicy', { infer: true });

    if (error.retryable && lease.deliveryCount < maxRetries) {
      return this.retry(lease, jobId, error, maxRetries);
    }

    const terminalError = error.retryable
      ? new MaxRetriesExceededError(lease.deliveryCount, maxRetries, error)
      : error;
    return this.poison(lease, jobId, terminalError);
  }

  private async retry(
    lease: LeasedMessage,
    jobId: string | undefined,
    error: PipelineError,
    maxRetries: number,
  ): Promise<HandleJobFailureResult> {
    const errorDetail = describeError(error);
    this.logger.warn(
      `Attempt ${lease.deliveryCount + 1} of ${maxRetries + 1} failed for ${jobId ?? lease.messageId}: ${errorDetail}`,
    );

    await this.recordFailure(jobId, errorDetail);

    let leaseSettled = true;
    try {
      await this.jobQueue.abandon(lease);
    } catch (abandonError) {
      leaseSettled = false;
      this.logger.error(
        `Could not abandon message ${lease.messageId}, leaving it to lease expiry: ${messageOf(abandonError)}`,
      );
    }

    if (jobId) {
      await this.publish(
        new JobFailedEvent({
          jobId,
          errorCode: error.code,
          errorDetail,
          deliveryCount: lease.deliveryCount,
          maxRetries,
        }),
      );
    }

    return { outcome: 'retried', errorDetail, leaseSettled };
  }

  private async poison(
    lease: LeasedMessage,
    jobId: string | undefined,
    error: PipelineError,
  ): Promise<HandleJobFailureResult> {
    const errorDetail = describeError(error);
    this.logger.error(`Routing message ${lease.messageId} to poison queue: ${errorDetail}`);

    await this.recordFailure(jobId, errorDetail);

    const record: PoisonRecord = {
      originalMessageId: lease.messageId,
      originalBody: lease.body,
      jobId,
      errorCode: error.code,
      errorDetail,
      deliveryCount: lease.deliveryCount,
      failedAt: new Date().toISOString(),
    };

    try {
      await this.jobQueue.publishPoison(record);
    } catch (publishError) {
      // Without a diagnostic record the message must stay on the queue
      this.logger.error(
        `Poison publish failed for ${lease.messageId}, leaving it to lease expiry: ${messageOf(publishError)}`,
      );
      return { outcome: 'retried', errorDetail, leaseSettled: false };
    }

    let leaseSettled = true;
    try {
      await this.jobQueue.complete(lease);
    } catch (completeError) {
      leaseSettled = false;
      this.logger.error(
        `Could not complete poisoned message ${lease.messageId}: ${messageOf(completeError)}`,
      );
    }

    await this.publish(
      new JobPoisonedEvent({
        jobId: jobId ?? '',
        originalMessageId: lease.messageId,
        errorCode: error.code,
        errorDetail,
        deliveryCount: lease.deliveryCount,
      }),
    );

    return { outcome: 'poisoned', errorDetail, leaseSettled };
  }

  private async recordFailure(jobId: string | undefined, errorDetail: string): Promise<void> {
    if (!jobId) return;

    try {
      await this.jobRepository.mergeUpdate(jobId, { status: JobStatus.FAILED, errorDetail });
    } catch (error) {
      this.logger.warn(`Could not write failed status for ${jobId}: ${messageOf(error)}`);
    }
  }

  private async publish(event: DomainEvent): Promise<void> {
    try {
      await this.eventPublisher.publish(event);
    } catch (error) {
      this.logger.warn(`Failed to publish ${event.eventName}: ${messageOf(error)}`);
    }
  }
}
