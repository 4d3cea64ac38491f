import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { AppConfig } from '../../config/configuration';
import type { ProcessJobPort, ProcessJobResult } from '../ports/input/process-job.port';
import type { JobRecordRepositoryPort } from '../ports/output/job-record-repository.port';
import type { JobQueuePort, LeasedMessage, WorkMessage } from '../ports/output/job-queue.port';
import type { ContentStoragePort } from '../ports/output/content-storage.port';
import type { EnginePoolPort } from '../ports/output/engine-pool.port';
import type { EventPublisherPort } from '../ports/output/event-publisher.port';
import {
  CONTENT_STORAGE_PORT,
  ENGINE_POOL_PORT,
  EVENT_PUBLISHER_PORT,
  JOB_QUEUE_PORT,
  JOB_RECORD_REPOSITORY_PORT,
} from '../../infrastructure/injection-tokens';
import { parseWorkMessage } from '../dto/work-message.dto';
import { JobStatus } from '../../domain/value-objects/job-status.vo';
import { JobCompletedEvent } from '../../domain/events/job-completed.event';
import {
  InvalidStatusTransitionError,
  toPipelineError,
} from '../../domain/errors/pipeline.errors';
import { HandleJobFailureUseCase } from './handle-job-failure.use-case';

function messageOf(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Process Job Use Case
 * Runs one leased work message through the transform engine pool
 */
@Injectable()
export class ProcessJobUseCase implements ProcessJobPort {
  private readonly logger = new Logger(ProcessJobUseCase.name);

  constructor(
    @Inject(JOB_RECORD_REPOSITORY_PORT) private readonly jobRepository: JobRecordRepositoryPort,
    @Inject(JOB_QUEUE_PORT) private readonly jobQueue: JobQueuePort,
    @Inject(CONTENT_STORAGE_PORT) private readonly contentStorage: ContentStoragePort,
    @Inject(ENGINE_POOL_PORT) private readonly enginePool: EnginePoolPort,
    @Inject(EVENT_PUBLISHER_PORT) private readonly eventPublisher: EventPublisherPort,
    private readonly failurePolicy: HandleJobFailureUseCase,
    private readonly configService: ConfigService<AppConfig>,
  ) {}

  async execute(lease: LeasedMessage): Promise<ProcessJobResult> {
    let message: WorkMessage;
    try {
      message = parseWorkMessage(lease.body);
    } catch (error) {
      return this.fail(lease, undefined, error);
    }

    const { jobId } = message;
    const startTime = Date.now();

    try {
      const existing = await this.jobRepository.findById(jobId);
      if (existing?.isCompleted()) {
        this.logger.log(`Job ${jobId} already completed, acknowledging duplicate delivery`);
        await this.completeLease(lease, jobId);
        return { outcome: 'skipped', jobId, resultRef: existing.resultRef };
      }

      let attempt: number;
      try {
        const record = await this.jobRepository.mergeUpdate(jobId, {
          status: JobStatus.PROCESSING,
          sourceName: message.sourceName,
          contentRef: message.contentRef,
          sizeBytes: message.sizeBytes,
          incrementAttempts: true,
        });
        attempt = record.attempts;
      } catch (error) {
        if (error instanceof InvalidStatusTransitionError) {
          // Completed by another delivery since the lookup above
          this.logger.log(`Job ${jobId} can no longer be processed: ${error.message}`);
          await this.completeLease(lease, jobId);
          return { outcome: 'skipped', jobId };
        }
        throw error;
      }

      this.logger.log(`Processing job ${jobId} (attempt ${attempt}, delivery ${lease.deliveryCount})`);

      const content = await this.contentStorage.get(message.contentRef);
      const { acquireTimeoutMs } = this.configService.getOrThrow('enginePool', { infer: true });
      const text = await this.enginePool.run(
        (engine) => engine.transform(content, { jobId, sourceName: message.sourceName }),
        acquireTimeoutMs,
      );

      const { resultPrefix } = this.configService.getOrThrow('s3', { infer: true });
      const resultRef = await this.contentStorage.put(
        `${resultPrefix}${jobId}.txt`,
        Buffer.from(text, 'utf8'),
        { contentType: 'text/plain; charset=utf-8', metadata: { job_id: jobId } },
      );

      await this.markCompleted(jobId, resultRef);
      await this.completeLease(lease, jobId);

      const durationMs = Date.now() - startTime;
      await this.publishCompleted(new JobCompletedEvent({ jobId, resultRef, attempt, durationMs }));

      this.logger.log(`Completed job ${jobId} in ${durationMs}ms`);
      return { outcome: 'completed', jobId, resultRef };
    } catch (error) {
      return this.fail(lease, jobId, error);
    }
  }

  private async fail(
    lease: LeasedMessage,
    jobId: string | undefined,
    error: unknown,
  ): Promise<ProcessJobResult> {
    const result = await this.failurePolicy.execute({
      lease,
      jobId,
      error: toPipelineError(error, 'worker'),
    });
    return { outcome: result.outcome, jobId };
  }

  /**
   * The result is already stored, so a failed status write must not fail the job.
   */
  private async markCompleted(jobId: string, resultRef: string): Promise<void> {
    try {
      await this.jobRepository.mergeUpdate(jobId, {
        status: JobStatus.COMPLETED,
        resultRef,
        completedAt: new Date().toISOString(),
      });
    } catch (error) {
      this.logger.warn(`Could not write completed status for ${jobId}: ${messageOf(error)}`);
    }
  }

  /**
   * A failed ack means the broker redelivers; the completed-record check
   * turns that delivery into a no-op.
   */
  private async completeLease(lease: LeasedMessage, jobId: string): Promise<void> {
    try {
      await this.jobQueue.complete(lease);
    } catch (error) {
      this.logger.warn(`Could not complete message ${lease.messageId} for ${jobId}: ${messageOf(error)}`);
    }
  }

  private async publishCompleted(event: JobCompletedEvent): Promise<void> {
    try {
      await this.eventPublisher.publish(event);
    } catch (error) {
      this.logger.warn(`Failed to publish ${event.eventName} for ${event.jobId}: ${messageOf(error)}`);
    }
  }
}
