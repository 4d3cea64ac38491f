import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import * as path from 'path';
import { AppConfig } from '../../config/configuration';
import type {
  SubmitDocumentCommand,
  SubmitDocumentPort,
  SubmitDocumentResult,
} from '../ports/input/submit-document.port';
import type { JobRecordRepositoryPort } from '../ports/output/job-record-repository.port';
import type { JobQueuePort } from '../ports/output/job-queue.port';
import type { ContentStoragePort } from '../ports/output/content-storage.port';
import type { EventPublisherPort } from '../ports/output/event-publisher.port';
import {
  CONTENT_STORAGE_PORT,
  EVENT_PUBLISHER_PORT,
  JOB_QUEUE_PORT,
  JOB_RECORD_REPOSITORY_PORT,
} from '../../infrastructure/injection-tokens';
import { JobRecordEntity } from '../../domain/entities/job-record.entity';
import { identityOf } from '../../domain/value-objects/content-identity.vo';
import { JobStatus } from '../../domain/value-objects/job-status.vo';
import { JobQueuedEvent } from '../../domain/events/job-queued.event';
import {
  CollaboratorUnavailableError,
  InvalidInputError,
  JobAlreadyExistsError,
} from '../../domain/errors/pipeline.errors';

const CONTENT_TYPES: Record<string, string> = {
  '.jpg': 'image/jpeg',
  '.jpeg': 'image/jpeg',
  '.png': 'image/png',
  '.pdf': 'application/pdf',
  '.txt': 'text/plain',
};

/**
 * Submit Document Use Case
 *
 * Ingests one document: identity from the content hash, then upload, enqueue
 * and a `queued` status record. Re-submitting the same bytes returns the
 * existing job without touching the content store or the queue.
 *
 * Upload and enqueue are critical; the status write is best-effort because a
 * worker creates the record itself on first touch.
 */
@Injectable()
export class SubmitDocumentUseCase implements SubmitDocumentPort {
  private readonly logger = new Logger(SubmitDocumentUseCase.name);
  private readonly inFlight = new Map<string, Promise<SubmitDocumentResult>>();

  constructor(
    @Inject(JOB_RECORD_REPOSITORY_PORT) private readonly jobRepository: JobRecordRepositoryPort,
    @Inject(JOB_QUEUE_PORT) private readonly jobQueue: JobQueuePort,
    @Inject(CONTENT_STORAGE_PORT) private readonly contentStorage: ContentStoragePort,
    @Inject(EVENT_PUBLISHER_PORT) private readonly eventPublisher: EventPublisherPort,
    private readonly configService: ConfigService<AppConfig>,
  ) {}

  async execute(command: SubmitDocumentCommand): Promise<SubmitDocumentResult> {
    const extension = this.validate(command);
    const jobId = identityOf(command.content);

    // Concurrent submits of the same bytes share one pipeline
    const pending = this.inFlight.get(jobId);
    if (pending) {
      this.logger.debug(`Joining in-flight submission of ${jobId}`);
      return pending;
    }

    const submission = this.ingest(jobId, extension, command).finally(() => {
      this.inFlight.delete(jobId);
    });
    this.inFlight.set(jobId, submission);
    return submission;
  }

  private validate(command: SubmitDocumentCommand): string {
    const { maxUploadBytes, allowedExtensions } = this.configService.getOrThrow('ingestion', {
      infer: true,
    });

    if (!command.sourceName || command.sourceName.trim().length === 0) {
      throw new InvalidInputError('Source name is required');
    }
    if (command.content.length === 0) {
      throw new InvalidInputError('Document is empty');
    }
    if (command.content.length > maxUploadBytes) {
      throw new InvalidInputError(`Document exceeds the ${maxUploadBytes} byte limit`, {
        sizeBytes: command.content.length,
        maxUploadBytes,
      });
    }

    const extension = path.extname(command.sourceName.trim()).toLowerCase();
    if (!allowedExtensions.includes(extension)) {
      throw new InvalidInputError(
        `Unsupported file type "${extension || '(none)'}", allowed: ${allowedExtensions.join(', ')}`,
        { extension, allowedExtensions },
      );
    }

    return extension;
  }

  private async ingest(
    jobId: string,
    extension: string,
    command: SubmitDocumentCommand,
  ): Promise<SubmitDocumentResult> {
    const sourceName = command.sourceName.trim();

    let existing: JobRecordEntity | null;
    try {
      existing = await this.jobRepository.findById(jobId);
    } catch (error) {
      throw error instanceof CollaboratorUnavailableError
        ? error
        : new CollaboratorUnavailableError('status-store', 'findById', error);
    }

    if (existing) {
      this.logger.log(`Duplicate submission of ${sourceName}, job ${jobId} is ${existing.status}`);
      return { jobId, status: existing.status, created: false };
    }

    const uploadPrefix = this.configService.getOrThrow('s3', { infer: true }).uploadPrefix;
    const contentRef = await this.contentStorage.put(`${uploadPrefix}${jobId}${extension}`, command.content, {
      contentType: CONTENT_TYPES[extension] ?? 'application/octet-stream',
      metadata: { job_id: jobId },
    });

    const createdAt = new Date().toISOString();
    await this.jobQueue.send({
      jobId,
      contentRef,
      sourceName,
      createdAt,
      sizeBytes: command.content.length,
    });

    await this.recordQueued(
      JobRecordEntity.create({
        jobId,
        sourceName,
        contentRef,
        sizeBytes: command.content.length,
        createdAt,
      }),
    );

    await this.publishQueued(
      new JobQueuedEvent({ jobId, sourceName, contentRef, sizeBytes: command.content.length }),
    );

    this.logger.log(`Queued job ${jobId} for ${sourceName} (${command.content.length} bytes)`);
    return { jobId, status: JobStatus.QUEUED, created: true };
  }

  private async recordQueued(record: JobRecordEntity): Promise<void> {
    try {
      await this.jobRepository.create(record);
    } catch (error) {
      if (error instanceof JobAlreadyExistsError) {
        this.logger.debug(`Job record ${record.jobId} already exists`);
        return;
      }
      const message = error instanceof Error ? error.message : String(error);
      this.logger.warn(`Could not write queued status for ${record.jobId}: ${message}`);
    }
  }

  private async publishQueued(event: JobQueuedEvent): Promise<void> {
    try {
      await this.eventPublisher.publish(event);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.logger.warn(`Failed to publish ${event.eventName} for ${event.jobId}: ${message}`);
    }
  }
}
