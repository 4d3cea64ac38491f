import { Injectable, Logger } from '@nestjs/common';
import type {
  JobRecordPatch,
  JobRecordRepositoryPort,
} from '../../../application/ports/output/job-record-repository.port';
import { JobRecordEntity } from '../../../domain/entities/job-record.entity';
import { JobStatusVO } from '../../../domain/value-objects/job-status.vo';
import {
  CollaboratorUnavailableError,
  InvalidStatusTransitionError,
  JobAlreadyExistsError,
} from '../../../domain/errors/pipeline.errors';
import {
  DynamoDbService,
  JobRecordItem,
  JobRecordUpdate,
} from '../../../shared/aws/dynamodb/dynamodb.service';

const STORE = 'status-store';

/**
 * DynamoDB Job Record Repository Adapter
 * Implements JobRecordRepositoryPort using DynamoDB
 */
@Injectable()
export class DynamoDbJobRecordRepositoryAdapter implements JobRecordRepositoryPort {
  private readonly logger = new Logger(DynamoDbJobRecordRepositoryAdapter.name);

  constructor(private readonly dynamoDb: DynamoDbService) {}

  async findById(jobId: string): Promise<JobRecordEntity | null> {
    let item: JobRecordItem | null;
    try {
      item = await this.dynamoDb.getJobRecord(jobId);
    } catch (error) {
      throw new CollaboratorUnavailableError(STORE, 'findById', error);
    }

    return item ? this.toDomainEntity(item) : null;
  }

  async create(record: JobRecordEntity): Promise<void> {
    let created: boolean;
    try {
      created = await this.dynamoDb.createJobRecord(record.toJSON());
    } catch (error) {
      throw new CollaboratorUnavailableError(STORE, 'create', error);
    }

    if (!created) {
      throw new JobAlreadyExistsError(record.jobId);
    }
    this.logger.debug(`Created job record ${record.jobId} (${record.status})`);
  }

  async mergeUpdate(jobId: string, patch: JobRecordPatch): Promise<JobRecordEntity> {
    const update: JobRecordUpdate = {
      ...patch,
      remove: JobStatusVO.clearsErrorDetail(patch.status) ? ['errorDetail'] : undefined,
    };

    let result: Awaited<ReturnType<DynamoDbService['mergeJobRecord']>>;
    try {
      result = await this.dynamoDb.mergeJobRecord(
        jobId,
        update,
        JobStatusVO.predecessorsOf(patch.status),
      );
    } catch (error) {
      throw new CollaboratorUnavailableError(STORE, 'mergeUpdate', error);
    }

    if (!result.applied) {
      const current = await this.findById(jobId).catch(() => null);
      throw new InvalidStatusTransitionError(jobId, current?.status ?? null, patch.status);
    }

    this.logger.debug(`Job ${jobId} moved to ${patch.status}`);
    return this.toDomainEntity(result.item);
  }

  private toDomainEntity(item: JobRecordItem): JobRecordEntity {
    return JobRecordEntity.fromData({
      jobId: item.jobId,
      status: JobStatusVO.parse(item.status),
      sourceName: item.sourceName,
      contentRef: item.contentRef,
      sizeBytes: item.sizeBytes,
      attempts: item.attempts,
      createdAt: item.createdAt,
      updatedAt: item.updatedAt,
      resultRef: item.resultRef,
      errorDetail: item.errorDetail,
      completedAt: item.completedAt,
    });
  }
}
