import { Inject, Injectable } from '@nestjs/common';
import type { GetJobStatusPort, JobStatusView } from '../ports/input/get-job-status.port';
import type { JobRecordRepositoryPort } from '../ports/output/job-record-repository.port';
import { JOB_RECORD_REPOSITORY_PORT } from '../../infrastructure/injection-tokens';
import { ContentIdentity } from '../../domain/value-objects/content-identity.vo';
import { JobNotFoundError } from '../../domain/errors/pipeline.errors';

@Injectable()
export class GetJobStatusUseCase implements GetJobStatusPort {
  constructor(
    @Inject(JOB_RECORD_REPOSITORY_PORT) private readonly jobRepository: JobRecordRepositoryPort,
  ) {}

  async execute(jobId: string): Promise<JobStatusView> {
    const normalized = ContentIdentity.fromString(jobId).value;

    const record = await this.jobRepository.findById(normalized);
    if (!record) {
      throw new JobNotFoundError(normalized);
    }

    return {
      jobId: record.jobId,
      status: record.status,
      sourceName: record.sourceName,
      createdAt: record.createdAt,
      completedAt: record.completedAt,
      resultRef: record.resultRef,
      errorDetail: record.errorDetail,
    };
  }
}
