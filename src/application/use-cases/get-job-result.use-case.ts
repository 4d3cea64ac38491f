import { Inject, Injectable } from '@nestjs/common';
import type { GetJobResultPort, JobResultView } from '../ports/input/get-job-result.port';
import type { ContentStoragePort } from '../ports/output/content-storage.port';
import { CONTENT_STORAGE_PORT } from '../../infrastructure/injection-tokens';
import { JobStatus } from '../../domain/value-objects/job-status.vo';
import { JobNotCompletedError } from '../../domain/errors/pipeline.errors';
import { GetJobStatusUseCase } from './get-job-status.use-case';

/**
 * Get Job Result Use Case
 * Reads the extracted text of a completed job back from the content store
 */
@Injectable()
export class GetJobResultUseCase implements GetJobResultPort {
  constructor(
    private readonly getJobStatus: GetJobStatusUseCase,
    @Inject(CONTENT_STORAGE_PORT) private readonly contentStorage: ContentStoragePort,
  ) {}

  async execute(jobId: string): Promise<JobResultView> {
    const status = await this.getJobStatus.execute(jobId);
    if (status.status !== JobStatus.COMPLETED || !status.resultRef) {
      throw new JobNotCompletedError(status.jobId, status.status);
    }

    const content = await this.contentStorage.get(status.resultRef);
    return {
      jobId: status.jobId,
      text: content.toString('utf8'),
      completedAt: status.completedAt,
    };
  }
}
