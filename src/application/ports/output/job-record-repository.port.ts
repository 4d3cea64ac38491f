import type { JobRecordEntity } from '../../../domain/entities/job-record.entity';
import type { JobStatus } from '../../../domain/value-objects/job-status.vo';

/**
 * Partial update applied by `mergeUpdate`. Only the fields present are
 * written; `status` is always required so the store can guard the transition.
 */
export interface JobRecordPatch {
  status: JobStatus;
  sourceName?: string;
  contentRef?: string;
  sizeBytes?: number;
  resultRef?: string;
  errorDetail?: string;
  completedAt?: string;
  /** Bump the attempt counter by one. */
  incrementAttempts?: boolean;
}

/**
 * Job Record Repository Port (Driven Port)
 * Status store for transform jobs, keyed by content identity
 */
export interface JobRecordRepositoryPort {
  /**
   * Find a job by its identity. Not found is `null`, never an error.
   */
  findById(jobId: string): Promise<JobRecordEntity | null>;

  /**
   * Conditional create. Throws `JobAlreadyExistsError` when the key exists.
   */
  create(record: JobRecordEntity): Promise<void>;

  /**
   * Upsert a partial record. The write only lands when the stored status is
   * absent or one of the allowed predecessors of `patch.status`; otherwise
   * throws `InvalidStatusTransitionError`.
   * Returns the record as stored after the write.
   */
  mergeUpdate(jobId: string, patch: JobRecordPatch): Promise<JobRecordEntity>;
}
