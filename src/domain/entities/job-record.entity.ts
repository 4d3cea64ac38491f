import { JobStatus } from '../value-objects/job-status.vo';
import { ContentIdentity } from '../value-objects/content-identity.vo';

/**
 * Job Record Entity
 * The status store's view of one transform job, keyed by content identity.
 *
 * Data lives in a plain readonly interface and `create` / `fromData` attach
 * the read-only methods. Status changes are conditional writes in the store,
 * never edits of this object.
 */

export interface JobRecordData {
  readonly jobId: string;
  readonly status: JobStatus;
  readonly sourceName: string;
  readonly contentRef: string;
  readonly sizeBytes: number;
  readonly attempts: number;
  readonly createdAt: string;
  readonly updatedAt: string;
  readonly resultRef?: string;
  readonly errorDetail?: string;
  readonly completedAt?: string;
}

/**
 * Status changes are conditional writes in the status store, so the entity
 * itself is read-only.
 */
export interface JobRecordEntity extends JobRecordData {
  isCompleted(): boolean;
  toJSON(): JobRecordData;
}

// eslint-disable-next-line @typescript-eslint/no-namespace
export namespace JobRecordEntity {
  export interface CreateProps {
    jobId: string;
    sourceName: string;
    contentRef: string;
    sizeBytes: number;
    status?: JobStatus;
    attempts?: number;
    createdAt?: string;
    updatedAt?: string;
    resultRef?: string;
    errorDetail?: string;
    completedAt?: string;
  }

  /**
   * A fresh record in `queued`, as written by ingestion.
   */
  export function create(props: CreateProps): JobRecordEntity {
    validate(props);

    const createdAt = props.createdAt ?? new Date().toISOString();
    const data: JobRecordData = {
      jobId: props.jobId,
      status: props.status ?? JobStatus.QUEUED,
      sourceName: props.sourceName,
      contentRef: props.contentRef,
      sizeBytes: props.sizeBytes,
      attempts: props.attempts ?? 0,
      createdAt,
      updatedAt: props.updatedAt ?? createdAt,
      resultRef: props.resultRef,
      errorDetail: props.errorDetail,
      completedAt: props.completedAt,
    };

    return attachMethods(data);
  }

  /**
   * Rehydrate from storage without re-running creation defaults.
   */
  export function fromData(data: JobRecordData): JobRecordEntity {
    return attachMethods(data);
  }

  function attachMethods(data: JobRecordData): JobRecordEntity {
    return {
      ...data,
      isCompleted: () => data.status === JobStatus.COMPLETED,
      toJSON: () => toJSON(data),
    };
  }

  function validate(props: CreateProps): void {
    if (!ContentIdentity.isValid(props.jobId)) {
      throw new Error(`Invalid job id: ${props.jobId}`);
    }
    if (!props.sourceName || props.sourceName.trim().length === 0) {
      throw new Error('Source name is required');
    }
    if (!props.contentRef || props.contentRef.trim().length === 0) {
      throw new Error('Content reference is required');
    }
    if (props.sizeBytes < 0) {
      throw new Error('Size must not be negative');
    }
  }

  // ===== Serialization =====

  export function toJSON(record: JobRecordData): JobRecordData {
    return {
      jobId: record.jobId,
      status: record.status,
      sourceName: record.sourceName,
      contentRef: record.contentRef,
      sizeBytes: record.sizeBytes,
      attempts: record.attempts,
      createdAt: record.createdAt,
      updatedAt: record.updatedAt,
      resultRef: record.resultRef,
      errorDetail: record.errorDetail,
      completedAt: record.completedAt,
    };
  }
}
