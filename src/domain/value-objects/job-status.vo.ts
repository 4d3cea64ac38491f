/**
 * Job Status Value Object
 * Lifecycle status of a transform job as stored in the status store
 */
export enum JobStatus {
  QUEUED = 'queued',
  PROCESSING = 'processing',
  COMPLETED = 'completed',
  FAILED = 'failed',
}

/**
 * Statuses each status may be entered from. `null` stands for "no record
 * yet": a worker may create the record at PROCESSING when the ingestion
 * status write never landed. PROCESSING may be re-entered by the next lease
 * holder after a worker died mid-job and its lease expired.
 */
const PREDECESSORS: Record<JobStatus, ReadonlyArray<JobStatus | null>> = {
  [JobStatus.QUEUED]: [null],
  [JobStatus.PROCESSING]: [null, JobStatus.QUEUED, JobStatus.PROCESSING, JobStatus.FAILED],
  [JobStatus.COMPLETED]: [JobStatus.PROCESSING],
  [JobStatus.FAILED]: [JobStatus.PROCESSING],
};

// eslint-disable-next-line @typescript-eslint/no-namespace
export namespace JobStatusVO {
  /**
   * Parse a stored status, case-insensitively.
   */
  export function parse(value: string): JobStatus {
    const normalizedValue = value.toLowerCase();
    const match = Object.values(JobStatus).find((status) => status === normalizedValue);
    if (!match) {
      throw new Error(`Invalid job status: ${value}`);
    }
    return match;
  }

  export function predecessorsOf(status: JobStatus): ReadonlyArray<JobStatus | null> {
    return PREDECESSORS[status];
  }

  /**
   * Whether a record currently at `from` (or absent, when `null`) may move to `to`.
   */
  export function isAllowed(from: JobStatus | null, to: JobStatus): boolean {
    return PREDECESSORS[to].includes(from);
  }

  /**
   * Entering these statuses drops the error detail of an earlier failed attempt.
   */
  export function clearsErrorDetail(status: JobStatus): boolean {
    return status === JobStatus.PROCESSING || status === JobStatus.COMPLETED;
  }
}
