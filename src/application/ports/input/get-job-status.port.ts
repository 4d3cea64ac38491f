import type { JobStatus } from '../../../domain/value-objects/job-status.vo';

export interface JobStatusView {
  jobId: string;
  status: JobStatus;
  sourceName: string;
  createdAt: string;
  completedAt?: string;
  resultRef?: string;
  errorDetail?: string;
}

export interface GetJobStatusPort {
  execute(jobId: string): Promise<JobStatusView>;
}
