export interface JobResultView {
  jobId: string;
  text: string;
  completedAt?: string;
}

export interface GetJobResultPort {
  execute(jobId: string): Promise<JobResultView>;
}
