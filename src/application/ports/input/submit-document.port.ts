import type { JobStatus } from '../../../domain/value-objects/job-status.vo';

export interface SubmitDocumentCommand {
  content: Buffer;
  sourceName: string;
}

export interface SubmitDocumentResult {
  jobId: string;
  status: JobStatus;
  /** False when the same content had been submitted before. */
  created: boolean;
}

/**
 * Submit Document Port (Driving Port / Use Case Interface)
 * Accepts a document, stores it and enqueues a transform job exactly once
 * per distinct content
 */
export interface SubmitDocumentPort {
  execute(command: SubmitDocumentCommand): Promise<SubmitDocumentResult>;
}
