import type { LeasedMessage } from '../output/job-queue.port';

export type ProcessJobOutcome = 'completed' | 'skipped' | 'retried' | 'poisoned';

export interface ProcessJobResult {
  outcome: ProcessJobOutcome;
  /** Undefined when the message could not be decoded. */
  jobId?: string;
  resultRef?: string;
}

/**
 * Process Job Port (Driving Port / Use Case Interface)
 * Runs one leased work message to completion or hands it to the failure policy
 */
export interface ProcessJobPort {
  execute(lease: LeasedMessage): Promise<ProcessJobResult>;
}
