import type { PipelineError } from '../../../domain/errors/pipeline.errors';
import type { LeasedMessage } from '../output/job-queue.port';

export interface HandleJobFailureCommand {
  lease: LeasedMessage;
  /** Known once the message body has been decoded. */
  jobId?: string;
  error: PipelineError;
}

export type FailureOutcome = 'retried' | 'poisoned';

export interface HandleJobFailureResult {
  outcome: FailureOutcome;
  errorDetail: string;
  /** False when the lease could not be settled and will expire instead. */
  leaseSettled: boolean;
}

/**
 * Handle Job Failure Port (Driving Port / Use Case Interface)
 * Decides between redelivery and the poison destination for a failed attempt
 */
export interface HandleJobFailurePort {
  execute(command: HandleJobFailureCommand): Promise<HandleJobFailureResult>;
}
