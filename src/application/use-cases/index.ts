/**
 * Use Cases Barrel Export
 */
export { SubmitDocumentUseCase } from './submit-document.use-case';
export { ProcessJobUseCase } from './process-job.use-case';
export { HandleJobFailureUseCase } from './handle-job-failure.use-case';
export { GetJobStatusUseCase } from './get-job-status.use-case';
export { GetJobResultUseCase } from './get-job-result.use-case';
