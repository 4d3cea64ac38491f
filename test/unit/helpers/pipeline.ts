import { EnginePoolService } from '../../../src/engine-pool/engine-pool.service';
import { SubmitDocumentUseCase } from '../../../src/application/use-cases/submit-document.use-case';
import { ProcessJobUseCase } from '../../../src/application/use-cases/process-job.use-case';
import { HandleJobFailureUseCase } from '../../../src/application/use-cases/handle-job-failure.use-case';
import { GetJobStatusUseCase } from '../../../src/application/use-cases/get-job-status.use-case';
import { GetJobResultUseCase } from '../../../src/application/use-cases/get-job-result.use-case';
import { JobSchedulerService } from '../../../src/processing/job-scheduler.service';
import {
  FakeTransformEngineFactory,
  InMemoryContentStorageAdapter,
  InMemoryEventPublisherAdapter,
  InMemoryJobQueueAdapter,
  InMemoryJobRecordRepositoryAdapter,
} from '../../in-memory-adapters';
import { ConfigOverrides, createConfigService, createTestLogger } from './mock-factories';

/**
 * The whole pipeline wired the way the Nest modules wire it, on in-memory
 * adapters and fake engines. The engine pool is not initialized.
 */
export function createPipeline(overrides: ConfigOverrides = {}) {
  const configService = createConfigService(overrides);
  const logger = createTestLogger(configService);

  const repository = new InMemoryJobRecordRepositoryAdapter();
  const queue = new InMemoryJobQueueAdapter();
  const storage = new InMemoryContentStorageAdapter();
  const events = new InMemoryEventPublisherAdapter();
  const engineFactory = new FakeTransformEngineFactory();
  const enginePool = new EnginePoolService(configService, engineFactory, logger);

  const submitDocument = new SubmitDocumentUseCase(repository, queue, storage, events, configService);
  const failurePolicy = new HandleJobFailureUseCase(repository, queue, events, configService);
  const processJob = new ProcessJobUseCase(
    repository,
    queue,
    storage,
    enginePool,
    events,
    failurePolicy,
    configService,
  );
  const getJobStatus = new GetJobStatusUseCase(repository);
  const getJobResult = new GetJobResultUseCase(getJobStatus, storage);
  const scheduler = new JobSchedulerService(queue, processJob, configService, logger);

  return {
    configService,
    repository,
    queue,
    storage,
    events,
    engineFactory,
    enginePool,
    submitDocument,
    failurePolicy,
    processJob,
    getJobStatus,
    getJobResult,
    scheduler,
  };
}

export type Pipeline = ReturnType<typeof createPipeline>;
