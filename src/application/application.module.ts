import { Module } from '@nestjs/common';
import { ConfigModule } from '../config/config.module';
import { InfrastructureModule } from '../infrastructure/infrastructure.module';
import { EnginePoolModule } from '../engine-pool/engine-pool.module';

// Use Cases
import {
  SubmitDocumentUseCase,
  ProcessJobUseCase,
  HandleJobFailureUseCase,
  GetJobStatusUseCase,
  GetJobResultUseCase,
} from './use-cases';

/**
 * Application Module
 * Contains all use cases
 *
 * Use cases depend on output ports only; the adapters bound to the port
 * tokens come from InfrastructureModule and EnginePoolModule.
 */
@Module({
  imports: [ConfigModule, InfrastructureModule, EnginePoolModule],
  providers: [
    SubmitDocumentUseCase,
    ProcessJobUseCase,
    HandleJobFailureUseCase,
    GetJobStatusUseCase,
    GetJobResultUseCase,
  ],
  exports: [
    // Export use cases so they can be used by driving adapters (scheduler, callers)
    SubmitDocumentUseCase,
    ProcessJobUseCase,
    HandleJobFailureUseCase,
    GetJobStatusUseCase,
    GetJobResultUseCase,
  ],
})
export class ApplicationModule {}
