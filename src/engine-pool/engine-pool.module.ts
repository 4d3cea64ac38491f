import { Module } from '@nestjs/common';
import { ConfigModule } from '../config/config.module';
import { ENGINE_POOL_PORT, TRANSFORM_ENGINE_FACTORY } from '../infrastructure/injection-tokens';
import { EnginePoolService } from './engine-pool.service';
import { WorkerThreadEngineFactory } from './engines/worker-thread-engine.factory';

@Module({
  imports: [ConfigModule],
  providers: [
    { provide: TRANSFORM_ENGINE_FACTORY, useClass: WorkerThreadEngineFactory },
    EnginePoolService,
    { provide: ENGINE_POOL_PORT, useExisting: EnginePoolService },
  ],
  exports: [ENGINE_POOL_PORT, EnginePoolService],
})
export class EnginePoolModule {}
