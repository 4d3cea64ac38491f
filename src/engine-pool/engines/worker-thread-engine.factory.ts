import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { AppConfig } from '../../config/configuration';
import type {
  TransformEngine,
  TransformEngineFactory,
} from '../../application/ports/output/transform-engine.port';
import { PinoLoggerService } from '../../shared/logging/pino-logger.service';
import { WorkerThreadEngine } from './worker-thread.engine';

@Injectable()
export class WorkerThreadEngineFactory implements TransformEngineFactory {
  constructor(
    private readonly configService: ConfigService<AppConfig>,
    private readonly logger: PinoLoggerService,
  ) {}

  create(engineId: string): Promise<TransformEngine> {
    const poolConfig = this.configService.getOrThrow('enginePool', { infer: true });

    return WorkerThreadEngine.start(
      engineId,
      {
        initTimeoutMs: poolConfig.initTimeoutMs,
        transformTimeoutMs: poolConfig.transformTimeoutMs,
        minTextRunLength: poolConfig.minTextRunLength,
      },
      this.logger.forContext(WorkerThreadEngine.name),
    );
  }
}
