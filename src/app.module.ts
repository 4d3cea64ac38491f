import { Module } from '@nestjs/common';
import { ConfigModule } from './config/config.module';
import { LoggingModule } from './shared/logging/logging.module';
import { ApplicationModule } from './application/application.module';
import { ProcessingModule } from './processing/processing.module';

/**
 * Application Module
 * Document transform worker: consumes the jobs queue, runs each document
 * through the transform engine pool and records the outcome
 */
@Module({
  imports: [ConfigModule, LoggingModule, ApplicationModule, ProcessingModule],
})
export class AppModule {}
