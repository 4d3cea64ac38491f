import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { ConfigService } from '@nestjs/config';
import { AppModule } from './app.module';
import { AppConfig } from './config/configuration';
import { PinoLoggerService } from './shared/logging/pino-logger.service';
import { ConfigurationError } from './domain/errors/pipeline.errors';

/**
 * Bootstrap the NestJS worker
 * Queue consumer only, no HTTP server
 */
async function bootstrap() {
  // Create NestJS application context (no HTTP)
  const app = await NestFactory.createApplicationContext(AppModule, {
    bufferLogs: true,
  });

  // Get services
  const configService = app.get(ConfigService<AppConfig>);
  const logger = app.get(PinoLoggerService).forContext('Bootstrap');

  // Use custom logger
  app.useLogger(logger);

  // Get configuration
  const nodeEnv = configService.get('nodeEnv', { infer: true });
  const sqsConfig = configService.getOrThrow('sqs', { infer: true });
  const schedulerConfig = configService.getOrThrow('scheduler', { infer: true });
  const enginePoolConfig = configService.getOrThrow('enginePool', { infer: true });

  // Enable graceful shutdown
  app.enableShutdownHooks();

  // Register shutdown handlers
  const shutdownHandler = async (signal: string) => {
    logger.info({ signal }, 'Received shutdown signal, draining workers...');
    await app.close();
    logger.info('Workers drained, application shut down gracefully');
    process.exit(0);
  };

  process.on('SIGTERM', () => void shutdownHandler('SIGTERM'));
  process.on('SIGINT', () => void shutdownHandler('SIGINT'));

  // Handle uncaught errors
  process.on('uncaughtException', (error) => {
    logger.error({ error: error.message, stack: error.stack }, 'Uncaught exception');
    process.exit(1);
  });

  process.on('unhandledRejection', (reason) => {
    logger.error({ reason }, 'Unhandled rejection');
    process.exit(1);
  });

  logger.info(
    {
      nodeEnv,
      pid: process.pid,
      queues: {
        jobs: sqsConfig.jobsQueueUrl,
        poison: sqsConfig.poisonQueueUrl,
      },
      concurrency: schedulerConfig.concurrency,
      enginePoolSize: enginePoolConfig.size,
    },
    'Document transform worker started',
  );
}

bootstrap().catch((error: unknown) => {
  if (error instanceof ConfigurationError) {
    console.error(error.message);
  } else {
    console.error('Failed to start worker:', error);
  }
  process.exit(1);
});
