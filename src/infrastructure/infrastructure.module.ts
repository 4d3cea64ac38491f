import { Module } from '@nestjs/common';
import { ConfigModule } from '../config/config.module';

import { AwsModule } from '../shared/aws/aws.module';
import { LoggingModule } from '../shared/logging/logging.module';

import {
  JOB_RECORD_REPOSITORY_PORT,
  JOB_QUEUE_PORT,
  CONTENT_STORAGE_PORT,
  EVENT_PUBLISHER_PORT,
} from './injection-tokens';

// Adapters (implementations)
import { DynamoDbJobRecordRepositoryAdapter } from './adapters/persistence/dynamodb-job-record-repository.adapter';
import { SqsJobQueueAdapter } from './adapters/messaging/sqs-job-queue.adapter';
import { S3ContentStorageAdapter } from './adapters/storage/s3-content-storage.adapter';
import { LogEventPublisherAdapter } from './adapters/events/log-event-publisher.adapter';

export * from './injection-tokens';

/**
 * Infrastructure Module
 * Provides implementations (adapters) for the storage, queue and event ports
 */
@Module({
  imports: [ConfigModule, LoggingModule, AwsModule],
  providers: [
    // Persistence adapters
    {
      provide: JOB_RECORD_REPOSITORY_PORT,
      useClass: DynamoDbJobRecordRepositoryAdapter,
    },

    // Messaging adapters
    {
      provide: JOB_QUEUE_PORT,
      useClass: SqsJobQueueAdapter,
    },

    // Storage adapters
    {
      provide: CONTENT_STORAGE_PORT,
      useClass: S3ContentStorageAdapter,
    },

    // Event publisher adapter
    {
      provide: EVENT_PUBLISHER_PORT,
      useClass: LogEventPublisherAdapter,
    },
  ],
  exports: [
    JOB_RECORD_REPOSITORY_PORT,
    JOB_QUEUE_PORT,
    CONTENT_STORAGE_PORT,
    EVENT_PUBLISHER_PORT,
  ],
})
export class InfrastructureModule {}
