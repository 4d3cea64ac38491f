import { Module } from '@nestjs/common';
import { ConfigModule } from '../../config/config.module';
import { DynamoDbService } from './dynamodb/dynamodb.service';
import { S3Service } from './s3/s3.service';
import { SqsService } from './sqs/sqs.service';

/**
 * SDK clients for the jobs queue, the status table and the content bucket.
 * Each service destroys its client on module destroy.
 */
@Module({
  imports: [ConfigModule],
  providers: [SqsService, DynamoDbService, S3Service],
  exports: [SqsService, DynamoDbService, S3Service],
})
export class AwsModule {}
