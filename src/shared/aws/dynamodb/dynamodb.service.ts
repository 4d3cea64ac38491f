import { Injectable, OnModuleDestroy } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { ConditionalCheckFailedException, DynamoDBClient } from '@aws-sdk/client-dynamodb';
import {
  DynamoDBDocumentClient,
  GetCommand,
  PutCommand,
  UpdateCommand,
} from '@aws-sdk/lib-dynamodb';
import { AppConfig } from '../../../config/configuration';
import { PinoLoggerService } from '../../logging/pino-logger.service';

/**
 * Stored shape of a job record. The table key is (`partition`, `jobId`);
 * every job lives in the same partition.
 */
export interface JobRecordItem {
  partition: string;
  jobId: string;
  status: string;
  sourceName: string;
  contentRef: string;
  sizeBytes: number;
  attempts: number;
  createdAt: string;
  updatedAt: string;
  resultRef?: string;
  errorDetail?: string;
  completedAt?: string;
}

export type JobRecordUpdate = Partial<
  Pick<
    JobRecordItem,
    'sourceName' | 'contentRef' | 'sizeBytes' | 'resultRef' | 'errorDetail' | 'completedAt'
  >
> & {
  status: string;
  incrementAttempts?: boolean;
  /** Attributes to delete in the same write. */
  remove?: Array<'errorDetail' | 'resultRef' | 'completedAt'>;
};

export type ConditionalUpdateResult =
  | { applied: true; item: JobRecordItem }
  | { applied: false };

const UPDATABLE_FIELDS = [
  'sourceName',
  'contentRef',
  'sizeBytes',
  'resultRef',
  'errorDetail',
  'completedAt',
] as const;

@Injectable()
export class DynamoDbService implements OnModuleDestroy {
  private readonly client: DynamoDBClient;
  private readonly docClient: DynamoDBDocumentClient;
  private readonly tableName: string;
  private readonly partition: string;
  private readonly logger: PinoLoggerService;

  constructor(
    private readonly configService: ConfigService<AppConfig>,
    logger: PinoLoggerService,
  ) {
    const awsConfig = this.configService.getOrThrow('aws', { infer: true });
    const dynamoConfig = this.configService.getOrThrow('dynamodb', { infer: true });

    this.client = new DynamoDBClient({
      region: awsConfig.region,
      ...(awsConfig.endpoint && { endpoint: awsConfig.endpoint }),
      ...(awsConfig.credentials && { credentials: awsConfig.credentials }),
    });

    this.docClient = DynamoDBDocumentClient.from(this.client, {
      marshallOptions: {
        removeUndefinedValues: true,
      },
    });

    this.tableName = dynamoConfig.tableName;
    this.partition = dynamoConfig.partition;
    this.logger = logger.forContext(DynamoDbService.name);
  }

  /**
   * Conditional put. Returns false when an item with this key already exists.
   */
  async createJobRecord(record: Omit<JobRecordItem, 'partition'>): Promise<boolean> {
    try {
      await this.docClient.send(
        new PutCommand({
          TableName: this.tableName,
          Item: { ...record, partition: this.partition },
          ConditionExpression: 'attribute_not_exists(jobId)',
        }),
      );
    } catch (error) {
      if (error instanceof ConditionalCheckFailedException) {
        return false;
      }
      throw error;
    }

    this.logger.debug({ jobId: record.jobId, status: record.status }, 'Job record created');
    return true;
  }

  async getJobRecord(jobId: string): Promise<JobRecordItem | null> {
    const result = await this.docClient.send(
      new GetCommand({
        TableName: this.tableName,
        Key: { partition: this.partition, jobId },
        ConsistentRead: true,
      }),
    );

    return result.Item ? this.toItem(result.Item) : null;
  }

  /**
   * Upsert the given fields. The write is conditional on the stored status
   * being one of `allowedStatuses`; a `null` entry also admits a missing item.
   */
  async mergeJobRecord(
    jobId: string,
    update: JobRecordUpdate,
    allowedStatuses: ReadonlyArray<string | null>,
  ): Promise<ConditionalUpdateResult> {
    const now = new Date().toISOString();

    const setClauses = [
      '#status = :status',
      'updatedAt = :now',
      'createdAt = if_not_exists(createdAt, :now)',
      'attempts = if_not_exists(attempts, :zero) + :inc',
    ];
    const expressionAttributeNames: Record<string, string> = { '#status': 'status' };
    const expressionAttributeValues: Record<string, unknown> = {
      ':status': update.status,
      ':now': now,
      ':zero': 0,
      ':inc': update.incrementAttempts ? 1 : 0,
    };

    for (const field of UPDATABLE_FIELDS) {
      const value = update[field];
      if (value !== undefined) {
        setClauses.push(`#${field} = :${field}`);
        expressionAttributeNames[`#${field}`] = field;
        expressionAttributeValues[`:${field}`] = value;
      }
    }

    let updateExpression = `SET ${setClauses.join(', ')}`;
    const removals = (update.remove ?? []).filter((field) => update[field] === undefined);
    if (removals.length > 0) {
      updateExpression += ` REMOVE ${removals.join(', ')}`;
    }

    const conditions: string[] = [];
    if (allowedStatuses.includes(null)) {
      conditions.push('attribute_not_exists(jobId)');
    }
    const statuses = allowedStatuses.filter((status): status is string => status !== null);
    if (statuses.length > 0) {
      const placeholders = statuses.map((_, index) => `:from${index}`);
      statuses.forEach((status, index) => {
        expressionAttributeValues[`:from${index}`] = status;
      });
      conditions.push(`#status IN (${placeholders.join(', ')})`);
    }

    try {
      const result = await this.docClient.send(
        new UpdateCommand({
          TableName: this.tableName,
          Key: { partition: this.partition, jobId },
          UpdateExpression: updateExpression,
          ConditionExpression: conditions.join(' OR '),
          ExpressionAttributeNames: expressionAttributeNames,
          ExpressionAttributeValues: expressionAttributeValues,
          ReturnValues: 'ALL_NEW',
        }),
      );

      this.logger.debug({ jobId, status: update.status }, 'Job record updated');

      if (!result.Attributes) {
        throw new Error(`DynamoDB returned no attributes for job ${jobId}`);
      }
      return { applied: true, item: this.toItem(result.Attributes) };
    } catch (error) {
      if (error instanceof ConditionalCheckFailedException) {
        return { applied: false };
      }
      throw error;
    }
  }

  private toItem(raw: Record<string, unknown>): JobRecordItem {
    const text = (key: string): string | undefined =>
      typeof raw[key] === 'string' ? String(raw[key]) : undefined;
    const count = (key: string): number => (typeof raw[key] === 'number' ? Number(raw[key]) : 0);

    return {
      partition: text('partition') ?? this.partition,
      jobId: text('jobId') ?? '',
      status: text('status') ?? '',
      sourceName: text('sourceName') ?? '',
      contentRef: text('contentRef') ?? '',
      sizeBytes: count('sizeBytes'),
      attempts: count('attempts'),
      createdAt: text('createdAt') ?? '',
      updatedAt: text('updatedAt') ?? '',
      resultRef: text('resultRef'),
      errorDetail: text('errorDetail'),
      completedAt: text('completedAt'),
    };
  }

  onModuleDestroy() {
    this.client.destroy();
  }
}
