import { Injectable, OnModuleDestroy } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import {
  SQSClient,
  ReceiveMessageCommand,
  DeleteMessageCommand,
  SendMessageCommand,
  ChangeMessageVisibilityCommand,
  MessageAttributeValue,
} from '@aws-sdk/client-sqs';
import { AppConfig } from '../../../config/configuration';
import {
  SqsMessageEnvelope,
  SqsDeleteResult,
  SqsSendOptions,
  SqsSendResult,
} from '../interfaces/sqs-message.interface';
import { PinoLoggerService } from '../../logging/pino-logger.service';

/** SQS caps a single receive at 10 messages and a long poll at 20 seconds. */
const SQS_MAX_BATCH = 10;
const SQS_MAX_WAIT_SECONDS = 20;

@Injectable()
export class SqsService implements OnModuleDestroy {
  private readonly client: SQSClient;
  private readonly visibilityTimeout: number;
  private readonly logger: PinoLoggerService;

  constructor(
    private readonly configService: ConfigService<AppConfig>,
    logger: PinoLoggerService,
  ) {
    const awsConfig = this.configService.getOrThrow('aws', { infer: true });
    const sqsConfig = this.configService.getOrThrow('sqs', { infer: true });

    this.client = new SQSClient({
      region: awsConfig.region,
      ...(awsConfig.endpoint && { endpoint: awsConfig.endpoint }),
      ...(awsConfig.credentials && { credentials: awsConfig.credentials }),
    });

    this.visibilityTimeout = sqsConfig.visibilityTimeout;
    this.logger = logger.forContext(SqsService.name);
  }

  static isFifoQueue(queueUrl: string): boolean {
    return queueUrl.endsWith('.fifo');
  }

  async receiveMessages(
    queueUrl: string,
    maxMessages: number,
    waitTimeSeconds: number,
  ): Promise<SqsMessageEnvelope[]> {
    const command = new ReceiveMessageCommand({
      QueueUrl: queueUrl,
      MaxNumberOfMessages: Math.min(Math.max(maxMessages, 1), SQS_MAX_BATCH),
      WaitTimeSeconds: Math.min(Math.max(waitTimeSeconds, 0), SQS_MAX_WAIT_SECONDS),
      VisibilityTimeout: this.visibilityTimeout,
      MessageSystemAttributeNames: ['ApproximateReceiveCount'],
      MessageAttributeNames: ['All'],
    });

    const response = await this.client.send(command);

    if (!response.Messages || response.Messages.length === 0) {
      return [];
    }

    const envelopes: SqsMessageEnvelope[] = [];
    for (const message of response.Messages) {
      if (!message.ReceiptHandle || !message.MessageId) {
        this.logger.warn({ messageId: message.MessageId }, 'Skipping message without receipt handle');
        continue;
      }

      envelopes.push({
        message,
        body: message.Body ?? '',
        receiptHandle: message.ReceiptHandle,
        messageId: message.MessageId,
        approximateReceiveCount: parseInt(
          message.Attributes?.ApproximateReceiveCount || '1',
          10,
        ),
      });
    }

    return envelopes;
  }

  async deleteMessage(queueUrl: string, receiptHandle: string): Promise<SqsDeleteResult> {
    try {
      await this.client.send(
        new DeleteMessageCommand({
          QueueUrl: queueUrl,
          ReceiptHandle: receiptHandle,
        }),
      );
      return { messageId: receiptHandle, success: true };
    } catch (error) {
      this.logger.error({ error, receiptHandle }, 'Failed to delete message');
      return {
        messageId: receiptHandle,
        success: false,
        error: error instanceof Error ? error : new Error(String(error)),
      };
    }
  }

  /**
   * Send a message. Objects are serialised as JSON, strings are sent as is.
   */
  async sendMessage(
    queueUrl: string,
    body: string | object,
    options?: SqsSendOptions,
  ): Promise<SqsSendResult> {
    const command = new SendMessageCommand({
      QueueUrl: queueUrl,
      MessageBody: typeof body === 'string' ? body : JSON.stringify(body),
      DelaySeconds: options?.delaySeconds,
      MessageGroupId: options?.messageGroupId,
      MessageDeduplicationId: options?.messageDeduplicationId,
      MessageAttributes: options?.attributes && this.toMessageAttributes(options.attributes),
    });

    const response = await this.client.send(command);

    if (!response.MessageId) {
      throw new Error(`SQS did not return a message id for ${queueUrl}`);
    }

    return {
      messageId: response.MessageId,
      sequenceNumber: response.SequenceNumber,
    };
  }

  async changeVisibility(
    queueUrl: string,
    receiptHandle: string,
    visibilityTimeout: number,
  ): Promise<void> {
    await this.client.send(
      new ChangeMessageVisibilityCommand({
        QueueUrl: queueUrl,
        ReceiptHandle: receiptHandle,
        VisibilityTimeout: visibilityTimeout,
      }),
    );
  }

  private toMessageAttributes(
    attributes: Record<string, string>,
  ): Record<string, MessageAttributeValue> {
    const result: Record<string, MessageAttributeValue> = {};
    for (const [name, value] of Object.entries(attributes)) {
      result[name] = { DataType: 'String', StringValue: value };
    }
    return result;
  }

  onModuleDestroy() {
    this.client.destroy();
  }
}
