import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { AppConfig } from '../../../config/configuration';
import type {
  JobQueuePort,
  LeasedMessage,
  PoisonRecord,
  WorkMessage,
} from '../../../application/ports/output/job-queue.port';
import { toWorkMessageDto } from '../../../application/dto/work-message.dto';
import { CollaboratorUnavailableError } from '../../../domain/errors/pipeline.errors';
import { SqsService } from '../../../shared/aws/sqs/sqs.service';

const QUEUE = 'job-queue';

/**
 * SQS Job Queue Adapter
 * Implements JobQueuePort on the jobs queue and the poison queue.
 * A lease is the receipt handle of a received message.
 */
@Injectable()
export class SqsJobQueueAdapter implements JobQueuePort {
  private readonly logger = new Logger(SqsJobQueueAdapter.name);
  private readonly jobsQueueUrl: string;
  private readonly poisonQueueUrl: string;

  constructor(
    private readonly sqsService: SqsService,
    private readonly configService: ConfigService<AppConfig>,
  ) {
    const sqsConfig = this.configService.getOrThrow('sqs', { infer: true });
    this.jobsQueueUrl = sqsConfig.jobsQueueUrl;
    this.poisonQueueUrl = sqsConfig.poisonQueueUrl;
  }

  async send(message: WorkMessage): Promise<string> {
    const fifo = SqsService.isFifoQueue(this.jobsQueueUrl);

    try {
      const result = await this.sqsService.sendMessage(this.jobsQueueUrl, toWorkMessageDto(message), {
        attributes: { job_id: message.jobId },
        ...(fifo && {
          messageGroupId: message.jobId,
          messageDeduplicationId: message.jobId,
        }),
      });
      this.logger.debug(`Enqueued job ${message.jobId} as message ${result.messageId}`);
      return result.messageId;
    } catch (error) {
      throw new CollaboratorUnavailableError(QUEUE, 'send', error);
    }
  }

  async receive(maxCount: number, maxWaitSeconds: number): Promise<LeasedMessage[]> {
    try {
      const envelopes = await this.sqsService.receiveMessages(
        this.jobsQueueUrl,
        maxCount,
        maxWaitSeconds,
      );
      return envelopes.map((envelope) => ({
        messageId: envelope.messageId,
        body: envelope.body,
        leaseId: envelope.receiptHandle,
        deliveryCount: Math.max(envelope.approximateReceiveCount - 1, 0),
      }));
    } catch (error) {
      throw new CollaboratorUnavailableError(QUEUE, 'receive', error);
    }
  }

  async complete(lease: LeasedMessage): Promise<void> {
    const result = await this.sqsService.deleteMessage(this.jobsQueueUrl, lease.leaseId);
    if (!result.success) {
      throw new CollaboratorUnavailableError(QUEUE, 'complete', result.error);
    }
  }

  async abandon(lease: LeasedMessage): Promise<void> {
    try {
      await this.sqsService.changeVisibility(this.jobsQueueUrl, lease.leaseId, 0);
    } catch (error) {
      throw new CollaboratorUnavailableError(QUEUE, 'abandon', error);
    }
  }

  async publishPoison(record: PoisonRecord): Promise<void> {
    const fifo = SqsService.isFifoQueue(this.poisonQueueUrl);

    try {
      await this.sqsService.sendMessage(
        this.poisonQueueUrl,
        {
          original_message_id: record.originalMessageId,
          original_body: record.originalBody,
          job_id: record.jobId,
          error_code: record.errorCode,
          error_detail: record.errorDetail,
          delivery_count: record.deliveryCount,
          failed_at: record.failedAt,
        },
        {
          attributes: {
            original_message_id: record.originalMessageId,
            error: record.errorDetail,
            failed_at: record.failedAt,
          },
          ...(fifo && {
            messageGroupId: 'poison',
            messageDeduplicationId: `${record.originalMessageId}-${record.deliveryCount}`,
          }),
        },
      );
    } catch (error) {
      throw new CollaboratorUnavailableError('poison-queue', 'publish', error);
    }
    this.logger.warn(`Poisoned message ${record.originalMessageId} (${record.errorCode})`);
  }
}
