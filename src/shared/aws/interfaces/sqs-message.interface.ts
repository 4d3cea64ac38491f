import { Message } from '@aws-sdk/client-sqs';

/**
 * A received SQS message. The body is left as the raw string; consumers
 * validate it themselves.
 */
export interface SqsMessageEnvelope {
  message: Message;
  body: string;
  receiptHandle: string;
  messageId: string;
  approximateReceiveCount: number;
}

export interface SqsDeleteResult {
  messageId: string;
  success: boolean;
  error?: Error;
}

export interface SqsSendResult {
  messageId: string;
  sequenceNumber?: string;
}

export interface SqsSendOptions {
  delaySeconds?: number;
  messageGroupId?: string;
  messageDeduplicationId?: string;
  /** String-typed message attributes. */
  attributes?: Record<string, string>;
}
