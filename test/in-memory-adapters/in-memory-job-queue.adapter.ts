import { Injectable } from '@nestjs/common';
import { v4 as uuidv4 } from 'uuid';
import { setTimeout as sleep } from 'timers/promises';
import type {
  JobQueuePort,
  LeasedMessage,
  PoisonRecord,
  WorkMessage,
} from '../../src/application/ports/output/job-queue.port';
import { toWorkMessageDto } from '../../src/application/dto/work-message.dto';
import { CollaboratorUnavailableError } from '../../src/domain/errors/pipeline.errors';

interface InternalQueueMessage {
  messageId: string;
  body: string;
  receiveCount: number;
  leaseId: string | null;
}

type QueueOperation = 'send' | 'receive' | 'complete' | 'abandon' | 'publishPoison';

/**
 * In-Memory Job Queue Adapter
 * Simulates SQS lease semantics: a received message stays invisible until it
 * is completed, abandoned or its lease is expired through `expireLeases`
 */
@Injectable()
export class InMemoryJobQueueAdapter implements JobQueuePort {
  private messages: InternalQueueMessage[] = [];
  private poisonRecords: PoisonRecord[] = [];
  private completedMessages: string[] = [];
  private abandonedMessages: string[] = [];
  private failures: Map<QueueOperation, Error> = new Map();
  private emptyReceiveDelayMs = 5;

  async send(message: WorkMessage): Promise<string> {
    this.throwIfFailing('send');
    return this.enqueue(JSON.stringify(toWorkMessageDto(message)));
  }

  async receive(maxCount: number, maxWaitSeconds: number): Promise<LeasedMessage[]> {
    this.throwIfFailing('receive');

    const visible = this.messages.filter((msg) => msg.leaseId === null).slice(0, maxCount);
    if (visible.length === 0) {
      // Stand-in for long polling
      if (maxWaitSeconds > 0) {
        await sleep(this.emptyReceiveDelayMs);
      }
      return [];
    }

    return visible.map((msg) => {
      msg.receiveCount++;
      msg.leaseId = uuidv4();
      return {
        messageId: msg.messageId,
        body: msg.body,
        leaseId: msg.leaseId,
        deliveryCount: msg.receiveCount - 1,
      };
    });
  }

  async complete(lease: LeasedMessage): Promise<void> {
    this.throwIfFailing('complete');
    const index = this.messages.findIndex((msg) => msg.leaseId === lease.leaseId);
    if (index !== -1) {
      this.messages.splice(index, 1);
      this.completedMessages.push(lease.messageId);
    }
  }

  async abandon(lease: LeasedMessage): Promise<void> {
    this.throwIfFailing('abandon');
    const message = this.messages.find((msg) => msg.leaseId === lease.leaseId);
    if (message) {
      message.leaseId = null;
      this.abandonedMessages.push(lease.messageId);
    }
  }

  async publishPoison(record: PoisonRecord): Promise<void> {
    this.throwIfFailing('publishPoison');
    this.poisonRecords.push(record);
  }

  // Test helper methods

  /**
   * Put a raw body on the queue, as another producer would
   */
  enqueue(body: string, receiveCount = 0): string {
    const messageId = uuidv4();
    this.messages.push({ messageId, body, receiveCount, leaseId: null });
    return messageId;
  }

  /**
   * Simulate lease expiry: every leased message becomes visible again
   */
  expireLeases(): void {
    for (const msg of this.messages) {
      msg.leaseId = null;
    }
  }

  failOn(operation: QueueOperation, error?: Error): void {
    this.failures.set(
      operation,
      error ?? new CollaboratorUnavailableError('job-queue', operation, new Error('broker offline')),
    );
  }

  recover(operation?: QueueOperation): void {
    if (operation) {
      this.failures.delete(operation);
    } else {
      this.failures.clear();
    }
  }

  getMessageBodies(): string[] {
    return this.messages.map((msg) => msg.body);
  }

  getMessageCount(): number {
    return this.messages.length;
  }

  getVisibleMessageCount(): number {
    return this.messages.filter((msg) => msg.leaseId === null).length;
  }

  getLeasedMessageCount(): number {
    return this.messages.filter((msg) => msg.leaseId !== null).length;
  }

  getPoisonRecords(): PoisonRecord[] {
    return [...this.poisonRecords];
  }

  getCompletedMessages(): string[] {
    return [...this.completedMessages];
  }

  getAbandonedMessages(): string[] {
    return [...this.abandonedMessages];
  }

  setEmptyReceiveDelay(delayMs: number): void {
    this.emptyReceiveDelayMs = delayMs;
  }

  clear(): void {
    this.messages = [];
    this.poisonRecords = [];
    this.completedMessages = [];
    this.abandonedMessages = [];
    this.failures.clear();
  }

  private throwIfFailing(operation: QueueOperation): void {
    const error = this.failures.get(operation);
    if (error) {
      throw error;
    }
  }
}
