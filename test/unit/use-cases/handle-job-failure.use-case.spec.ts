import { describe, it, expect, beforeEach } from 'vitest';
import { HandleJobFailureUseCase } from '../../../src/application/use-cases/handle-job-failure.use-case';
import type { LeasedMessage } from '../../../src/application/ports/output/job-queue.port';
import { JobStatus } from '../../../src/domain/value-objects/job-status.vo';
import {
  InvalidInputError,
  PipelineErrorCode,
  TransformError,
} from '../../../src/domain/errors/pipeline.errors';
import { JobPoisonedEvent } from '../../../src/domain/events/job-poisoned.event';
import {
  InMemoryEventPublisherAdapter,
  InMemoryJobQueueAdapter,
  InMemoryJobRecordRepositoryAdapter,
} from '../../in-memory-adapters';
import { ConfigOverrides, createConfigService } from '../helpers/mock-factories';

const JOB_ID = 'ba7816bf8f01cfea414140de5dae2223b00361a396177a9cb410ff61f20015ad';

describe('HandleJobFailureUseCase', () => {
  let repository: InMemoryJobRecordRepositoryAdapter;
  let queue: InMemoryJobQueueAdapter;
  let events: InMemoryEventPublisherAdapter;
  let useCase: HandleJobFailureUseCase;

  const createUseCase = (overrides: ConfigOverrides = {}) =>
    new HandleJobFailureUseCase(repository, queue, events, createConfigService(overrides));

  const leaseAt = async (deliveryCount: number): Promise<LeasedMessage> => {
    queue.enqueue('{"job_id":"..."}', deliveryCount);
    const [lease] = await queue.receive(1, 0);
    return lease;
  };

  beforeEach(async () => {
    repository = new InMemoryJobRecordRepositoryAdapter();
    queue = new InMemoryJobQueueAdapter();
    events = new InMemoryEventPublisherAdapter();
    useCase = createUseCase();

    await repository.mergeUpdate(JOB_ID, { status: JobStatus.PROCESSING, incrementAttempts: true });
  });

  describe('retry', () => {
    it('should abandon the lease while attempts remain', async () => {
      const lease = await leaseAt(2);

      const result = await useCase.execute({
        lease,
        jobId: JOB_ID,
        error: new TransformError('blurry scan'),
      });

      expect(result).toEqual({
        outcome: 'retried',
        errorDetail: 'TRANSFORM_FAILED: blurry scan',
        leaseSettled: true,
      });
      expect(queue.getVisibleMessageCount()).toBe(1);
      expect(queue.getPoisonRecords()).toEqual([]);
      expect(repository.get(JOB_ID)?.status).toBe(JobStatus.FAILED);
      expect(events.getEventNames()).toEqual(['job.failed']);
    });

    it('should leave the lease to expire when it cannot be abandoned', async () => {
      const lease = await leaseAt(0);
      queue.failOn('abandon');

      const result = await useCase.execute({
        lease,
        jobId: JOB_ID,
        error: new TransformError('blurry scan'),
      });

      expect(result.outcome).toBe('retried');
      expect(result.leaseSettled).toBe(false);
      expect(queue.getLeasedMessageCount()).toBe(1);
    });
  });

  describe('poison', () => {
    it('should poison a retryable error on the last allowed delivery', async () => {
      const lease = await leaseAt(3);

      const result = await useCase.execute({
        lease,
        jobId: JOB_ID,
        error: new TransformError('blurry scan'),
      });

      expect(result).toEqual({
        outcome: 'poisoned',
        errorDetail: 'MAX_RETRIES_EXCEEDED: Gave up after 4 attempts (max retries 3): blurry scan',
        leaseSettled: true,
      });
      expect(queue.getMessageCount()).toBe(0);
      expect(queue.getPoisonRecords()).toEqual([
        {
          originalMessageId: lease.messageId,
          originalBody: '{"job_id":"..."}',
          jobId: JOB_ID,
          errorCode: PipelineErrorCode.MAX_RETRIES_EXCEEDED,
          errorDetail: result.errorDetail,
          deliveryCount: 3,
          failedAt: expect.any(String),
        },
      ]);
    });

    it('should poison a non-retryable error on the first delivery', async () => {
      const lease = await leaseAt(0);

      const result = await useCase.execute({
        lease,
        jobId: JOB_ID,
        error: new InvalidInputError('unreadable header'),
      });

      expect(result.outcome).toBe('poisoned');
      expect(result.errorDetail).toBe('INVALID_INPUT: unreadable header');
      expect(repository.get(JOB_ID)?.errorDetail).toBe('INVALID_INPUT: unreadable header');

      const [event] = events.getEventsByType('job.poisoned');
      expect(event).toBeInstanceOf(JobPoisonedEvent);
      expect(event.jobId).toBe(JOB_ID);
    });

    it('should poison on the first failure when retries are disabled', async () => {
      useCase = createUseCase({ failurePolicy: { maxRetries: 0 } });
      const lease = await leaseAt(0);

      const result = await useCase.execute({
        lease,
        jobId: JOB_ID,
        error: new TransformError('blurry scan'),
      });

      expect(result.outcome).toBe('poisoned');
    });

    it('should keep the message when the poison record cannot be published', async () => {
      const lease = await leaseAt(3);
      queue.failOn('publishPoison');

      const result = await useCase.execute({
        lease,
        jobId: JOB_ID,
        error: new TransformError('blurry scan'),
      });

      expect(result.outcome).toBe('retried');
      expect(result.leaseSettled).toBe(false);
      expect(queue.getMessageCount()).toBe(1);
      expect(queue.getCompletedMessages()).toEqual([]);
    });

    it('should report an unsettled lease when the completion fails after poisoning', async () => {
      const lease = await leaseAt(3);
      queue.failOn('complete');

      const result = await useCase.execute({
        lease,
        jobId: JOB_ID,
        error: new TransformError('blurry scan'),
      });

      expect(result.outcome).toBe('poisoned');
      expect(result.leaseSettled).toBe(false);
      expect(queue.getPoisonRecords()).toHaveLength(1);
    });
  });

  it('should never throw when the status store is down', async () => {
    const lease = await leaseAt(0);
    repository.failOn('mergeUpdate');
    events.setFailing(true);

    const result = await useCase.execute({
      lease,
      jobId: JOB_ID,
      error: new TransformError('blurry scan'),
    });

    expect(result.outcome).toBe('retried');
    expect(result.leaseSettled).toBe(true);
  });
});
