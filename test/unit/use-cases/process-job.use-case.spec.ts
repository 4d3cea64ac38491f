import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { identityOf } from '../../../src/domain/value-objects/content-identity.vo';
import { JobStatus } from '../../../src/domain/value-objects/job-status.vo';
import { PipelineErrorCode, TransformError } from '../../../src/domain/errors/pipeline.errors';
import type { LeasedMessage } from '../../../src/application/ports/output/job-queue.port';
import { createPipeline, Pipeline } from '../helpers/pipeline';
import { SAMPLE_DOCUMENT } from '../helpers/mock-factories';

describe('ProcessJobUseCase', () => {
  let pipeline: Pipeline;
  const jobId = identityOf(SAMPLE_DOCUMENT);

  const submitAndLease = async (): Promise<LeasedMessage> => {
    await pipeline.submitDocument.execute({ content: SAMPLE_DOCUMENT, sourceName: 'report.txt' });
    const [lease] = await pipeline.queue.receive(1, 0);
    return lease;
  };

  const failingTransform = (message: string) => {
    pipeline.engineFactory.setBehavior(async () => {
      throw new TransformError(message);
    });
  };

  beforeEach(async () => {
    pipeline = createPipeline();
    await pipeline.enginePool.initialize();
  });

  afterEach(async () => {
    await pipeline.enginePool.shutdown();
  });

  describe('successful processing', () => {
    it('should transform the document, store the result and complete the lease', async () => {
      const lease = await submitAndLease();

      const result = await pipeline.processJob.execute(lease);

      expect(result).toEqual({ outcome: 'completed', jobId, resultRef: `results/${jobId}.txt` });
      expect(pipeline.storage.getText(`results/${jobId}.txt`)).toBe(
        'Quarterly report\nTotal 1200 units',
      );

      const record = pipeline.repository.get(jobId);
      expect(record?.status).toBe(JobStatus.COMPLETED);
      expect(record?.attempts).toBe(1);
      expect(record?.resultRef).toBe(`results/${jobId}.txt`);
      expect(record?.completedAt).toEqual(expect.any(String));
      expect(pipeline.repository.getStatusHistory(jobId)).toEqual([
        JobStatus.QUEUED,
        JobStatus.PROCESSING,
        JobStatus.COMPLETED,
      ]);

      expect(pipeline.queue.getMessageCount()).toBe(0);
      expect(pipeline.queue.getCompletedMessages()).toEqual([lease.messageId]);
      expect(pipeline.events.getEventNames()).toEqual(['job.queued', 'job.completed']);
      expect(pipeline.enginePool.getStats().checkedOut).toBe(0);
    });

    it('should create the record when the ingestion status write never landed', async () => {
      pipeline.repository.failOn('create');
      const lease = await submitAndLease();
      pipeline.repository.recover();

      const result = await pipeline.processJob.execute(lease);

      expect(result.outcome).toBe('completed');
      expect(pipeline.repository.getStatusHistory(jobId)).toEqual([
        JobStatus.PROCESSING,
        JobStatus.COMPLETED,
      ]);
      expect(pipeline.repository.get(jobId)?.sourceName).toBe('report.txt');
    });

    it('should complete even when the completed status cannot be written', async () => {
      const lease = await submitAndLease();
      pipeline.engineFactory.setBehavior(async () => {
        pipeline.repository.failOn('mergeUpdate');
        return 'text';
      });

      const result = await pipeline.processJob.execute(lease);

      expect(result.outcome).toBe('completed');
      expect(pipeline.queue.getMessageCount()).toBe(0);
      expect(pipeline.repository.get(jobId)?.status).toBe(JobStatus.PROCESSING);
    });
  });

  describe('duplicate deliveries', () => {
    it('should acknowledge a delivery of an already completed job without transforming it', async () => {
      const lease = await submitAndLease();
      await pipeline.processJob.execute(lease);
      pipeline.queue.enqueue(lease.body);
      const [duplicate] = await pipeline.queue.receive(1, 0);

      const result = await pipeline.processJob.execute(duplicate);

      expect(result).toEqual({ outcome: 'skipped', jobId, resultRef: `results/${jobId}.txt` });
      expect(pipeline.engineFactory.engines.reduce((sum, e) => sum + e.transformCount, 0)).toBe(1);
      expect(pipeline.queue.getMessageCount()).toBe(0);
    });
  });

  describe('failures', () => {
    it('should record the failure and hand a retryable error back to the queue', async () => {
      const lease = await submitAndLease();
      failingTransform('page unreadable');

      const result = await pipeline.processJob.execute(lease);

      expect(result).toEqual({ outcome: 'retried', jobId });
      expect(pipeline.repository.get(jobId)?.status).toBe(JobStatus.FAILED);
      expect(pipeline.repository.get(jobId)?.errorDetail).toBe('TRANSFORM_FAILED: page unreadable');
      expect(pipeline.queue.getVisibleMessageCount()).toBe(1);
      expect(pipeline.queue.getAbandonedMessages()).toEqual([lease.messageId]);
      expect(pipeline.events.getEventNames()).toEqual(['job.queued', 'job.failed']);
      expect(pipeline.enginePool.getStats().checkedOut).toBe(0);
    });

    it('should treat an unexpected error as retryable', async () => {
      const lease = await submitAndLease();
      pipeline.engineFactory.setBehavior(async () => {
        throw new Error('socket closed');
      });

      const result = await pipeline.processJob.execute(lease);

      expect(result.outcome).toBe('retried');
      expect(pipeline.repository.get(jobId)?.errorDetail).toBe(
        'COLLABORATOR_UNAVAILABLE: worker call failed: socket closed',
      );
    });

    it('should clear the error detail when a failed job is picked up again', async () => {
      const lease = await submitAndLease();
      failingTransform('page unreadable');
      await pipeline.processJob.execute(lease);

      pipeline.engineFactory.setBehavior(async () => 'second try');
      const [redelivery] = await pipeline.queue.receive(1, 0);
      const result = await pipeline.processJob.execute(redelivery);

      expect(redelivery.deliveryCount).toBe(1);
      expect(result.outcome).toBe('completed');
      const record = pipeline.repository.get(jobId);
      expect(record?.attempts).toBe(2);
      expect(record?.errorDetail).toBeUndefined();
      expect(pipeline.storage.getText(`results/${jobId}.txt`)).toBe('second try');
    });

    it('should retry when the uploaded content cannot be read', async () => {
      const lease = await submitAndLease();
      pipeline.storage.setUnavailable(true);

      const result = await pipeline.processJob.execute(lease);

      expect(result.outcome).toBe('retried');
      expect(pipeline.repository.get(jobId)?.errorDetail).toMatch(/^COLLABORATOR_UNAVAILABLE: /);
    });

    it('should retry when no engine frees up in time', async () => {
      pipeline = createPipeline({ enginePool: { size: 1, acquireTimeoutMs: 20 } });
      await pipeline.enginePool.initialize();
      const lease = await submitAndLease();
      const held = await pipeline.enginePool.acquire();

      const result = await pipeline.processJob.execute(lease);

      expect(result.outcome).toBe('retried');
      expect(pipeline.repository.get(jobId)?.errorDetail).toBe(
        'POOL_EXHAUSTED: No transform engine became available within 20ms (pool size 1)',
      );
      pipeline.enginePool.release(held);
    });

    it('should poison a malformed message without touching the status store', async () => {
      const messageId = pipeline.queue.enqueue('{"job_id":"not-a-hash"}');
      const [lease] = await pipeline.queue.receive(1, 0);

      const result = await pipeline.processJob.execute(lease);

      expect(result).toEqual({ outcome: 'poisoned', jobId: undefined });
      expect(pipeline.repository.count()).toBe(0);
      const [poison] = pipeline.queue.getPoisonRecords();
      expect(poison.originalMessageId).toBe(messageId);
      expect(poison.originalBody).toBe('{"job_id":"not-a-hash"}');
      expect(poison.jobId).toBeUndefined();
      expect(poison.errorCode).toBe(PipelineErrorCode.MALFORMED_MESSAGE);
      expect(pipeline.queue.getMessageCount()).toBe(0);
    });

    it('should poison a job once its retries are used up', async () => {
      await pipeline.submitDocument.execute({ content: SAMPLE_DOCUMENT, sourceName: 'report.txt' });
      const [body] = pipeline.queue.getMessageBodies();
      pipeline.queue.clear();
      pipeline.queue.enqueue(body, 3);
      const [lease] = await pipeline.queue.receive(1, 0);
      failingTransform('page unreadable');

      const result = await pipeline.processJob.execute(lease);

      expect(lease.deliveryCount).toBe(3);
      expect(result).toEqual({ outcome: 'poisoned', jobId });
      expect(pipeline.repository.get(jobId)?.errorDetail).toBe(
        'MAX_RETRIES_EXCEEDED: Gave up after 4 attempts (max retries 3): page unreadable',
      );
      expect(pipeline.queue.getPoisonRecords()[0].jobId).toBe(jobId);
    });
  });
});
