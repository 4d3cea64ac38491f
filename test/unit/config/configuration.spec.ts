import { describe, it, expect } from 'vitest';
import { buildConfig } from '../../../src/config/configuration';
import { validateEnv } from '../../../src/config/validation.schema';
import { ConfigurationError } from '../../../src/domain/errors/pipeline.errors';

const requiredEnv = {
  SQS_JOBS_QUEUE_URL: 'https://sqs.us-east-1.amazonaws.com/000000000000/jobs',
  SQS_POISON_QUEUE_URL: 'https://sqs.us-east-1.amazonaws.com/000000000000/poison',
  S3_BUCKET_NAME: 'documents',
};

describe('Configuration', () => {
  it('should apply defaults', () => {
    const config = buildConfig(validateEnv(requiredEnv));

    expect(config.failurePolicy.maxRetries).toBe(3);
    expect(config.ingestion.maxUploadBytes).toBe(10 * 1024 * 1024);
    expect(config.ingestion.allowedExtensions).toEqual(['.txt']);
    expect(config.scheduler).toEqual({
      enabled: true,
      concurrency: 4,
      receiveBatchSize: 10,
      receiveWaitSeconds: 5,
      receiveErrorBackoffMs: 5000,
      drainTimeoutMs: 30000,
    });
    expect(config.aws.credentials).toBeUndefined();
  });

  it('should normalise the allowed extensions', () => {
    const config = buildConfig(validateEnv({ ...requiredEnv, ALLOWED_EXTENSIONS: 'PDF, .Png,,txt' }));

    expect(config.ingestion.allowedExtensions).toEqual(['.pdf', '.png', '.txt']);
  });

  it('should coerce numeric and boolean variables', () => {
    const config = buildConfig(
      validateEnv({
        ...requiredEnv,
        MAX_RETRIES: '0',
        WORKER_CONCURRENCY: '8',
        SCHEDULER_ENABLED: 'false',
      }),
    );

    expect(config.failurePolicy.maxRetries).toBe(0);
    expect(config.scheduler.concurrency).toBe(8);
    expect(config.scheduler.enabled).toBe(false);
  });

  it('should only set credentials when both parts are given', () => {
    const partial = buildConfig(validateEnv({ ...requiredEnv, AWS_ACCESS_KEY_ID: 'test-key' }));
    const full = buildConfig(
      validateEnv({ ...requiredEnv, AWS_ACCESS_KEY_ID: 'test-key', AWS_SECRET_ACCESS_KEY: 'test-secret' }),
    );

    expect(partial.aws.credentials).toBeUndefined();
    expect(full.aws.credentials).toEqual({ accessKeyId: 'test-key', secretAccessKey: 'test-secret' });
  });

  it('should fail with a configuration error naming the bad variables', () => {
    expect(() => validateEnv({ S3_BUCKET_NAME: 'documents' })).toThrow(ConfigurationError);
    expect(() => validateEnv({ ...requiredEnv, WORKER_CONCURRENCY: '0' })).toThrow(
      /WORKER_CONCURRENCY/,
    );
  });
});
