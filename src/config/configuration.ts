/**
 * Application Configuration
 *
 * Loads environment variables, validates them with the zod schema in
 * `validation.schema.ts` and shapes them into a typed `AppConfig`.
 *
 * ## Usage:
 * ```typescript
 * constructor(private configService: ConfigService<AppConfig>) {}
 *
 * const scheduler = this.configService.getOrThrow('scheduler', { infer: true });
 * ```
 *
 * @module Configuration
 */

import { validateEnv, EnvConfig } from './validation.schema';

/**
 * Application configuration interface, grouped by collaborator.
 */
export interface AppConfig {
  nodeEnv: string;
  logLevel: string;
  aws: {
    region: string;
    endpoint?: string;
    credentials?: {
      accessKeyId: string;
      secretAccessKey: string;
    };
  };
  sqs: {
    jobsQueueUrl: string;
    poisonQueueUrl: string;
    visibilityTimeout: number;
  };
  dynamodb: {
    tableName: string;
    partition: string;
  };
  s3: {
    bucketName: string;
    uploadPrefix: string;
    resultPrefix: string;
  };
  ingestion: {
    maxUploadBytes: number;
    allowedExtensions: string[];
  };
  failurePolicy: {
    maxRetries: number;
  };
  /**
   * Worker pool scheduler.
   *
   * ### concurrency (WORKER_CONCURRENCY)
   * Fixed number of worker slots. The scheduler never holds more leases than
   * this, so it is also the in-memory backpressure bound.
   *
   * ### receiveBatchSize (RECEIVE_BATCH_SIZE)
   * Upper bound per receive call (SQS allows at most 10). The effective batch
   * is `min(freeSlots, receiveBatchSize)`.
   *
   * ### receiveWaitSeconds (RECEIVE_WAIT_SECONDS)
   * Long-poll wait. A receive returns empty after this instead of hanging.
   *
   * ### drainTimeoutMs (DRAIN_TIMEOUT_MS)
   * How long shutdown waits for in-flight jobs before giving up. Leases left
   * behind expire and are redelivered by the broker.
   */
  scheduler: {
    enabled: boolean;
    concurrency: number;
    receiveBatchSize: number;
    receiveWaitSeconds: number;
    receiveErrorBackoffMs: number;
    drainTimeoutMs: number;
  };
  /**
   * Transform engine pool.
   *
   * ### size (ENGINE_POOL_SIZE)
   * Number of engine handles created at startup. Usually equal to the worker
   * concurrency: fewer makes workers wait on acquisition, more leaves handles
   * idle.
   *
   * ### acquireTimeoutMs (ENGINE_ACQUIRE_TIMEOUT_MS)
   * Deadline for checking out a handle. Expiry fails the attempt with
   * POOL_EXHAUSTED, which the failure policy retries.
   *
   * ### transformTimeoutMs (TRANSFORM_TIMEOUT_MS)
   * Hard wall-clock ceiling for one transform, 0 disables it.
   */
  enginePool: {
    size: number;
    acquireTimeoutMs: number;
    initTimeoutMs: number;
    transformTimeoutMs: number;
    minTextRunLength: number;
  };
}

export function buildConfig(env: EnvConfig): AppConfig {
  const config: AppConfig = {
    nodeEnv: env.NODE_ENV,
    logLevel: env.LOG_LEVEL,
    aws: {
      region: env.AWS_REGION,
      endpoint: env.AWS_ENDPOINT,
    },
    sqs: {
      jobsQueueUrl: env.SQS_JOBS_QUEUE_URL,
      poisonQueueUrl: env.SQS_POISON_QUEUE_URL,
      visibilityTimeout: env.SQS_VISIBILITY_TIMEOUT,
    },
    dynamodb: {
      tableName: env.DYNAMODB_TABLE_NAME,
      partition: env.DYNAMODB_PARTITION,
    },
    s3: {
      bucketName: env.S3_BUCKET_NAME,
      uploadPrefix: env.S3_UPLOAD_PREFIX,
      resultPrefix: env.S3_RESULT_PREFIX,
    },
    ingestion: {
      maxUploadBytes: env.MAX_UPLOAD_BYTES,
      allowedExtensions: env.ALLOWED_EXTENSIONS,
    },
    failurePolicy: {
      maxRetries: env.MAX_RETRIES,
    },
    scheduler: {
      enabled: env.SCHEDULER_ENABLED,
      concurrency: env.WORKER_CONCURRENCY,
      receiveBatchSize: env.RECEIVE_BATCH_SIZE,
      receiveWaitSeconds: env.RECEIVE_WAIT_SECONDS,
      receiveErrorBackoffMs: env.RECEIVE_ERROR_BACKOFF_MS,
      drainTimeoutMs: env.DRAIN_TIMEOUT_MS,
    },
    enginePool: {
      size: env.ENGINE_POOL_SIZE,
      acquireTimeoutMs: env.ENGINE_ACQUIRE_TIMEOUT_MS,
      initTimeoutMs: env.ENGINE_INIT_TIMEOUT_MS,
      transformTimeoutMs: env.TRANSFORM_TIMEOUT_MS,
      minTextRunLength: env.MIN_TEXT_RUN_LENGTH,
    },
  };

  // Add AWS credentials only if explicitly provided
  if (env.AWS_ACCESS_KEY_ID && env.AWS_SECRET_ACCESS_KEY) {
    config.aws.credentials = {
      accessKeyId: env.AWS_ACCESS_KEY_ID,
      secretAccessKey: env.AWS_SECRET_ACCESS_KEY,
    };
  }

  return config;
}

export default (): AppConfig => buildConfig(validateEnv(process.env));
