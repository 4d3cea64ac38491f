import { z } from 'zod';
import { ConfigurationError } from '../domain/errors/pipeline.errors';

const booleanFromString = z
  .enum(['true', 'false', '1', '0'])
  .transform((value) => value === 'true' || value === '1');

export const envSchema = z.object({
  // Core
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error', 'silent']).default('info'),

  // AWS
  AWS_REGION: z.string().default('us-east-1'),
  AWS_ACCESS_KEY_ID: z.string().optional(),
  AWS_SECRET_ACCESS_KEY: z.string().optional(),
  AWS_ENDPOINT: z.string().url().optional(), // For LocalStack

  // SQS
  SQS_JOBS_QUEUE_URL: z.string().url(),
  SQS_POISON_QUEUE_URL: z.string().url(),
  SQS_VISIBILITY_TIMEOUT: z.coerce.number().min(0).max(43200).default(300),

  // DynamoDB
  DYNAMODB_TABLE_NAME: z.string().default('transform-jobs'),
  DYNAMODB_PARTITION: z.string().min(1).default('jobs'),

  // S3
  S3_BUCKET_NAME: z.string().min(1),
  S3_UPLOAD_PREFIX: z.string().default('uploads/'),
  S3_RESULT_PREFIX: z.string().default('results/'),

  // Ingestion
  MAX_UPLOAD_BYTES: z.coerce.number().int().positive().default(10 * 1024 * 1024),
  // The built-in engine extracts printable text; image types such as .png
  // only make sense with an OCR engine behind TransformEngineFactory.
  ALLOWED_EXTENSIONS: z
    .string()
    .default('.txt')
    .transform((value) =>
      value
        .split(',')
        .map((ext) => ext.trim().toLowerCase())
        .filter((ext) => ext.length > 0)
        .map((ext) => (ext.startsWith('.') ? ext : `.${ext}`)),
    ),

  // Failure policy
  MAX_RETRIES: z.coerce.number().int().min(0).default(3),

  // Scheduler
  SCHEDULER_ENABLED: booleanFromString.default('true'),
  WORKER_CONCURRENCY: z.coerce.number().int().min(1).max(64).default(4),
  RECEIVE_BATCH_SIZE: z.coerce.number().int().min(1).max(10).default(10),
  RECEIVE_WAIT_SECONDS: z.coerce.number().int().min(0).max(20).default(5),
  RECEIVE_ERROR_BACKOFF_MS: z.coerce.number().int().min(0).default(5000),
  DRAIN_TIMEOUT_MS: z.coerce.number().int().min(0).default(30000),

  // Engine pool
  ENGINE_POOL_SIZE: z.coerce.number().int().min(1).max(64).default(4),
  ENGINE_ACQUIRE_TIMEOUT_MS: z.coerce.number().int().min(0).default(30000),
  ENGINE_INIT_TIMEOUT_MS: z.coerce.number().int().min(1).default(5000),
  TRANSFORM_TIMEOUT_MS: z.coerce.number().int().min(0).default(0),
  MIN_TEXT_RUN_LENGTH: z.coerce.number().int().min(1).default(3),
});

export type EnvConfig = z.infer<typeof envSchema>;

export function validateEnv(config: Record<string, unknown>): EnvConfig {
  const result = envSchema.safeParse(config);

  if (!result.success) {
    const errors = result.error.errors
      .map((e) => `  - ${e.path.join('.')}: ${e.message}`)
      .join('\n');
    throw new ConfigurationError(`Environment validation failed:\n${errors}`);
  }

  return result.data;
}
