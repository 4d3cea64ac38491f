import { z } from 'zod';
import type { WorkMessage } from '../ports/output/job-queue.port';
import { MalformedMessageError } from '../../domain/errors/pipeline.errors';

/**
 * Wire format of a work message. Field names are snake_case on the queue.
 */
export const WorkMessageSchema = z.object({
  job_id: z.string().regex(/^[0-9a-f]{64}$/, 'job_id must be a SHA-256 hex digest'),
  content_ref: z.string().min(1),
  source_name: z.string().min(1),
  created_at: z.string().min(1),
  size_bytes: z.number().int().nonnegative(),
});

export type WorkMessageDto = z.infer<typeof WorkMessageSchema>;

export function toWorkMessageDto(message: WorkMessage): WorkMessageDto {
  return {
    job_id: message.jobId,
    content_ref: message.contentRef,
    source_name: message.sourceName,
    created_at: message.createdAt,
    size_bytes: message.sizeBytes,
  };
}

/**
 * Decode a raw message body. Anything that is not valid JSON matching the
 * schema is a `MalformedMessageError`.
 */
export function parseWorkMessage(body: string): WorkMessage {
  let data: unknown;
  try {
    data = JSON.parse(body);
  } catch (error) {
    throw new MalformedMessageError('Message body is not valid JSON', {
      reason: error instanceof Error ? error.message : String(error),
    });
  }

  const result = WorkMessageSchema.safeParse(data);
  if (!result.success) {
    throw new MalformedMessageError('Message body does not match the work message schema', {
      issues: result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
    });
  }

  return {
    jobId: result.data.job_id,
    contentRef: result.data.content_ref,
    sourceName: result.data.source_name,
    createdAt: result.data.created_at,
    sizeBytes: result.data.size_bytes,
  };
}
