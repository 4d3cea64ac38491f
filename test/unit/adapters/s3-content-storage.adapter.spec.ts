import { describe, it, expect, beforeEach, vi } from 'vitest';
import { GetObjectCommand } from '@aws-sdk/client-s3';
import { Upload } from '@aws-sdk/lib-storage';
import { S3ContentStorageAdapter } from '../../../src/infrastructure/adapters/storage/s3-content-storage.adapter';
import { S3Service } from '../../../src/shared/aws/s3/s3.service';
import { CollaboratorUnavailableError } from '../../../src/domain/errors/pipeline.errors';
import { createConfigService, createTestLogger } from '../helpers/mock-factories';

const { send, done } = vi.hoisted(() => ({ send: vi.fn(), done: vi.fn() }));

vi.mock('@aws-sdk/client-s3', async (importOriginal) => {
  const actual = await importOriginal<typeof import('@aws-sdk/client-s3')>();
  return { ...actual, S3Client: vi.fn(() => ({ send, destroy: vi.fn() })) };
});

vi.mock('@aws-sdk/lib-storage', () => ({
  Upload: vi.fn(() => ({ on: vi.fn(), done })),
}));

describe('S3ContentStorageAdapter', () => {
  let storage: S3ContentStorageAdapter;

  beforeEach(() => {
    send.mockReset();
    done.mockReset();
    vi.mocked(Upload).mockClear();
    const configService = createConfigService();
    storage = new S3ContentStorageAdapter(
      new S3Service(configService, createTestLogger(configService)),
    );
  });

  describe('put', () => {
    it('should upload to the bucket and return the key as ref', async () => {
      done.mockResolvedValue({ ETag: '"etag-1"' });

      const ref = await storage.put('results/abc.txt', Buffer.from('hello'), {
        contentType: 'text/plain; charset=utf-8',
        metadata: { job_id: 'abc' },
      });

      expect(ref).toBe('results/abc.txt');
      const { params } = vi.mocked(Upload).mock.calls[0][0];
      expect(params).toMatchObject({
        Bucket: 'test-bucket',
        Key: 'results/abc.txt',
        ContentType: 'text/plain; charset=utf-8',
        Metadata: { job_id: 'abc' },
      });
    });

    it('should wrap upload failures', async () => {
      done.mockRejectedValue(new Error('access denied'));

      await expect(storage.put('results/abc.txt', Buffer.from('x'))).rejects.toThrow(
        new CollaboratorUnavailableError('content-store', 'put', new Error('access denied')),
      );
    });
  });

  describe('get', () => {
    it('should read the object body into a buffer', async () => {
      send.mockResolvedValue({
        Body: { transformToByteArray: async () => new Uint8Array([104, 105]) },
      });

      const content = await storage.get('uploads/abc.png');

      expect(content.toString('utf8')).toBe('hi');
      const command = send.mock.calls[0][0];
      expect(command).toBeInstanceOf(GetObjectCommand);
      expect(command.input).toEqual({ Bucket: 'test-bucket', Key: 'uploads/abc.png' });
    });

    it('should treat a missing body as unavailable content', async () => {
      send.mockResolvedValue({});

      await expect(storage.get('uploads/abc.png')).rejects.toThrow(
        'content-store get failed: S3 object uploads/abc.png has no body',
      );
    });
  });
});
