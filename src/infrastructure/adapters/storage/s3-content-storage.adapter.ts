import { Injectable } from '@nestjs/common';
import type {
  ContentStoragePort,
  PutContentOptions,
} from '../../../application/ports/output/content-storage.port';
import { CollaboratorUnavailableError } from '../../../domain/errors/pipeline.errors';
import { S3Service } from '../../../shared/aws/s3/s3.service';

/**
 * S3 Content Storage Adapter
 * Refs are object keys within the configured bucket.
 */
@Injectable()
export class S3ContentStorageAdapter implements ContentStoragePort {
  constructor(private readonly s3Service: S3Service) {}

  async put(name: string, content: Buffer, options?: PutContentOptions): Promise<string> {
    try {
      const result = await this.s3Service.uploadBuffer(name, content, options);
      return result.key;
    } catch (error) {
      throw new CollaboratorUnavailableError('content-store', 'put', error);
    }
  }

  async get(ref: string): Promise<Buffer> {
    try {
      return await this.s3Service.getObjectBuffer(ref);
    } catch (error) {
      throw new CollaboratorUnavailableError('content-store', 'get', error);
    }
  }
}
