import { Injectable } from '@nestjs/common';
import type {
  ContentStoragePort,
  PutContentOptions,
} from '../../src/application/ports/output/content-storage.port';
import { CollaboratorUnavailableError } from '../../src/domain/errors/pipeline.errors';

interface StoredObject {
  content: Buffer;
  contentType?: string;
  metadata?: Record<string, string>;
}

/**
 * In-Memory Content Storage Adapter
 * Refs are the object names, as with the S3 adapter
 */
@Injectable()
export class InMemoryContentStorageAdapter implements ContentStoragePort {
  private objects: Map<string, StoredObject> = new Map();
  private putCount = 0;
  private unavailable = false;

  async put(name: string, content: Buffer, options?: PutContentOptions): Promise<string> {
    if (this.unavailable) {
      throw new CollaboratorUnavailableError('content-store', 'put', new Error('store offline'));
    }
    this.putCount++;
    this.objects.set(name, {
      content: Buffer.from(content),
      contentType: options?.contentType,
      metadata: options?.metadata,
    });
    return name;
  }

  async get(ref: string): Promise<Buffer> {
    if (this.unavailable) {
      throw new CollaboratorUnavailableError('content-store', 'get', new Error('store offline'));
    }
    const stored = this.objects.get(ref);
    if (!stored) {
      throw new CollaboratorUnavailableError('content-store', 'get', new Error(`No object ${ref}`));
    }
    return Buffer.from(stored.content);
  }

  // Test helper methods

  setUnavailable(unavailable: boolean): void {
    this.unavailable = unavailable;
  }

  getObject(ref: string): StoredObject | undefined {
    return this.objects.get(ref);
  }

  getText(ref: string): string | undefined {
    return this.objects.get(ref)?.content.toString('utf8');
  }

  getKeys(): string[] {
    return Array.from(this.objects.keys());
  }

  getPutCount(): number {
    return this.putCount;
  }

  clear(): void {
    this.objects.clear();
    this.putCount = 0;
    this.unavailable = false;
  }
}
