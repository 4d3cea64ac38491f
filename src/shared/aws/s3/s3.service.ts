import { Injectable, OnModuleDestroy } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { S3Client, GetObjectCommand } from '@aws-sdk/client-s3';
import { Upload } from '@aws-sdk/lib-storage';
import { Readable } from 'stream';
import { AppConfig } from '../../../config/configuration';
import { PinoLoggerService } from '../../logging/pino-logger.service';

export interface UploadOptions {
  contentType?: string;
  metadata?: Record<string, string>;
  cacheControl?: string;
}

@Injectable()
export class S3Service implements OnModuleDestroy {
  private readonly client: S3Client;
  private readonly bucketName: string;
  private readonly logger: PinoLoggerService;

  constructor(
    private readonly configService: ConfigService<AppConfig>,
    logger: PinoLoggerService,
  ) {
    const awsConfig = this.configService.getOrThrow('aws', { infer: true });
    const s3Config = this.configService.getOrThrow('s3', { infer: true });

    this.client = new S3Client({
      region: awsConfig.region,
      ...(awsConfig.endpoint && { endpoint: awsConfig.endpoint, forcePathStyle: true }),
      ...(awsConfig.credentials && { credentials: awsConfig.credentials }),
    });

    this.bucketName = s3Config.bucketName;
    this.logger = logger.forContext(S3Service.name);
  }

  get bucket(): string {
    return this.bucketName;
  }

  /**
   * Upload a buffer. Re-uploading the same key overwrites the object.
   */
  async uploadBuffer(
    key: string,
    buffer: Buffer,
    options?: UploadOptions,
  ): Promise<{ key: string; etag: string; size: number }> {
    const upload = new Upload({
      client: this.client,
      params: {
        Bucket: this.bucketName,
        Key: key,
        Body: Readable.from(buffer),
        ContentType: options?.contentType,
        Metadata: options?.metadata,
        CacheControl: options?.cacheControl,
      },
      queueSize: 4,
      partSize: 10 * 1024 * 1024, // 10MB parts
      leavePartsOnError: false,
    });

    upload.on('httpUploadProgress', (progress) => {
      this.logger.debug(
        { key, loaded: progress.loaded, total: progress.total },
        'Upload progress',
      );
    });

    const result = await upload.done();

    this.logger.info({ key, size: buffer.length }, 'Buffer uploaded successfully');

    return {
      key,
      etag: result.ETag || '',
      size: buffer.length,
    };
  }

  async getObjectBuffer(key: string): Promise<Buffer> {
    const response = await this.client.send(
      new GetObjectCommand({
        Bucket: this.bucketName,
        Key: key,
      }),
    );

    if (!response.Body) {
      throw new Error(`S3 object ${key} has no body`);
    }

    const bytes = await response.Body.transformToByteArray();
    this.logger.debug({ key, size: bytes.byteLength }, 'Object retrieved');

    return Buffer.from(bytes);
  }

  onModuleDestroy() {
    this.client.destroy();
  }
}
