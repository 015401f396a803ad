import { Injectable, OnModuleDestroy } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import {
  S3Client,
  GetObjectCommand,
  GetObjectCommandOutput,
  DeleteObjectCommand,
  DeleteObjectsCommand,
  ListObjectsV2Command,
} from '@aws-sdk/client-s3';
import { Upload } from '@aws-sdk/lib-storage';
import { Readable } from 'stream';
import { AppConfig } from '../../../config/configuration';
import { PinoLoggerService } from '../../logging/pino-logger.service';

export interface UploadOptions {
  contentType?: string;
  contentEncoding?: string;
  metadata?: Record<string, string>;
}

export interface ListedObject {
  key: string;
  size: number;
  lastModified: Date;
}

export function isNoSuchKey(error: unknown): boolean {
  return (
    error instanceof Error && (error.name === 'NoSuchKey' || error.name === 'NotFound')
  );
}

@Injectable()
export class S3Service implements OnModuleDestroy {
  private readonly logger: PinoLoggerService;
  private readonly client: S3Client;
  private readonly bucketName: string;
  private readonly prefix: string;

  constructor(
    private readonly configService: ConfigService<AppConfig>,
    logger: PinoLoggerService,
  ) {
    const awsConfig = this.configService.getOrThrow('aws', { infer: true });
    const storageConfig = this.configService.getOrThrow('storage', { infer: true });

    this.client = new S3Client({
      region: awsConfig.region,
      ...(awsConfig.endpoint && { endpoint: awsConfig.endpoint, forcePathStyle: true }),
      ...(awsConfig.credentials && { credentials: awsConfig.credentials }),
    });

    this.bucketName = storageConfig.bucketName;
    this.prefix = storageConfig.prefix;

    this.logger = logger.forContext(S3Service.name);
  }

  /**
   * Multipart upload from a stream or buffer.
   */
  async upload(
    key: string,
    body: Readable | Buffer,
    options?: UploadOptions,
  ): Promise<{ key: string; etag: string }> {
    const fullKey = this.getFullKey(key);

    const upload = new Upload({
      client: this.client,
      params: {
        Bucket: this.bucketName,
        Key: fullKey,
        Body: body,
        ContentType: options?.contentType,
        ContentEncoding: options?.contentEncoding,
        Metadata: options?.metadata,
      },
      queueSize: 4,
      partSize: 10 * 1024 * 1024, // 10MB parts
      leavePartsOnError: false,
    });

    upload.on('httpUploadProgress', (progress) => {
      this.logger.debug(
        { key: fullKey, loaded: progress.loaded, total: progress.total },
        'Upload progress',
      );
    });

    const result = await upload.done();

    this.logger.info({ key: fullKey }, 'Object uploaded successfully');

    return {
      key: fullKey,
      etag: result.ETag || '',
    };
  }

  /**
   * Returns the raw GetObject response so callers can inspect metadata
   * before consuming the body stream.
   */
  async getObject(key: string): Promise<GetObjectCommandOutput> {
    const fullKey = this.getFullKey(key);

    const response = await this.client.send(
      new GetObjectCommand({
        Bucket: this.bucketName,
        Key: fullKey,
      }),
    );

    this.logger.debug({ key: fullKey }, 'Object stream retrieved');

    return response;
  }

  /**
   * Read a small object fully. Returns null when it does not exist.
   */
  async getObjectBytes(key: string): Promise<Uint8Array | null> {
    try {
      const response = await this.getObject(key);
      if (!response.Body) {
        return null;
      }
      return await response.Body.transformToByteArray();
    } catch (error) {
      if (isNoSuchKey(error)) {
        return null;
      }
      throw error;
    }
  }

  async deleteObject(key: string): Promise<void> {
    const fullKey = this.getFullKey(key);

    await this.client.send(
      new DeleteObjectCommand({
        Bucket: this.bucketName,
        Key: fullKey,
      }),
    );

    this.logger.info({ key: fullKey }, 'Object deleted');
  }

  /**
   * Delete multiple objects, batched at the S3 limit of 1000 keys per request.
   */
  async deleteObjects(keys: string[]): Promise<void> {
    if (keys.length === 0) {
      return;
    }

    const fullKeys = keys.map((key) => this.getFullKey(key));

    const BATCH_SIZE = 1000;
    for (let i = 0; i < fullKeys.length; i += BATCH_SIZE) {
      const batch = fullKeys.slice(i, i + BATCH_SIZE);

      await this.client.send(
        new DeleteObjectsCommand({
          Bucket: this.bucketName,
          Delete: {
            Objects: batch.map((key) => ({ Key: key })),
            Quiet: true,
          },
        }),
      );
    }

    this.logger.info({ count: fullKeys.length }, 'Objects deleted');
  }

  /**
   * List every object under `keyPrefix` (relative to the configured prefix).
   * Returned keys are relative too.
   */
  async listObjects(keyPrefix: string): Promise<ListedObject[]> {
    const fullPrefix = this.getFullKey(keyPrefix);
    const objects: ListedObject[] = [];
    let continuationToken: string | undefined;

    do {
      const response = await this.client.send(
        new ListObjectsV2Command({
          Bucket: this.bucketName,
          Prefix: fullPrefix,
          ContinuationToken: continuationToken,
        }),
      );

      for (const object of response.Contents ?? []) {
        if (object.Key && object.LastModified) {
          objects.push({
            key: object.Key.slice(this.prefix.length),
            size: object.Size ?? 0,
            lastModified: object.LastModified,
          });
        }
      }
      continuationToken = response.IsTruncated ? response.NextContinuationToken : undefined;
    } while (continuationToken);

    return objects;
  }

  private getFullKey(key: string): string {
    if (key.startsWith(this.prefix)) {
      return key;
    }
    return `${this.prefix}${key}`;
  }

  onModuleDestroy() {
    this.client.destroy();
  }
}
