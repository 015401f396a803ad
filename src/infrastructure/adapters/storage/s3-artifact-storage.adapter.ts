import { Logger } from '@nestjs/common';
import { GetObjectCommandOutput } from '@aws-sdk/client-s3';
import { Readable, Transform } from 'stream';
import { v4 as uuidv4 } from 'uuid';
import {
  ArtifactDescriptor,
  ArtifactReadHandle,
  ArtifactStoragePort,
  PutArtifactOptions,
} from '../../../application/ports/output/artifact-storage.port';
import { ArtifactNotFoundError, StorageError } from '../../../domain/errors/export.errors';
import { S3Service, isNoSuchKey } from '../../../shared/aws/s3/s3.service';
import { ARTIFACT_PREFIX, isArtifactRef } from './storage-layout';

const EXPIRES_AT_METADATA = 'expires-at';
const JOB_ID_METADATA = 'job-id';

/**
 * S3 Artifact Storage Adapter
 * Objects live at `artifacts/<ref>.zip` with their expiry in user metadata.
 */
export class S3ArtifactStorageAdapter implements ArtifactStoragePort {
  private readonly logger = new Logger(S3ArtifactStorageAdapter.name);

  constructor(
    private readonly s3: S3Service,
    private readonly ttlMs: number,
  ) {}

  async put(source: Buffer | Readable, options: PutArtifactOptions): Promise<ArtifactDescriptor> {
    const ref = uuidv4();
    const createdAt = new Date();
    const expiresAt = new Date(createdAt.getTime() + this.ttlMs);

    let size = Buffer.isBuffer(source) ? source.length : 0;
    let body: Buffer | Readable = source;
    if (!Buffer.isBuffer(source)) {
      const tracker = this.createSizeTrackingStream((bytes) => {
        size = bytes;
      });
      source.on('error', (error) => tracker.destroy(error));
      body = source.pipe(tracker);
    }

    try {
      await this.s3.upload(this.keyFor(ref), body, {
        contentType: options.contentType,
        metadata: {
          [EXPIRES_AT_METADATA]: expiresAt.toISOString(),
          [JOB_ID_METADATA]: options.jobId,
        },
      });
    } catch (error) {
      throw new StorageError(`Failed to upload artifact for job ${options.jobId}`, error);
    }

    this.logger.debug(`Uploaded artifact ${ref} for job ${options.jobId} (${size} bytes)`);
    return { ref, contentType: options.contentType, size, createdAt, expiresAt };
  }

  async get(ref: string): Promise<ArtifactReadHandle> {
    if (!isArtifactRef(ref)) {
      throw new ArtifactNotFoundError(ref);
    }

    let response: GetObjectCommandOutput;
    try {
      response = await this.s3.getObject(this.keyFor(ref));
    } catch (error) {
      if (isNoSuchKey(error)) {
        throw new ArtifactNotFoundError(ref);
      }
      throw new StorageError(`Failed to read artifact ${ref}`, error);
    }

    const body = response.Body;
    if (!(body instanceof Readable)) {
      throw new StorageError(`Artifact ${ref} returned no readable body`);
    }

    const expiresAtRaw = response.Metadata?.[EXPIRES_AT_METADATA];
    const expiresAt = expiresAtRaw
      ? new Date(expiresAtRaw)
      : new Date((response.LastModified ?? new Date()).getTime() + this.ttlMs);

    if (expiresAt.getTime() <= Date.now()) {
      body.destroy();
      throw new ArtifactNotFoundError(ref);
    }

    return {
      ref,
      stream: body,
      contentType: response.ContentType ?? 'application/octet-stream',
      size: response.ContentLength,
      expiresAt,
    };
  }

  async delete(ref: string): Promise<void> {
    if (!isArtifactRef(ref)) {
      return;
    }
    try {
      await this.s3.deleteObject(this.keyFor(ref));
    } catch (error) {
      throw new StorageError(`Failed to delete artifact ${ref}`, error);
    }
  }

  /**
   * Expiry is derived from LastModified; listing does not return metadata.
   */
  async purgeExpired(now: Date): Promise<number> {
    try {
      const objects = await this.s3.listObjects(ARTIFACT_PREFIX);
      const expired = objects
        .filter((object) => object.lastModified.getTime() + this.ttlMs <= now.getTime())
        .map((object) => object.key);

      await this.s3.deleteObjects(expired);
      if (expired.length > 0) {
        this.logger.log(`Purged ${expired.length} expired artifact(s)`);
      }
      return expired.length;
    } catch (error) {
      throw new StorageError('Failed to purge expired artifacts', error);
    }
  }

  private keyFor(ref: string): string {
    return `${ARTIFACT_PREFIX}${ref}.zip`;
  }

  private createSizeTrackingStream(onBytesProcessed: (bytes: number) => void): Transform {
    let bytesProcessed = 0;

    return new Transform({
      transform(chunk: Buffer, _encoding, callback) {
        bytesProcessed += chunk.length;
        onBytesProcessed(bytesProcessed);
        callback(null, chunk);
      },
    });
  }
}
