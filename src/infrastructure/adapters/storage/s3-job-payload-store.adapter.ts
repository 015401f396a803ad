import { Logger } from '@nestjs/common';
import { JobPayloadStorePort } from '../../../application/ports/output/job-payload-store.port';
import { ExportRequestPayload } from '../../../domain/value-objects/export-payload.vo';
import { StorageError } from '../../../domain/errors/export.errors';
import { S3Service } from '../../../shared/aws/s3/s3.service';
import { decodePayload, encodePayload, payloadKey } from './storage-layout';

/**
 * S3 Job Payload Store Adapter
 * One gzipped JSON object per job under `payloads/`.
 */
export class S3JobPayloadStoreAdapter implements JobPayloadStorePort {
  private readonly logger = new Logger(S3JobPayloadStoreAdapter.name);

  constructor(private readonly s3: S3Service) {}

  async put(jobId: string, payload: ExportRequestPayload): Promise<void> {
    try {
      await this.s3.upload(payloadKey(jobId), await encodePayload(payload), {
        contentType: 'application/json',
        contentEncoding: 'gzip',
      });
    } catch (error) {
      throw new StorageError(`Failed to store payload for job ${jobId}`, error);
    }
  }

  async get(jobId: string): Promise<ExportRequestPayload | null> {
    let bytes: Uint8Array | null;
    try {
      bytes = await this.s3.getObjectBytes(payloadKey(jobId));
    } catch (error) {
      throw new StorageError(`Failed to read payload for job ${jobId}`, error);
    }
    if (!bytes) {
      this.logger.debug(`No payload stored for job ${jobId}`);
      return null;
    }

    return decodePayload(bytes);
  }

  async delete(jobId: string): Promise<void> {
    try {
      await this.s3.deleteObject(payloadKey(jobId));
    } catch (error) {
      throw new StorageError(`Failed to delete payload for job ${jobId}`, error);
    }
  }
}
