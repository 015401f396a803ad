import { mkdir, readFile, rename, rm, writeFile } from 'fs/promises';
import { dirname, join } from 'path';
import { JobPayloadStorePort } from '../../../application/ports/output/job-payload-store.port';
import { ExportRequestPayload } from '../../../domain/value-objects/export-payload.vo';
import { StorageError } from '../../../domain/errors/export.errors';
import { decodePayload, encodePayload, isMissingFile, payloadKey } from './storage-layout';

/**
 * Filesystem Job Payload Store Adapter
 * Same layout as the S3 driver, rooted at STORAGE_DIR.
 */
export class FilesystemJobPayloadStoreAdapter implements JobPayloadStorePort {
  constructor(private readonly rootDir: string) {}

  async put(jobId: string, payload: ExportRequestPayload): Promise<void> {
    const path = this.pathFor(jobId);
    try {
      await mkdir(dirname(path), { recursive: true });
      await writeFile(`${path}.part`, await encodePayload(payload));
      await rename(`${path}.part`, path);
    } catch (error) {
      throw new StorageError(`Failed to store payload for job ${jobId}`, error);
    }
  }

  async get(jobId: string): Promise<ExportRequestPayload | null> {
    let bytes: Buffer;
    try {
      bytes = await readFile(this.pathFor(jobId));
    } catch (error) {
      if (isMissingFile(error)) {
        return null;
      }
      throw new StorageError(`Failed to read payload for job ${jobId}`, error);
    }

    return decodePayload(bytes);
  }

  async delete(jobId: string): Promise<void> {
    try {
      await rm(this.pathFor(jobId), { force: true });
    } catch (error) {
      throw new StorageError(`Failed to delete payload for job ${jobId}`, error);
    }
  }

  private pathFor(jobId: string): string {
    return join(this.rootDir, payloadKey(jobId));
  }
}
