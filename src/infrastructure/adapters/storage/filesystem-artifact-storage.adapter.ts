import { Logger } from '@nestjs/common';
import { createWriteStream } from 'fs';
import { FileHandle, mkdir, open, readFile, readdir, rename, rm, stat, writeFile } from 'fs/promises';
import { join } from 'path';
import { Readable } from 'stream';
import { pipeline } from 'stream/promises';
import { v4 as uuidv4 } from 'uuid';
import { z } from 'zod';
import {
  ArtifactDescriptor,
  ArtifactReadHandle,
  ArtifactStoragePort,
  PutArtifactOptions,
} from '../../../application/ports/output/artifact-storage.port';
import { ArtifactNotFoundError, StorageError } from '../../../domain/errors/export.errors';
import { isArtifactRef, isMissingFile } from './storage-layout';

const sidecarSchema = z.object({
  jobId: z.string(),
  contentType: z.string(),
  size: z.number().int().min(0),
  createdAt: z.string().datetime(),
  expiresAt: z.string().datetime(),
});

type Sidecar = z.infer<typeof sidecarSchema>;

function parseJson(raw: string): unknown {
  try {
    return JSON.parse(raw);
  } catch {
    return undefined;
  }
}

/**
 * Filesystem Artifact Storage Adapter
 *
 * Each artifact is `<ref>.bin` plus a `<ref>.json` sidecar holding its
 * metadata. Bytes are written to `<ref>.part` and renamed into place; the
 * sidecar is written last, so an artifact without one is not readable.
 */
export class FilesystemArtifactStorageAdapter implements ArtifactStoragePort {
  private readonly logger = new Logger(FilesystemArtifactStorageAdapter.name);

  constructor(
    private readonly rootDir: string,
    private readonly ttlMs: number,
  ) {}

  async put(source: Buffer | Readable, options: PutArtifactOptions): Promise<ArtifactDescriptor> {
    const ref = uuidv4();
    const partPath = this.path(ref, 'part');
    const binPath = this.path(ref, 'bin');

    try {
      await mkdir(this.rootDir, { recursive: true });
      if (Buffer.isBuffer(source)) {
        await writeFile(partPath, source);
      } else {
        await pipeline(source, createWriteStream(partPath));
      }
      const { size } = await stat(partPath);
      await rename(partPath, binPath);

      const createdAt = new Date();
      const sidecar: Sidecar = {
        jobId: options.jobId,
        contentType: options.contentType,
        size,
        createdAt: createdAt.toISOString(),
        expiresAt: new Date(createdAt.getTime() + this.ttlMs).toISOString(),
      };
      await writeFile(this.path(ref, 'json'), JSON.stringify(sidecar));

      this.logger.debug(`Stored artifact ${ref} for job ${options.jobId} (${size} bytes)`);
      return this.describe(ref, sidecar);
    } catch (error) {
      await this.removeFiles(ref);
      throw new StorageError(`Failed to store artifact for job ${options.jobId}`, error);
    }
  }

  async get(ref: string): Promise<ArtifactReadHandle> {
    if (!isArtifactRef(ref)) {
      throw new ArtifactNotFoundError(ref);
    }

    const sidecar = await this.readSidecar(ref);
    if (!sidecar || new Date(sidecar.expiresAt).getTime() <= Date.now()) {
      throw new ArtifactNotFoundError(ref);
    }

    // The open descriptor keeps the bytes readable after a later delete
    let handle: FileHandle;
    try {
      handle = await open(this.path(ref, 'bin'), 'r');
    } catch (error) {
      if (isMissingFile(error)) {
        throw new ArtifactNotFoundError(ref);
      }
      throw new StorageError(`Failed to open artifact ${ref}`, error);
    }

    return {
      ref,
      stream: handle.createReadStream(),
      contentType: sidecar.contentType,
      size: sidecar.size,
      expiresAt: new Date(sidecar.expiresAt),
    };
  }

  async delete(ref: string): Promise<void> {
    if (!isArtifactRef(ref)) {
      return;
    }
    try {
      await this.removeFiles(ref);
    } catch (error) {
      throw new StorageError(`Failed to delete artifact ${ref}`, error);
    }
  }

  async purgeExpired(now: Date): Promise<number> {
    let names: string[];
    try {
      names = await readdir(this.rootDir);
    } catch (error) {
      if (isMissingFile(error)) {
        return 0;
      }
      throw new StorageError('Failed to list artifacts', error);
    }

    let purged = 0;
    for (const name of names) {
      const ref = name.endsWith('.json') ? name.slice(0, -'.json'.length) : '';
      if (!isArtifactRef(ref)) {
        continue;
      }
      const sidecar = await this.readSidecar(ref);
      if (sidecar && new Date(sidecar.expiresAt).getTime() <= now.getTime()) {
        await this.delete(ref);
        purged++;
      }
    }

    if (purged > 0) {
      this.logger.log(`Purged ${purged} expired artifact(s)`);
    }
    return purged;
  }

  private async readSidecar(ref: string): Promise<Sidecar | null> {
    let raw: string;
    try {
      raw = await readFile(this.path(ref, 'json'), 'utf8');
    } catch (error) {
      if (isMissingFile(error)) {
        return null;
      }
      throw new StorageError(`Failed to read metadata of artifact ${ref}`, error);
    }

    const parsed = sidecarSchema.safeParse(parseJson(raw));
    if (!parsed.success) {
      this.logger.warn(`Ignoring malformed metadata for artifact ${ref}`);
      return null;
    }
    return parsed.data;
  }

  /**
   * Sidecar first: once it is gone the artifact is unreadable.
   */
  private async removeFiles(ref: string): Promise<void> {
    await rm(this.path(ref, 'json'), { force: true });
    await rm(this.path(ref, 'bin'), { force: true });
    await rm(this.path(ref, 'part'), { force: true });
  }

  private describe(ref: string, sidecar: Sidecar): ArtifactDescriptor {
    return {
      ref,
      contentType: sidecar.contentType,
      size: sidecar.size,
      createdAt: new Date(sidecar.createdAt),
      expiresAt: new Date(sidecar.expiresAt),
    };
  }

  private path(ref: string, extension: 'bin' | 'part' | 'json'): string {
    return join(this.rootDir, `${ref}.${extension}`);
  }
}
