import { Injectable } from '@nestjs/common';
import { Readable } from 'stream';
import { buffer } from 'stream/consumers';
import { v4 as uuidv4 } from 'uuid';
import {
  ArtifactDescriptor,
  ArtifactReadHandle,
  ArtifactStoragePort,
  PutArtifactOptions,
} from '../../src/application/ports/output/artifact-storage.port';
import { ArtifactNotFoundError } from '../../src/domain/errors/export.errors';

interface StoredArtifact {
  bytes: Buffer;
  jobId: string;
  descriptor: ArtifactDescriptor;
}

/**
 * In-Memory Artifact Storage Adapter
 * Streams are opened over a snapshot of the bytes, so deleting an artifact
 * does not affect a stream already handed out.
 */
@Injectable()
export class InMemoryArtifactStorageAdapter implements ArtifactStoragePort {
  private artifacts: Map<string, StoredArtifact> = new Map();
  readonly deletedRefs: string[] = [];

  constructor(private readonly ttlMs = 24 * 60 * 60 * 1000) {}

  async put(source: Buffer | Readable, options: PutArtifactOptions): Promise<ArtifactDescriptor> {
    const bytes = Buffer.isBuffer(source) ? source : await buffer(source);
    const createdAt = new Date();
    const descriptor: ArtifactDescriptor = {
      ref: uuidv4(),
      contentType: options.contentType,
      size: bytes.length,
      createdAt,
      expiresAt: new Date(createdAt.getTime() + this.ttlMs),
    };
    this.artifacts.set(descriptor.ref, { bytes, jobId: options.jobId, descriptor });
    return descriptor;
  }

  async get(ref: string): Promise<ArtifactReadHandle> {
    const stored = this.artifacts.get(ref);
    if (!stored || stored.descriptor.expiresAt.getTime() <= Date.now()) {
      throw new ArtifactNotFoundError(ref);
    }
    return {
      ref,
      stream: Readable.from([Buffer.from(stored.bytes)]),
      contentType: stored.descriptor.contentType,
      size: stored.descriptor.size,
      expiresAt: stored.descriptor.expiresAt,
    };
  }

  async delete(ref: string): Promise<void> {
    if (this.artifacts.delete(ref)) {
      this.deletedRefs.push(ref);
    }
  }

  async purgeExpired(now: Date): Promise<number> {
    let purged = 0;
    for (const [ref, stored] of this.artifacts) {
      if (stored.descriptor.expiresAt.getTime() <= now.getTime()) {
        await this.delete(ref);
        purged++;
      }
    }
    return purged;
  }

  // Helper methods for testing

  getBytes(ref: string): Buffer | undefined {
    return this.artifacts.get(ref)?.bytes;
  }

  has(ref: string): boolean {
    return this.artifacts.has(ref);
  }

  count(): number {
    return this.artifacts.size;
  }
}
