import { Readable } from 'stream';

export interface ArtifactDescriptor {
  readonly ref: string;
  readonly contentType: string;
  readonly size: number;
  readonly createdAt: Date;
  /** Fixed at write time; reads never extend it. */
  readonly expiresAt: Date;
}

export interface ArtifactReadHandle {
  readonly ref: string;
  readonly stream: Readable;
  readonly contentType: string;
  readonly size?: number;
  readonly expiresAt: Date;
}

export interface PutArtifactOptions {
  contentType: string;
  /** Owning job, recorded as metadata only. */
  jobId: string;
}

/**
 * Artifact Storage Port (Driven Port)
 * Write-once byte storage with a per-artifact expiry and streaming reads.
 */
export interface ArtifactStoragePort {
  put(source: Buffer | Readable, options: PutArtifactOptions): Promise<ArtifactDescriptor>;

  /**
   * Open a stream over the artifact. Throws `ArtifactNotFoundError` when it
   * is missing or expired. A stream already returned keeps working if the
   * artifact is deleted afterwards.
   */
  get(ref: string): Promise<ArtifactReadHandle>;

  /**
   * Idempotent.
   */
  delete(ref: string): Promise<void>;

  /**
   * Remove expired bytes no sweep reached (e.g. written before a crash and
   * never recorded on a job). Returns the number removed.
   */
  purgeExpired(now: Date): Promise<number>;
}
