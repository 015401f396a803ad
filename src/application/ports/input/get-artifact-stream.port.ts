import { Readable } from 'stream';

export interface GetArtifactStreamQuery {
  jobId: string;
}

export interface ArtifactStreamResult {
  stream: Readable;
  filename: string;
  contentType: string;
  size?: number;
  expiresAt: Date;
}

/**
 * Get Artifact Stream Port (Driving Port)
 */
export interface GetArtifactStreamPort {
  /**
   * @throws JobNotFoundError when the job is unknown, failed or expired
   * @throws JobNotReadyError while the job is pending or running
   * @throws ArtifactNotFoundError when the bytes are gone
   */
  execute(query: GetArtifactStreamQuery): Promise<ArtifactStreamResult>;
}
