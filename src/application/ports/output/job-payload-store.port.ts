import { ExportRequestPayload } from '../../../domain/value-objects/export-payload.vo';

/**
 * Job Payload Store Port (Driven Port)
 * Holds the validated request payload beside the job record, keyed by job id.
 */
export interface JobPayloadStorePort {
  put(jobId: string, payload: ExportRequestPayload): Promise<void>;

  get(jobId: string): Promise<ExportRequestPayload | null>;

  /**
   * Idempotent.
   */
  delete(jobId: string): Promise<void>;
}
