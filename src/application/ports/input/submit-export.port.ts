/**
 * Submit Export Result
 */
export interface SubmitExportResult {
  jobId: string;
}

/**
 * Submit Export Port (Driving Port / Use Case Interface)
 * Admits an export request: validates it, records a pending job, queues it.
 */
export interface SubmitExportPort {
  /**
   * @param request - untrusted request body; validated before anything is written
   * @throws ValidationError when any bound is violated
   * @throws StorageError when the store or queue is unavailable
   */
  execute(request: unknown): Promise<SubmitExportResult>;
}
