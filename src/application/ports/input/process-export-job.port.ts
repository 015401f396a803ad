export interface ProcessExportJobCommand {
  jobId: string;
}

export type ProcessExportJobOutcome =
  | 'completed'
  | 'failed'
  | 'retry-scheduled'
  /** The job was missing, not pending, or claimed by another worker. */
  | 'skipped'
  /** The job was deleted or moved on while this worker held it. */
  | 'abandoned';

export interface ProcessExportJobResult {
  jobId: string;
  outcome: ProcessExportJobOutcome;
  resultRef?: string;
  durationMs: number;
}

/**
 * Process Export Job Port (Driving Port)
 * Runs one delivery of a job message through the pipeline.
 */
export interface ProcessExportJobPort {
  /**
   * Job-level failures are recorded on the job, not thrown.
   * @throws StorageError when the outcome could not be recorded; the
   * message should be redelivered
   */
  execute(command: ProcessExportJobCommand): Promise<ProcessExportJobResult>;
}
