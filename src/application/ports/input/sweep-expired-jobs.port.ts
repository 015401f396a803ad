export interface SweepExpiredJobsCommand {
  now?: Date;
}

export interface SweepExpiredJobsResult {
  jobsDeleted: number;
  artifactsDeleted: number;
  orphanArtifactsPurged: number;
  errors: number;
}

/**
 * Sweep Expired Jobs Port (Driving Port)
 * Deletes every job whose TTL has elapsed: artifact bytes first, then the
 * payload, then the job record.
 */
export interface SweepExpiredJobsPort {
  execute(command?: SweepExpiredJobsCommand): Promise<SweepExpiredJobsResult>;
}
