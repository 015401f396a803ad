export interface FailStaleJobsCommand {
  now?: Date;
}

export interface FailStaleJobsResult {
  jobsFailed: number;
}

/**
 * Fail Stale Jobs Port (Driving Port)
 * Fails running jobs whose claim outlived the processing deadline, e.g.
 * because the worker holding them crashed.
 */
export interface FailStaleJobsPort {
  execute(command?: FailStaleJobsCommand): Promise<FailStaleJobsResult>;
}
