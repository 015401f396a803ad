export interface DeleteJobCommand {
  jobId: string;
}

/**
 * Delete Job Port (Driving Port)
 * Removes a job in any status together with its artifact and payload.
 * A worker holding the job abandons it on its next store access.
 */
export interface DeleteJobPort {
  /**
   * @throws JobNotFoundError
   */
  execute(command: DeleteJobCommand): Promise<void>;
}
