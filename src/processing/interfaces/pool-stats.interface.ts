export interface PoolStats {
  poolSize: number;
  activeWorkers: number;
  idleWorkers: number;
  completedJobs: number;
  failedJobs: number;
  retriedJobs: number;
  skippedJobs: number;
  /** Deliveries that threw and were left on the queue for redelivery. */
  erroredDeliveries: number;
  averageProcessingTimeMs: number;
  isRunning: boolean;
}

export interface WorkerLoopStats {
  loopId: number;
  isActive: boolean;
  currentJobId?: string;
  jobsProcessed: number;
  lastActivityAt: Date;
}
