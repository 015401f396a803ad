/**
 * Job Status Value Object
 * Lifecycle status of an export job. `pending` is initial, `complete` and
 * `failed` are terminal.
 */
export enum JobStatus {
  PENDING = 'pending',
  RUNNING = 'running',
  COMPLETE = 'complete',
  FAILED = 'failed',
}

const TRANSITIONS: Record<JobStatus, readonly JobStatus[]> = {
  [JobStatus.PENDING]: [JobStatus.RUNNING],
  // RUNNING -> PENDING is the retry reset
  [JobStatus.RUNNING]: [JobStatus.COMPLETE, JobStatus.FAILED, JobStatus.PENDING],
  [JobStatus.COMPLETE]: [],
  [JobStatus.FAILED]: [],
};

function isJobStatus(value: string): value is JobStatus {
  return Object.values<string>(JobStatus).includes(value);
}

export class JobStatusVO {
  private constructor(private readonly _value: JobStatus) {}

  static fromString(value: string): JobStatusVO {
    const normalizedValue = value.toLowerCase();
    if (!isJobStatus(normalizedValue)) {
      throw new Error(`Invalid job status: ${value}`);
    }
    return new JobStatusVO(normalizedValue);
  }

  static of(value: JobStatus): JobStatusVO {
    return new JobStatusVO(value);
  }

  static pending(): JobStatusVO {
    return new JobStatusVO(JobStatus.PENDING);
  }

  static running(): JobStatusVO {
    return new JobStatusVO(JobStatus.RUNNING);
  }

  static complete(): JobStatusVO {
    return new JobStatusVO(JobStatus.COMPLETE);
  }

  static failed(): JobStatusVO {
    return new JobStatusVO(JobStatus.FAILED);
  }

  get value(): JobStatus {
    return this._value;
  }

  isTerminal(): boolean {
    return this._value === JobStatus.COMPLETE || this._value === JobStatus.FAILED;
  }

  isPending(): boolean {
    return this._value === JobStatus.PENDING;
  }

  isRunning(): boolean {
    return this._value === JobStatus.RUNNING;
  }

  isComplete(): boolean {
    return this._value === JobStatus.COMPLETE;
  }

  isFailed(): boolean {
    return this._value === JobStatus.FAILED;
  }

  canTransitionTo(newStatus: JobStatusVO): boolean {
    return TRANSITIONS[this._value].includes(newStatus._value);
  }

  equals(other: JobStatusVO): boolean {
    return this._value === other._value;
  }

  toString(): string {
    return this._value;
  }
}
