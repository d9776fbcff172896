/**
 * Job Status Value Object
 * Local lifecycle of one export job within a run
 */
export enum JobStatus {
  PENDING = 'PENDING',
  IN_PROGRESS = 'IN_PROGRESS',
  COMPLETED = 'COMPLETED',
  FAILED = 'FAILED',
  TIMED_OUT = 'TIMED_OUT',
}

const TRANSITIONS: Record<JobStatus, readonly JobStatus[]> = {
  [JobStatus.PENDING]: [JobStatus.IN_PROGRESS, JobStatus.FAILED, JobStatus.TIMED_OUT],
  [JobStatus.IN_PROGRESS]: [JobStatus.COMPLETED, JobStatus.FAILED, JobStatus.TIMED_OUT],
  [JobStatus.COMPLETED]: [],
  [JobStatus.FAILED]: [],
  [JobStatus.TIMED_OUT]: [],
};

export class JobStatusVO {
  private constructor(private readonly _value: JobStatus) {}

  static fromString(value: string): JobStatusVO {
    const normalizedValue = value.toUpperCase();
    const match = Object.values(JobStatus).find((status) => status === normalizedValue);
    if (!match) {
      throw new Error(`Invalid job status: ${value}`);
    }
    return new JobStatusVO(match);
  }

  static pending(): JobStatusVO {
    return new JobStatusVO(JobStatus.PENDING);
  }

  static inProgress(): JobStatusVO {
    return new JobStatusVO(JobStatus.IN_PROGRESS);
  }

  static completed(): JobStatusVO {
    return new JobStatusVO(JobStatus.COMPLETED);
  }

  static failed(): JobStatusVO {
    return new JobStatusVO(JobStatus.FAILED);
  }

  static timedOut(): JobStatusVO {
    return new JobStatusVO(JobStatus.TIMED_OUT);
  }

  get value(): JobStatus {
    return this._value;
  }

  isTerminal(): boolean {
    return TRANSITIONS[this._value].length === 0;
  }

  isPending(): boolean {
    return this._value === JobStatus.PENDING;
  }

  isInProgress(): boolean {
    return this._value === JobStatus.IN_PROGRESS;
  }

  isCompleted(): boolean {
    return this._value === JobStatus.COMPLETED;
  }

  isFailed(): boolean {
    return this._value === JobStatus.FAILED;
  }

  isTimedOut(): boolean {
    return this._value === JobStatus.TIMED_OUT;
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
