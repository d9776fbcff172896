import { produce } from 'immer';
import { JobStatusVO } from '../value-objects/job-status.vo';
import { TimeWindowVO } from '../value-objects/time-window.vo';

/**
 * Export Job Entity - one export of one camera over one time window
 *
 * Status Transitions:
 * PENDING → IN_PROGRESS → COMPLETED (success path)
 * PENDING | IN_PROGRESS → FAILED (remote failure, repeated poll errors)
 * PENDING | IN_PROGRESS → TIMED_OUT (local wait budget or run deadline)
 *
 * This uses a hybrid approach:
 * - Data stored in a plain readonly interface
 * - Methods available via namespace functions
 * - Create function returns object with both data and methods
 */

/**
 * Core data structure for ExportJobEntity
 */
export interface ExportJobEntityData {
  /** `camera@startEpoch-endEpoch`, known even when submission failed */
  readonly key: string;
  /** Remote export id; absent when submission failed */
  readonly jobId?: string;
  readonly camera: string;
  readonly window: TimeWindowVO;
  readonly status: JobStatusVO;
  readonly submittedAt: Date;
  readonly updatedAt: Date;
  readonly remoteName?: string;
  readonly artifactPath?: string;
  readonly sizeBytes?: number;
  readonly lastObservedSize?: number;
  readonly errorMessage?: string;
  readonly pollCount: number;
  readonly consecutivePollErrors: number;
  readonly lastPolledAt?: Date;
}

export interface ExportJobEntity extends ExportJobEntityData {
  // Query methods
  isTerminal(): boolean;
  hasRemoteId(): boolean;
  elapsedMs(now: Date): number;

  // Mutation methods (return new instances)
  markInProgress(now: Date, remoteName?: string): ExportJobEntity;
  recordObservation(sizeBytes: number | undefined, now: Date): ExportJobEntity;
  recordPollSuccess(now: Date): ExportJobEntity;
  recordPollError(errorMessage: string, now: Date): ExportJobEntity;
  complete(artifactPath: string, sizeBytes: number, now: Date): ExportJobEntity;
  fail(errorMessage: string, now: Date): ExportJobEntity;
  timeOut(reason: string, now: Date): ExportJobEntity;

  toJSON(): ReturnType<typeof ExportJobEntity.toJSON>;
}

// eslint-disable-next-line @typescript-eslint/no-namespace
export namespace ExportJobEntity {
  export interface CreateProps {
    jobId: string;
    camera: string;
    window: TimeWindowVO;
    submittedAt: Date;
  }

  export interface FailedSubmissionProps {
    camera: string;
    window: TimeWindowVO;
    submittedAt: Date;
    errorMessage: string;
  }

  /**
   * A job accepted by the NVR, waiting for its first poll.
   */
  export function create(props: CreateProps): ExportJobEntity {
    validate(props.camera);
    if (!props.jobId || props.jobId.trim().length === 0) {
      throw new Error('Job ID is required');
    }

    const data: ExportJobEntityData = {
      key: jobKey(props.camera, props.window),
      jobId: props.jobId,
      camera: props.camera,
      window: props.window,
      status: JobStatusVO.pending(),
      submittedAt: props.submittedAt,
      updatedAt: props.submittedAt,
      pollCount: 0,
      consecutivePollErrors: 0,
    };

    return attachMethods(data);
  }

  /**
   * A job whose submission was rejected; terminal from the start.
   */
  export function createFailedSubmission(props: FailedSubmissionProps): ExportJobEntity {
    validate(props.camera);

    const data: ExportJobEntityData = {
      key: jobKey(props.camera, props.window),
      camera: props.camera,
      window: props.window,
      status: JobStatusVO.failed(),
      submittedAt: props.submittedAt,
      updatedAt: props.submittedAt,
      errorMessage: props.errorMessage,
      pollCount: 0,
      consecutivePollErrors: 0,
    };

    return attachMethods(data);
  }

  /**
   * A pair that was never submitted because the run was cancelled first.
   */
  export function createCancelled(props: FailedSubmissionProps): ExportJobEntity {
    validate(props.camera);

    const data: ExportJobEntityData = {
      key: jobKey(props.camera, props.window),
      camera: props.camera,
      window: props.window,
      status: JobStatusVO.timedOut(),
      submittedAt: props.submittedAt,
      updatedAt: props.submittedAt,
      errorMessage: props.errorMessage,
      pollCount: 0,
      consecutivePollErrors: 0,
    };

    return attachMethods(data);
  }

  export function jobKey(camera: string, window: TimeWindowVO): string {
    return `${camera}@${window.key()}`;
  }

  function attachMethods(data: ExportJobEntityData): ExportJobEntity {
    return {
      ...data,

      isTerminal: () => isTerminal(data),
      hasRemoteId: () => hasRemoteId(data),
      elapsedMs: (now: Date) => elapsedMs(data, now),

      markInProgress: (now: Date, remoteName?: string) => markInProgress(data, now, remoteName),
      recordObservation: (sizeBytes: number | undefined, now: Date) =>
        recordObservation(data, sizeBytes, now),
      recordPollSuccess: (now: Date) => recordPollSuccess(data, now),
      recordPollError: (errorMessage: string, now: Date) =>
        recordPollError(data, errorMessage, now),
      complete: (artifactPath: string, sizeBytes: number, now: Date) =>
        complete(data, artifactPath, sizeBytes, now),
      fail: (errorMessage: string, now: Date) => fail(data, errorMessage, now),
      timeOut: (reason: string, now: Date) => timeOut(data, reason, now),

      toJSON: () => toJSON(data),
    };
  }

  function validate(camera: string): void {
    if (!camera || camera.trim().length === 0) {
      throw new Error('Camera is required');
    }
  }

  function assertTransition(job: ExportJobEntityData, next: JobStatusVO): void {
    if (!job.status.canTransitionTo(next)) {
      throw new Error(
        `Export job ${job.key} cannot move from ${job.status.toString()} to ${next.toString()}`,
      );
    }
  }

  // ===== Pure Functions for Query Logic =====

  export function isTerminal(job: ExportJobEntityData): boolean {
    return job.status.isTerminal();
  }

  export function hasRemoteId(job: ExportJobEntityData): boolean {
    return job.jobId !== undefined;
  }

  export function elapsedMs(job: ExportJobEntityData, now: Date): number {
    return now.getTime() - job.submittedAt.getTime();
  }

  // ===== State Mutations (Return new instances via Immer) =====

  export function markInProgress(
    job: ExportJobEntityData,
    now: Date,
    remoteName?: string,
  ): ExportJobEntity {
    if (job.status.isInProgress()) {
      if (remoteName === undefined || remoteName === job.remoteName) {
        return attachMethods(job);
      }
      return attachMethods(
        produce(job, (draft) => {
          draft.remoteName = remoteName;
        }),
      );
    }

    const next = JobStatusVO.inProgress();
    assertTransition(job, next);

    const updated = produce(job, (draft) => {
      draft.status = next;
      draft.updatedAt = now;
      draft.remoteName = remoteName ?? draft.remoteName;
    });
    return attachMethods(updated);
  }

  /**
   * Remember the artifact size seen on this poll, for the stability check
   * on the next one.
   */
  export function recordObservation(
    job: ExportJobEntityData,
    sizeBytes: number | undefined,
    now: Date,
  ): ExportJobEntity {
    const updated = produce(job, (draft) => {
      draft.lastObservedSize = sizeBytes;
      draft.updatedAt = now;
    });
    return attachMethods(updated);
  }

  export function recordPollSuccess(job: ExportJobEntityData, now: Date): ExportJobEntity {
    const updated = produce(job, (draft) => {
      draft.pollCount += 1;
      draft.consecutivePollErrors = 0;
      draft.lastPolledAt = now;
    });
    return attachMethods(updated);
  }

  export function recordPollError(
    job: ExportJobEntityData,
    errorMessage: string,
    now: Date,
  ): ExportJobEntity {
    const updated = produce(job, (draft) => {
      draft.pollCount += 1;
      draft.consecutivePollErrors += 1;
      draft.lastPolledAt = now;
      draft.errorMessage = errorMessage;
    });
    return attachMethods(updated);
  }

  export function complete(
    job: ExportJobEntityData,
    artifactPath: string,
    sizeBytes: number,
    now: Date,
  ): ExportJobEntity {
    const next = JobStatusVO.completed();
    assertTransition(job, next);

    const updated = produce(job, (draft) => {
      draft.status = next;
      draft.artifactPath = artifactPath;
      draft.sizeBytes = sizeBytes;
      draft.lastObservedSize = sizeBytes;
      draft.errorMessage = undefined;
      draft.updatedAt = now;
    });
    return attachMethods(updated);
  }

  export function fail(job: ExportJobEntityData, errorMessage: string, now: Date): ExportJobEntity {
    const next = JobStatusVO.failed();
    assertTransition(job, next);

    const updated = produce(job, (draft) => {
      draft.status = next;
      draft.errorMessage = errorMessage;
      draft.updatedAt = now;
    });
    return attachMethods(updated);
  }

  export function timeOut(job: ExportJobEntityData, reason: string, now: Date): ExportJobEntity {
    const next = JobStatusVO.timedOut();
    assertTransition(job, next);

    const updated = produce(job, (draft) => {
      draft.status = next;
      draft.errorMessage = reason;
      draft.updatedAt = now;
    });
    return attachMethods(updated);
  }

  // ===== Serialization =====

  export function toJSON(job: ExportJobEntityData) {
    return {
      key: job.key,
      jobId: job.jobId,
      camera: job.camera,
      window: job.window.toJSON(),
      status: job.status.toString(),
      submittedAt: job.submittedAt.toISOString(),
      updatedAt: job.updatedAt.toISOString(),
      remoteName: job.remoteName,
      artifactPath: job.artifactPath,
      sizeBytes: job.sizeBytes,
      errorMessage: job.errorMessage,
      pollCount: job.pollCount,
      consecutivePollErrors: job.consecutivePollErrors,
      lastPolledAt: job.lastPolledAt?.toISOString(),
    };
  }
}
