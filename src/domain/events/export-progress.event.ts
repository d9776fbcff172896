import { DomainEvent } from './base.event';

/**
 * Emitted on every poll that finds an export still being written
 */
export interface ExportProgressEventPayload {
  key: string;
  jobId: string;
  camera: string;
  name?: string;
  /** Size of the artifact on disk so far, when it is visible */
  sizeBytes?: number;
  elapsedMs: number;
  /** Time since the export started, as the NVR reports it */
  reportedElapsedMs?: number;
}

export class ExportProgressEvent extends DomainEvent<ExportProgressEventPayload> {
  constructor(payload: ExportProgressEventPayload, occurredAt?: Date) {
    super(payload, occurredAt);
  }

  get eventName(): string {
    return 'export.progress';
  }
}
