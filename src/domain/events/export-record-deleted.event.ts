import { DomainEvent } from './base.event';

/**
 * Emitted once the NVR no longer holds an export whose backup is on disk
 */
export interface ExportRecordDeletedEventPayload {
  jobId: string;
  camera: string;
  destPath: string;
}

export class ExportRecordDeletedEvent extends DomainEvent<ExportRecordDeletedEventPayload> {
  constructor(payload: ExportRecordDeletedEventPayload, occurredAt?: Date) {
    super(payload, occurredAt);
  }

  get eventName(): string {
    return 'export.record_deleted';
  }
}
