import { DomainEvent } from './base.event';

/**
 * Emitted when the NVR accepts an export request
 */
export interface ExportSubmittedEventPayload {
  key: string;
  jobId: string;
  camera: string;
  window: string;
}

export class ExportSubmittedEvent extends DomainEvent<ExportSubmittedEventPayload> {
  constructor(payload: ExportSubmittedEventPayload, occurredAt?: Date) {
    super(payload, occurredAt);
  }

  get eventName(): string {
    return 'export.submitted';
  }
}
