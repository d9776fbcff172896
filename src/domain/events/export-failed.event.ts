import { DomainEvent, EventSeverity } from './base.event';

/**
 * Emitted when an export can no longer succeed in this run
 */
export interface ExportFailedEventPayload {
  key: string;
  jobId?: string;
  camera: string;
  window: string;
  stage: 'submission' | 'remote' | 'polling';
  reason: string;
}

export class ExportFailedEvent extends DomainEvent<ExportFailedEventPayload> {
  constructor(payload: ExportFailedEventPayload, occurredAt?: Date) {
    super(payload, occurredAt);
  }

  get eventName(): string {
    return 'export.failed';
  }

  get severity(): EventSeverity {
    return 'error';
  }
}
