import { DomainEvent } from './base.event';

export interface ExportCompletedEventPayload {
  key: string;
  jobId: string;
  camera: string;
  name?: string;
  artifactPath: string;
  sizeBytes: number;
  elapsedMs: number;
}

export class ExportCompletedEvent extends DomainEvent<ExportCompletedEventPayload> {
  constructor(payload: ExportCompletedEventPayload, occurredAt?: Date) {
    super(payload, occurredAt);
  }

  get eventName(): string {
    return 'export.completed';
  }
}
