import { DomainEvent } from './base.event';

export interface BackupRelocatedEventPayload {
  camera: string;
  sourcePath: string;
  destPath: string;
  sizeBytes: number;
  status: 'moved' | 'already-present';
}

export class BackupRelocatedEvent extends DomainEvent<BackupRelocatedEventPayload> {
  constructor(payload: BackupRelocatedEventPayload, occurredAt?: Date) {
    super(payload, occurredAt);
  }

  get eventName(): string {
    return 'backup.relocated';
  }
}
