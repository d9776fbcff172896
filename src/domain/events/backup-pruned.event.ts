import { DomainEvent } from './base.event';

export interface BackupPrunedEventPayload {
  path: string;
  ageMs: number;
  sizeBytes: number;
}

export class BackupPrunedEvent extends DomainEvent<BackupPrunedEventPayload> {
  constructor(payload: BackupPrunedEventPayload, occurredAt?: Date) {
    super(payload, occurredAt);
  }

  get eventName(): string {
    return 'backup.pruned';
  }
}
