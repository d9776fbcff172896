import { DomainEvent, EventSeverity } from './base.event';

export type TimeoutCause = 'max_wait' | 'run_deadline' | 'aborted';

export interface ExportTimedOutEventPayload {
  key: string;
  jobId?: string;
  camera: string;
  window: string;
  cause: TimeoutCause;
  elapsedMs: number;
}

export class ExportTimedOutEvent extends DomainEvent<ExportTimedOutEventPayload> {
  constructor(payload: ExportTimedOutEventPayload, occurredAt?: Date) {
    super(payload, occurredAt);
  }

  get eventName(): string {
    return 'export.timed_out';
  }

  get severity(): EventSeverity {
    return 'warn';
  }
}
