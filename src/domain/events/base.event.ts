import { v4 as uuidv4 } from 'uuid';

export type EventSeverity = 'info' | 'warn' | 'error';

/**
 * Base Domain Event
 * All domain events should extend this base class
 */
export abstract class DomainEvent<TPayload extends object = object> {
  public readonly occurredAt: Date;
  public readonly eventId: string;

  protected constructor(
    public readonly payload: TPayload,
    occurredAt?: Date,
  ) {
    this.occurredAt = occurredAt ?? new Date();
    this.eventId = uuidv4();
  }

  abstract get eventName(): string;

  get severity(): EventSeverity {
    return 'info';
  }

  toJSON(): Record<string, unknown> {
    return {
      eventId: this.eventId,
      eventName: this.eventName,
      occurredAt: this.occurredAt.toISOString(),
      payload: this.payload,
    };
  }
}
