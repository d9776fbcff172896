import { DomainEvent } from '../../../domain/events/base.event';

/**
 * Event Publisher Port (Driven Port)
 * Interface for publishing domain events
 */
export interface EventPublisherPort {
  /**
   * Publish a single domain event
   */
  publish(event: DomainEvent): Promise<void>;
}
