import type { EventPublisherPort } from '../../src/application/ports/output/event-publisher.port';
import { DomainEvent } from '../../src/domain/events/base.event';

/**
 * In-Memory Event Publisher Adapter
 * Captures published events for verification
 */
export class InMemoryEventPublisherAdapter implements EventPublisherPort {
  private publishedEvents: DomainEvent[] = [];

  async publish(event: DomainEvent): Promise<void> {
    this.publishedEvents.push(event);
  }

  // Test helper methods

  getPublishedEvents(): DomainEvent[] {
    return [...this.publishedEvents];
  }

  getEventNames(): string[] {
    return this.publishedEvents.map((event) => event.eventName);
  }

  /**
   * Events of one class, typed
   */
  getEventsOf<T extends DomainEvent>(type: abstract new (...args: never[]) => T): T[] {
    return this.publishedEvents.filter((event): event is T => event instanceof type);
  }

  getEventCountByType(eventName: string): number {
    return this.publishedEvents.filter((event) => event.eventName === eventName).length;
  }

  clear(): void {
    this.publishedEvents = [];
  }
}
