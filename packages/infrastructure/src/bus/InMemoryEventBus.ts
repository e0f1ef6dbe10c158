import type { EventBusPort, EventHandler } from '@cipherledger/application';
import type { DomainEvent } from '@cipherledger/domain';

/**
 * In-process pub/sub. Handlers run sequentially in subscription order and a
 * failing handler fails the publish.
 */
export class InMemoryEventBus implements EventBusPort {
  private readonly handlers = new Map<string, EventHandler[]>();

  subscribe(eventType: string, handler: EventHandler): void {
    const current = this.handlers.get(eventType) ?? [];
    this.handlers.set(eventType, [...current, handler]);
  }

  async publish(events: DomainEvent[]): Promise<void> {
    for (const event of events) {
      for (const handler of this.handlers.get(event.eventType) ?? []) {
        await handler(event);
      }
    }
  }
}
