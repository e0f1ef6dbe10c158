import type { DomainEvent } from '@cipherledger/domain';

export type EventHandler = (event: DomainEvent) => void | Promise<void>;

/**
 * In-process fan-out of committed ledger events. `publish` resolves after every
 * subscribed handler has run.
 */
export interface EventBusPort {
  publish(events: DomainEvent[]): Promise<void>;
  subscribe(eventType: string, handler: EventHandler): void;
}
