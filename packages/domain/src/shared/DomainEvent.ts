import type { ActorId } from './vos/ActorId';
import type { AggregateId } from './vos/AggregateId';
import type { EventId } from './vos/EventId';
import type { Timestamp } from './vos/Timestamp';

/**
 * Base class for all domain events.
 *
 * Domain events are immutable facts. Besides driving aggregate state they
 * double as the externally observable notifications of the ledger
 * (recorded, queried, statistics viewed).
 */
export abstract class DomainEvent<TId extends AggregateId = AggregateId> {
  abstract readonly eventType: string;

  readonly aggregateId: TId;
  readonly occurredAt: Timestamp;
  readonly eventId: EventId;
  readonly actorId: ActorId;

  constructor(meta: EventMetadata<TId>) {
    this.aggregateId = meta.aggregateId;
    this.occurredAt = meta.occurredAt;
    this.eventId = meta.eventId;
    this.actorId = meta.actorId;
  }
}

export type EventMetadata<TId extends AggregateId = AggregateId> = Readonly<{
  aggregateId: TId;
  occurredAt: Timestamp;
  eventId: EventId;
  actorId: ActorId;
}>;
