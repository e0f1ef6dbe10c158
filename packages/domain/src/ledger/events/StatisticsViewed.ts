import { DomainEvent, type EventMetadata } from '../../shared/DomainEvent';
import type { StatisticsSnapshot } from '../vos/StatisticsSnapshot';
import type { UserAddress } from '../vos/UserAddress';
import { trustLedgerEventTypes } from './eventTypes';

/**
 * Live statistics were read; carries the snapshot that now sits in the cache.
 */
export class StatisticsViewed extends DomainEvent<UserAddress> {
  readonly eventType = trustLedgerEventTypes.statisticsViewed;
  readonly user: UserAddress;
  readonly snapshot: StatisticsSnapshot;

  constructor(payload: { snapshot: StatisticsSnapshot }, meta: EventMetadata<UserAddress>) {
    super(meta);
    this.user = this.aggregateId;
    this.snapshot = payload.snapshot;
    Object.freeze(this);
  }

  get eventCount(): number {
    return this.snapshot.eventCount;
  }

  get lastActivity(): number {
    return this.snapshot.lastActivity;
  }
}
