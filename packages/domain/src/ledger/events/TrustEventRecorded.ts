import { DomainEvent, type EventMetadata } from '../../shared/DomainEvent';
import type { Timestamp } from '../../shared/vos/Timestamp';
import type { CiphertextHandle } from '../vos/CiphertextHandle';
import type { UserAddress } from '../vos/UserAddress';
import { trustLedgerEventTypes } from './eventTypes';

export interface TrustEventRecordedPayload {
  index: number;
  handle: CiphertextHandle;
  total: CiphertextHandle;
  average: CiphertextHandle;
  eventCount: number;
}

/**
 * A score ciphertext was appended and folded into the running aggregates.
 */
export class TrustEventRecorded extends DomainEvent<UserAddress> implements TrustEventRecordedPayload {
  readonly eventType = trustLedgerEventTypes.trustEventRecorded;
  readonly user: UserAddress;
  readonly index: number;
  readonly handle: CiphertextHandle;
  readonly total: CiphertextHandle;
  readonly average: CiphertextHandle;
  readonly eventCount: number;
  readonly recordedAt: Timestamp;

  constructor(payload: TrustEventRecordedPayload, meta: EventMetadata<UserAddress>) {
    super(meta);
    this.user = this.aggregateId;
    this.index = payload.index;
    this.handle = payload.handle;
    this.total = payload.total;
    this.average = payload.average;
    this.eventCount = payload.eventCount;
    this.recordedAt = this.occurredAt;
    Object.freeze(this);
  }
}
