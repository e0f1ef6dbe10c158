import { DomainEvent, type EventMetadata } from '../../shared/DomainEvent';
import type { UserAddress } from '../vos/UserAddress';
import { trustLedgerEventTypes, type ScoreQueryOperation } from './eventTypes';

export class ScoreQueried extends DomainEvent<UserAddress> {
  readonly eventType = trustLedgerEventTypes.scoreQueried;
  readonly user: UserAddress;
  readonly operation: ScoreQueryOperation;

  constructor(payload: { operation: ScoreQueryOperation }, meta: EventMetadata<UserAddress>) {
    super(meta);
    this.user = this.aggregateId;
    this.operation = payload.operation;
    Object.freeze(this);
  }
}
