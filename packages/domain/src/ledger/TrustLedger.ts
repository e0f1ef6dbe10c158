import { Assert } from '../shared/Assert';
import { AggregateRoot } from '../shared/AggregateRoot';
import { ActorId } from '../shared/vos/ActorId';
import { EventId } from '../shared/vos/EventId';
import type { Timestamp } from '../shared/vos/Timestamp';
import { MAX_TRUST_EVENTS } from './constants';
import { ScoreQueried } from './events/ScoreQueried';
import { StatisticsViewed } from './events/StatisticsViewed';
import { TrustEventRecorded } from './events/TrustEventRecorded';
import { ScoreQueryOperations } from './events/eventTypes';
import { CiphertextHandle } from './vos/CiphertextHandle';
import { StatisticsSnapshot } from './vos/StatisticsSnapshot';
import type { UserAddress } from './vos/UserAddress';

export type TrustLedgerSnapshot = {
  id: UserAddress;
  history: readonly CiphertextHandle[];
  total: CiphertextHandle;
  average: CiphertextHandle;
  eventCount: number;
  /** Unix seconds of the latest append, 0 before the first one. */
  lastActivity: number;
  cachedStatistics: StatisticsSnapshot;
  version: number;
};

/**
 * TrustLedger aggregate root.
 *
 * One user's append-only sequence of score ciphertexts together with the
 * encrypted running total and average, the plaintext event count and the
 * time of the latest append. The fold itself happens on ciphertexts outside
 * the aggregate; `record` receives the handles it produced.
 *
 * Invariants enforced:
 * - eventCount equals the history length after every append
 * - at most MAX_TRUST_EVENTS entries
 * - the reserved zero address owns no ledger
 *
 * The cached statistics word is only refreshed by `viewStatistics`, so it can
 * lag behind the live counters between a record and the next view.
 */
export class TrustLedger extends AggregateRoot<UserAddress> {
  private _history: CiphertextHandle[] = [];
  private _total: CiphertextHandle = CiphertextHandle.EMPTY;
  private _average: CiphertextHandle = CiphertextHandle.EMPTY;
  private _eventCount = 0;
  private _lastActivity = 0;
  private _cachedStatistics: StatisticsSnapshot = StatisticsSnapshot.EMPTY;

  private constructor(id: UserAddress) {
    super(id);
  }

  /**
   * An empty ledger. Nothing is persisted until the first event is recorded.
   */
  static create(user: UserAddress): TrustLedger {
    Assert.that(user.isZero, 'Zero address cannot own a ledger').isFalse();
    return new TrustLedger(user);
  }

  static reconstituteFromSnapshot(snapshot: TrustLedgerSnapshot): TrustLedger {
    Assert.that(snapshot.history.length, 'History length').satisfies(
      (length) => length === snapshot.eventCount,
      `must equal eventCount ${snapshot.eventCount}`
    );
    const ledger = new TrustLedger(snapshot.id);
    ledger._history = [...snapshot.history];
    ledger._total = snapshot.total;
    ledger._average = snapshot.average;
    ledger._eventCount = snapshot.eventCount;
    ledger._lastActivity = snapshot.lastActivity;
    ledger._cachedStatistics = snapshot.cachedStatistics;
    ledger.restoreVersion(snapshot.version);
    return ledger;
  }

  // === Commands ===

  /**
   * Append a verified score ciphertext along with the aggregates folded from it.
   * Events are attributed to `recordedBy`, or to the owner when absent.
   */
  record(params: {
    handle: CiphertextHandle;
    total: CiphertextHandle;
    average: CiphertextHandle;
    recordedAt: Timestamp;
    recordedBy?: ActorId;
  }): number {
    Assert.that(this.isFull, 'Maximum trust events reached').isFalse();
    Assert.that(params.handle.isEmpty, 'Recorded handle cannot be empty').isFalse();

    const index = this._history.length;
    const meta = {
      aggregateId: this.id,
      occurredAt: params.recordedAt,
      actorId: params.recordedBy ?? ActorId.from(this.id.value),
    };

    this.apply(
      new TrustEventRecorded(
        {
          index,
          handle: params.handle,
          total: params.total,
          average: params.average,
          eventCount: index + 1,
        },
        { ...meta, eventId: EventId.create() }
      )
    );
    this.apply(new ScoreQueried({ operation: ScoreQueryOperations.record }, { ...meta, eventId: EventId.create() }));

    return index;
  }

  /**
   * Read the live statistics and write them into the cached snapshot.
   */
  viewStatistics(params: { viewedAt: Timestamp; viewedBy: ActorId }): StatisticsSnapshot {
    const snapshot = this.liveStatistics;
    this.apply(
      new StatisticsViewed(
        { snapshot },
        {
          aggregateId: this.id,
          occurredAt: params.viewedAt,
          eventId: EventId.create(),
          actorId: params.viewedBy,
        }
      )
    );
    return snapshot;
  }

  // === Queries ===

  entryAt(index: number): CiphertextHandle | null {
    return this._history[index] ?? null;
  }

  slice(start: number, end: number): CiphertextHandle[] {
    return this._history.slice(start, end);
  }

  get history(): readonly CiphertextHandle[] {
    return [...this._history];
  }

  get total(): CiphertextHandle {
    return this._total;
  }

  get average(): CiphertextHandle {
    return this._average;
  }

  get eventCount(): number {
    return this._eventCount;
  }

  get historyLength(): number {
    return this._history.length;
  }

  get lastActivity(): number {
    return this._lastActivity;
  }

  get isFull(): boolean {
    return this._history.length >= MAX_TRUST_EVENTS;
  }

  get hasData(): boolean {
    return this._eventCount > 0;
  }

  get liveStatistics(): StatisticsSnapshot {
    return StatisticsSnapshot.of({
      eventCount: this._eventCount,
      lastActivity: this._lastActivity,
      hasData: this.hasData,
    });
  }

  get cachedStatistics(): StatisticsSnapshot {
    return this._cachedStatistics;
  }

  toSnapshot(): TrustLedgerSnapshot {
    return {
      id: this.id,
      history: [...this._history],
      total: this._total,
      average: this._average,
      eventCount: this._eventCount,
      lastActivity: this._lastActivity,
      cachedStatistics: this._cachedStatistics,
      version: this.version,
    };
  }

  // === Event handlers ===

  protected onTrustEventRecorded(event: TrustEventRecorded): void {
    this._history.push(event.handle);
    this._total = event.total;
    this._average = event.average;
    this._eventCount = event.eventCount;
    this._lastActivity = event.recordedAt.toUnixSeconds();
  }

  protected onScoreQueried(_event: ScoreQueried): void {
    // notification only
  }

  protected onStatisticsViewed(event: StatisticsViewed): void {
    this._cachedStatistics = event.snapshot;
  }
}
