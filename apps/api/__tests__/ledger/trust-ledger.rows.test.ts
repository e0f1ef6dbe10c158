import { describe, expect, it } from 'vitest';
import { ActorId, CiphertextHandle, Timestamp, TrustLedger, UserAddress } from '@cipherledger/domain';
import {
  newHistoryRows,
  toRecordRow,
  toSnapshot,
  toSummary,
} from '../../src/ledger/infrastructure/trust-ledger.rows';

const user = UserAddress.from('0x70997970c51812dc3a010c7d01b50e0d17dc79c8');
const handle = (n: number): CiphertextHandle => CiphertextHandle.from(`0x${n.toString(16).padStart(64, '0')}`);

const ledgerWith = (count: number): TrustLedger => {
  const ledger = TrustLedger.create(user);
  for (let i = 0; i < count; i++) {
    ledger.record({
      handle: handle(i + 1),
      total: handle(100 + i),
      average: handle(200 + i),
      recordedAt: Timestamp.fromUnixSeconds(1_700_000_000 + i),
    });
  }
  return ledger;
};

describe('trust ledger rows', () => {
  it('writes the record columns', () => {
    const ledger = ledgerWith(2);
    ledger.viewStatistics({ viewedAt: Timestamp.fromUnixSeconds(1_700_000_010), viewedBy: ActorId.from(user.value) });

    const row = toRecordRow(ledger);

    expect(row).toEqual({
      user_address: user.value,
      total: handle(101).value,
      average: handle(201).value,
      event_count: 2,
      last_activity: '1700000001',
      cached_statistics: ((1n << 64n) | (1_700_000_001n << 32n) | 2n).toString(),
      version: ledger.version,
    });
  });

  it('only emits history rows past the persisted length', () => {
    const ledger = ledgerWith(3);

    expect(newHistoryRows(ledger, 1)).toEqual([
      { user_address: user.value, idx: 1, handle: handle(2).value },
      { user_address: user.value, idx: 2, handle: handle(3).value },
    ]);
    expect(newHistoryRows(ledger, 3)).toEqual([]);
  });

  it('rebuilds a ledger from its rows in index order', () => {
    const ledger = ledgerWith(3);
    const row = toRecordRow(ledger);
    const history = newHistoryRows(ledger, 0).reverse();

    const restored = TrustLedger.reconstituteFromSnapshot(toSnapshot(row, history));

    expect(restored.history.map((h) => h.value)).toEqual([handle(1).value, handle(2).value, handle(3).value]);
    expect(restored.total.equals(ledger.total)).toBe(true);
    expect(restored.lastActivity).toBe(1_700_000_002);
    expect(restored.cachedStatistics.hasData).toBe(false);
    expect(restored.version).toBe(ledger.version);
  });

  it('refuses a history with a gap', () => {
    const ledger = ledgerWith(3);
    const history = newHistoryRows(ledger, 0).filter((entry) => entry.idx !== 1);

    expect(() => toSnapshot(toRecordRow(ledger), history)).toThrow(
      `History of ${user.value} has a gap at index 1`
    );
  });

  it('summarises without loading history', () => {
    const summary = toSummary(toRecordRow(ledgerWith(2)), 2);

    expect(summary.eventCount).toBe(2);
    expect(summary.historyLength).toBe(2);
    expect(summary.lastActivity).toBe(1_700_000_001);
    expect(summary.cachedStatistics.eventCount).toBe(0);
  });
});
