import type { Selectable } from 'kysely';
import {
  CiphertextHandle,
  StatisticsSnapshot,
  UserAddress,
  type TrustLedger,
  type TrustLedgerSnapshot,
} from '@cipherledger/domain';
import type { TrustLedgerSummary } from '@cipherledger/application';
import type {
  LedgerHistoryTable,
  LedgerRecordsTable,
} from '@platform/infrastructure/database/database.types';

export type RecordRow = Pick<
  Selectable<LedgerRecordsTable>,
  'user_address' | 'total' | 'average' | 'event_count' | 'last_activity' | 'cached_statistics' | 'version'
>;

export type HistoryRow = Pick<Selectable<LedgerHistoryTable>, 'idx' | 'handle'>;

export const toRecordRow = (ledger: TrustLedger): RecordRow => ({
  user_address: ledger.id.value,
  total: ledger.total.value,
  average: ledger.average.value,
  event_count: ledger.eventCount,
  last_activity: String(ledger.lastActivity),
  cached_statistics: ledger.cachedStatistics.pack().toString(),
  version: ledger.version,
});

/**
 * History rows a save must insert: those at or past the persisted length.
 */
export const newHistoryRows = (
  ledger: TrustLedger,
  persistedLength: number
): Array<HistoryRow & { user_address: string }> =>
  ledger.history.slice(persistedLength).map((handle, offset) => ({
    user_address: ledger.id.value,
    idx: persistedLength + offset,
    handle: handle.value,
  }));

export const toSummary = (row: RecordRow, historyLength: number): TrustLedgerSummary => ({
  total: CiphertextHandle.from(row.total),
  average: CiphertextHandle.from(row.average),
  eventCount: row.event_count,
  historyLength,
  lastActivity: Number(row.last_activity),
  cachedStatistics: StatisticsSnapshot.unpack(BigInt(row.cached_statistics)),
});

export const toSnapshot = (row: RecordRow, history: readonly HistoryRow[]): TrustLedgerSnapshot => {
  const ordered = [...history].sort((a, b) => a.idx - b.idx);
  ordered.forEach((entry, position) => {
    if (entry.idx !== position) {
      throw new Error(`History of ${row.user_address} has a gap at index ${position}`);
    }
  });
  return {
    id: UserAddress.from(row.user_address),
    history: ordered.map((entry) => CiphertextHandle.from(entry.handle)),
    total: CiphertextHandle.from(row.total),
    average: CiphertextHandle.from(row.average),
    eventCount: row.event_count,
    lastActivity: Number(row.last_activity),
    cachedStatistics: StatisticsSnapshot.unpack(BigInt(row.cached_statistics)),
    version: row.version,
  };
};
