import type { CiphertextHandle, StatisticsSnapshot, UserAddress } from '@cipherledger/domain';

export type TrustLedgerSummary = Readonly<{
  total: CiphertextHandle;
  average: CiphertextHandle;
  eventCount: number;
  historyLength: number;
  lastActivity: number;
  cachedStatistics: StatisticsSnapshot;
}>;

/**
 * Read side of the ledger store. Reads never load a full history.
 */
export interface TrustLedgerReadModelPort {
  summary(user: UserAddress): Promise<TrustLedgerSummary | null>;
  entryAt(user: UserAddress, index: number): Promise<CiphertextHandle | null>;
  /** Entries [start, end) in index order; the caller has bounds-checked. */
  slice(user: UserAddress, start: number, end: number): Promise<CiphertextHandle[]>;
}
