import {
  ConcurrentUpdateError,
  fromNullable,
  mapOption,
  type Option,
  type TrustLedgerReadModelPort,
  type TrustLedgerRepositoryPort,
  type TrustLedgerSummary,
} from '@cipherledger/application';
import { TrustLedger, type CiphertextHandle, type TrustLedgerSnapshot, type UserAddress } from '@cipherledger/domain';

/**
 * Process-local ledger store. Each save replaces the user's record with a
 * fresh snapshot, so a failed command never leaves a partial write behind.
 */
export class InMemoryTrustLedgerStore implements TrustLedgerRepositoryPort, TrustLedgerReadModelPort {
  private readonly records = new Map<string, TrustLedgerSnapshot>();

  async load(user: UserAddress): Promise<Option<TrustLedger>> {
    return mapOption(fromNullable(this.records.get(user.value)), (snapshot) =>
      TrustLedger.reconstituteFromSnapshot(snapshot)
    );
  }

  async save(ledger: TrustLedger): Promise<void> {
    const currentVersion = this.records.get(ledger.id.value)?.version ?? 0;
    if (currentVersion !== ledger.persistedVersion) {
      throw new ConcurrentUpdateError(ledger.id.value, ledger.persistedVersion, currentVersion);
    }
    this.records.set(ledger.id.value, ledger.toSnapshot());
  }

  async summary(user: UserAddress): Promise<TrustLedgerSummary | null> {
    const snapshot = this.records.get(user.value);
    if (!snapshot) {
      return null;
    }
    return {
      total: snapshot.total,
      average: snapshot.average,
      eventCount: snapshot.eventCount,
      historyLength: snapshot.history.length,
      lastActivity: snapshot.lastActivity,
      cachedStatistics: snapshot.cachedStatistics,
    };
  }

  async entryAt(user: UserAddress, index: number): Promise<CiphertextHandle | null> {
    return this.records.get(user.value)?.history[index] ?? null;
  }

  async slice(user: UserAddress, start: number, end: number): Promise<CiphertextHandle[]> {
    return [...(this.records.get(user.value)?.history.slice(start, end) ?? [])];
  }
}
