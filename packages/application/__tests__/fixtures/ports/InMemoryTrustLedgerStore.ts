import { TrustLedger, type CiphertextHandle, type UserAddress } from '@cipherledger/domain';
import { fromNullable, mapOption, type Option } from '../../../src/shared/ports/Option';
import type { TrustLedgerRepositoryPort } from '../../../src/ledger/ports/TrustLedgerRepositoryPort';
import type {
  TrustLedgerReadModelPort,
  TrustLedgerSummary,
} from '../../../src/ledger/ports/TrustLedgerReadModelPort';

/**
 * Snapshot-per-user store serving both the repository and the read model.
 */
export class InMemoryTrustLedgerStore implements TrustLedgerRepositoryPort, TrustLedgerReadModelPort {
  private readonly records = new Map<string, ReturnType<TrustLedger['toSnapshot']>>();
  private failNextSaveWith: Error | null = null;

  async load(user: UserAddress): Promise<Option<TrustLedger>> {
    return mapOption(fromNullable(this.records.get(user.value)), (snapshot) =>
      TrustLedger.reconstituteFromSnapshot(snapshot)
    );
  }

  async save(ledger: TrustLedger): Promise<void> {
    if (this.failNextSaveWith) {
      const error = this.failNextSaveWith;
      this.failNextSaveWith = null;
      throw error;
    }
    this.records.set(ledger.id.value, ledger.toSnapshot());
  }

  async summary(user: UserAddress): Promise<TrustLedgerSummary | null> {
    const snapshot = this.records.get(user.value);
    if (!snapshot) return null;
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

  failNextSave(error: Error): void {
    this.failNextSaveWith = error;
  }

  has(user: UserAddress): boolean {
    return this.records.has(user.value);
  }
}
