import type { TrustLedger, UserAddress } from '@cipherledger/domain';
import type { Option } from '../../shared/ports/Option';

/**
 * Persistence for the per-user ledger record.
 *
 * `save` writes the record together with the history entries appended since
 * it was loaded, all or nothing. It fails with `ConcurrentUpdateError` when
 * the stored record is no longer at the ledger's persisted version.
 */
export interface TrustLedgerRepositoryPort {
  load(user: UserAddress): Promise<Option<TrustLedger>>;
  save(ledger: TrustLedger): Promise<void>;
}
