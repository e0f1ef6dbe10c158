import { CiphertextHandle, StatisticsSnapshot, UserAddress } from '@cipherledger/domain';
import {
  IndexOutOfBoundsError,
  InvalidAddressError,
  InvalidRangeError,
  RangeOutOfBoundsError,
} from '../errors/ledgerErrors';
import { parseFields } from '../shared/parseFields';
import type { TrustLedgerReadModelPort, TrustLedgerSummary } from './ports/TrustLedgerReadModelPort';

const parseIndex = (value: number, field: string): number => {
  if (!Number.isSafeInteger(value) || value < 0) {
    throw new Error(`${field} must be a non-negative integer`);
  }
  return value;
};

/**
 * Read-only ledger queries.
 *
 * Aggregate reads fall back to the empty result for unknown users and the
 * zero address; entry reads dereference history and refuse the zero address.
 */
export class TrustLedgerQueryHandler {
  constructor(private readonly readModel: TrustLedgerReadModelPort) {}

  async getTotal(user: string): Promise<CiphertextHandle> {
    return (await this.summaryOf(user))?.total ?? CiphertextHandle.EMPTY;
  }

  async getAverage(user: string): Promise<CiphertextHandle> {
    return (await this.summaryOf(user))?.average ?? CiphertextHandle.EMPTY;
  }

  async getEventCount(user: string): Promise<number> {
    return (await this.summaryOf(user))?.eventCount ?? 0;
  }

  async getHistoryLength(user: string): Promise<number> {
    return (await this.summaryOf(user))?.historyLength ?? 0;
  }

  /** Unix seconds of the latest append; 0 when there is none. */
  async getLastActivity(user: string): Promise<number> {
    return (await this.summaryOf(user))?.lastActivity ?? 0;
  }

  async getCachedStatistics(user: string): Promise<StatisticsSnapshot> {
    return (await this.summaryOf(user))?.cachedStatistics ?? StatisticsSnapshot.EMPTY;
  }

  async getByIndex(user: string, index: number): Promise<CiphertextHandle> {
    const parsed = parseFields(
      { user, index },
      {
        user: (q) => UserAddress.from(q.user),
        index: (q) => parseIndex(q.index, 'index'),
      }
    );
    if (parsed.user.isZero) {
      throw new InvalidAddressError();
    }

    const length = (await this.readModel.summary(parsed.user))?.historyLength ?? 0;
    if (parsed.index >= length) {
      throw new IndexOutOfBoundsError();
    }
    const entry = await this.readModel.entryAt(parsed.user, parsed.index);
    if (!entry) {
      throw new IndexOutOfBoundsError();
    }
    return entry;
  }

  async getRange(user: string, start: number, end: number): Promise<CiphertextHandle[]> {
    const parsed = parseFields(
      { user, start, end },
      {
        user: (q) => UserAddress.from(q.user),
        start: (q) => parseIndex(q.start, 'start'),
        end: (q) => parseIndex(q.end, 'end'),
      }
    );
    if (parsed.user.isZero) {
      throw new InvalidAddressError();
    }
    if (parsed.start >= parsed.end) {
      throw new InvalidRangeError();
    }

    const length = (await this.readModel.summary(parsed.user))?.historyLength ?? 0;
    if (parsed.end > length) {
      throw new RangeOutOfBoundsError();
    }
    return this.readModel.slice(parsed.user, parsed.start, parsed.end);
  }

  private async summaryOf(user: string): Promise<TrustLedgerSummary | null> {
    const parsed = parseFields({ user }, { user: (q) => UserAddress.from(q.user) });
    if (parsed.user.isZero) {
      return null;
    }
    return this.readModel.summary(parsed.user);
  }
}
