import { Inject, Injectable, Logger } from '@nestjs/common';
import {
  ConcurrentUpdateError,
  none,
  some,
  type Option,
  type TrustLedgerReadModelPort,
  type TrustLedgerRepositoryPort,
  type TrustLedgerSummary,
} from '@cipherledger/application';
import { CiphertextHandle, TrustLedger, type UserAddress } from '@cipherledger/domain';
import { DatabaseService } from '@platform/infrastructure/database/database.service';
import { newHistoryRows, toRecordRow, toSnapshot, toSummary } from './trust-ledger.rows';

@Injectable()
export class KyselyTrustLedgerRepository implements TrustLedgerRepositoryPort, TrustLedgerReadModelPort {
  private readonly logger = new Logger(KyselyTrustLedgerRepository.name);

  constructor(@Inject(DatabaseService) private readonly dbService: Pick<DatabaseService, 'getDb'>) {}

  async load(user: UserAddress): Promise<Option<TrustLedger>> {
    const db = this.dbService.getDb();
    const record = await db
      .selectFrom('ledger.records')
      .select(['user_address', 'total', 'average', 'event_count', 'last_activity', 'cached_statistics', 'version'])
      .where('user_address', '=', user.value)
      .executeTakeFirst();
    if (!record) {
      return none();
    }
    const history = await db
      .selectFrom('ledger.history')
      .select(['idx', 'handle'])
      .where('user_address', '=', user.value)
      .orderBy('idx', 'asc')
      .execute();
    return some(TrustLedger.reconstituteFromSnapshot(toSnapshot(record, history)));
  }

  async save(ledger: TrustLedger): Promise<void> {
    const row = toRecordRow(ledger);
    const expectedVersion = ledger.persistedVersion;
    try {
      await this.dbService
        .getDb()
        .transaction()
        .execute(async (trx) => {
          const existing = await trx
            .selectFrom('ledger.records')
            .select(['event_count', 'version'])
            .where('user_address', '=', row.user_address)
            .forUpdate()
            .executeTakeFirst();

          const currentVersion = existing?.version ?? 0;
          if (currentVersion !== expectedVersion) {
            throw new ConcurrentUpdateError(row.user_address, expectedVersion, currentVersion);
          }

          if (existing) {
            await trx
              .updateTable('ledger.records')
              .set({
                total: row.total,
                average: row.average,
                event_count: row.event_count,
                last_activity: row.last_activity,
                cached_statistics: row.cached_statistics,
                version: row.version,
                updated_at: new Date(),
              })
              .where('user_address', '=', row.user_address)
              .execute();
          } else {
            await trx.insertInto('ledger.records').values(row).execute();
          }

          const appended = newHistoryRows(ledger, existing?.event_count ?? 0);
          if (appended.length > 0) {
            await trx.insertInto('ledger.history').values(appended).execute();
          }
          this.logger.debug(
            `Saved ledger ${row.user_address} at version ${row.version} (${appended.length} new entries)`
          );
        });
    } catch (error) {
      // Postgres unique violation: another writer created the record first.
      if (typeof error === 'object' && error !== null && 'code' in error && error.code === '23505') {
        this.logger.warn(`Concurrent creation of ledger ${row.user_address}`);
        throw new ConcurrentUpdateError(row.user_address, expectedVersion, null);
      }
      throw error;
    }
  }

  async summary(user: UserAddress): Promise<TrustLedgerSummary | null> {
    const row = await this.dbService
      .getDb()
      .selectFrom('ledger.records')
      .select(['user_address', 'total', 'average', 'event_count', 'last_activity', 'cached_statistics', 'version'])
      .where('user_address', '=', user.value)
      .executeTakeFirst();
    // History is append-only and written with the record, so its length is the event count.
    return row ? toSummary(row, row.event_count) : null;
  }

  async entryAt(user: UserAddress, index: number): Promise<CiphertextHandle | null> {
    const row = await this.dbService
      .getDb()
      .selectFrom('ledger.history')
      .select(['handle'])
      .where('user_address', '=', user.value)
      .where('idx', '=', index)
      .executeTakeFirst();
    return row ? CiphertextHandle.from(row.handle) : null;
  }

  async slice(user: UserAddress, start: number, end: number): Promise<CiphertextHandle[]> {
    const rows = await this.dbService
      .getDb()
      .selectFrom('ledger.history')
      .select(['handle'])
      .where('user_address', '=', user.value)
      .where('idx', '>=', start)
      .where('idx', '<', end)
      .orderBy('idx', 'asc')
      .execute();
    return rows.map((row) => CiphertextHandle.from(row.handle));
  }
}
