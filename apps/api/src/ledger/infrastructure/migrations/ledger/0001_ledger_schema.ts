import { Kysely, sql } from 'kysely';
import type { LedgerDatabase } from '@platform/infrastructure/database/database.types';

export async function up(db: Kysely<LedgerDatabase>): Promise<void> {
  await db.schema.createSchema('ledger').ifNotExists().execute();

  await db.schema
    .createTable('ledger.records')
    .addColumn('user_address', 'varchar(42)', (col) => col.primaryKey())
    .addColumn('total', 'varchar(66)', (col) => col.notNull())
    .addColumn('average', 'varchar(66)', (col) => col.notNull())
    .addColumn('event_count', 'integer', (col) => col.notNull())
    .addColumn('last_activity', 'bigint', (col) => col.notNull())
    .addColumn('cached_statistics', 'numeric(78, 0)', (col) => col.notNull().defaultTo('0'))
    .addColumn('version', 'integer', (col) => col.notNull())
    .addColumn('updated_at', 'timestamptz', (col) => col.notNull().defaultTo(sql`now()`))
    .execute();

  await db.schema
    .createTable('ledger.history')
    .addColumn('user_address', 'varchar(42)', (col) =>
      col.notNull().references('ledger.records.user_address').onDelete('cascade')
    )
    .addColumn('idx', 'integer', (col) => col.notNull())
    .addColumn('handle', 'varchar(66)', (col) => col.notNull())
    .addColumn('created_at', 'timestamptz', (col) => col.notNull().defaultTo(sql`now()`))
    .addPrimaryKeyConstraint('ledger_history_pk', ['user_address', 'idx'])
    .execute();

  await db.schema
    .createTable('ledger.ciphertexts')
    .addColumn('handle', 'varchar(66)', (col) => col.primaryKey())
    .addColumn('type', 'varchar(16)', (col) => col.notNull())
    .addColumn('ciphertext', 'bytea', (col) => col.notNull())
    .addColumn('created_at', 'timestamptz', (col) => col.notNull().defaultTo(sql`now()`))
    .execute();

  await db.schema
    .createTable('ledger.grants')
    .addColumn('handle', 'varchar(66)', (col) => col.notNull())
    .addColumn('principal', 'varchar(42)', (col) => col.notNull())
    .addColumn('created_at', 'timestamptz', (col) => col.notNull().defaultTo(sql`now()`))
    .addPrimaryKeyConstraint('ledger_grants_pk', ['handle', 'principal'])
    .execute();
}

export async function down(db: Kysely<LedgerDatabase>): Promise<void> {
  await db.schema.dropTable('ledger.grants').ifExists().execute();
  await db.schema.dropTable('ledger.ciphertexts').ifExists().execute();
  await db.schema.dropTable('ledger.history').ifExists().execute();
  await db.schema.dropTable('ledger.records').ifExists().execute();
  await db.schema.dropSchema('ledger').ifExists().execute();
}
