import type { ColumnType } from 'kysely';

type TimestampColumn = ColumnType<Date, Date | string | undefined, Date | string>;

/** pg returns int8 as string. */
type BigIntColumn = ColumnType<string, number | string, number | string>;

export interface LedgerRecordsTable {
  user_address: string;
  total: string;
  average: string;
  event_count: number;
  last_activity: BigIntColumn;
  /** Packed statistics word in decimal. */
  cached_statistics: string;
  version: number;
  updated_at: TimestampColumn;
}

export interface LedgerHistoryTable {
  user_address: string;
  idx: number;
  handle: string;
  created_at: TimestampColumn;
}

export interface LedgerCiphertextsTable {
  handle: string;
  type: string;
  ciphertext: Buffer;
  created_at: TimestampColumn;
}

export interface LedgerGrantsTable {
  handle: string;
  principal: string;
  created_at: TimestampColumn;
}

export interface LedgerDatabase {
  'ledger.records': LedgerRecordsTable;
  'ledger.history': LedgerHistoryTable;
  'ledger.ciphertexts': LedgerCiphertextsTable;
  'ledger.grants': LedgerGrantsTable;
}
