import { fileURLToPath } from 'url';
import { Logger } from '@nestjs/common';
import { config } from 'dotenv';
import {
  parseDirection,
  resolveConnectionString,
  runMigrations,
} from '@platform/infrastructure/migrations/migrator';
import type { LedgerDatabase } from '@platform/infrastructure/database/database.types';

config();

async function main(): Promise<void> {
  await runMigrations<LedgerDatabase>({
    migrationsPath: fileURLToPath(new URL('./ledger', import.meta.url)),
    connectionString: resolveConnectionString('DATABASE_URL'),
    migrationTableName: 'ledger_migrations',
    direction: parseDirection(process.argv[2]),
  });
}

main().catch((error: unknown) => {
  new Logger('Migrations').error(error instanceof Error ? error.message : String(error));
  process.exit(1);
});
