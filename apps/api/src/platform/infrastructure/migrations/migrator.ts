import { promises as fs } from 'fs';
import path from 'path';
import { Logger } from '@nestjs/common';
import { FileMigrationProvider, Kysely, Migrator, PostgresDialect, type MigrationResultSet } from 'kysely';
import { Pool } from 'pg';

export type MigrationDirection = 'up' | 'down';

type MigratorConfig = {
  migrationsPath: string;
  connectionString: string;
  migrationTableName?: string;
  direction: MigrationDirection;
};

const logger = new Logger('Migrations');

export const parseDirection = (arg: string | undefined): MigrationDirection => {
  if (arg === undefined || arg === 'up') return 'up';
  if (arg === 'down') return 'down';
  throw new Error(`Unknown migration direction "${arg}" (expected up or down)`);
};

/**
 * One line per migration that ran or failed. Migrations kysely skipped after
 * an earlier failure are left out.
 */
export const describeResults = (resultSet: MigrationResultSet, direction: MigrationDirection): string[] =>
  (resultSet.results ?? []).flatMap((result) => {
    if (result.status === 'Success') return [`${result.migrationName} ${direction} succeeded`];
    if (result.status === 'Error') return [`${result.migrationName} ${direction} failed`];
    return [];
  });

export async function runMigrations<DB>({
  migrationsPath,
  connectionString,
  migrationTableName,
  direction,
}: MigratorConfig): Promise<void> {
  const db = new Kysely<DB>({
    dialect: new PostgresDialect({
      pool: new Pool({ connectionString }),
    }),
  });

  const migrator = new Migrator({
    db,
    provider: new FileMigrationProvider({ fs, path, migrationFolder: migrationsPath }),
    migrationTableName,
  });

  try {
    const resultSet = direction === 'down' ? await migrator.migrateDown() : await migrator.migrateToLatest();
    for (const line of describeResults(resultSet, direction)) {
      logger.log(line);
    }
    if (resultSet.error) {
      throw resultSet.error instanceof Error ? resultSet.error : new Error(String(resultSet.error));
    }
  } finally {
    await db.destroy();
  }
}

export function resolveConnectionString(envVar: string, fallback?: string): string {
  const value = process.env[envVar] ?? fallback;
  if (!value) {
    throw new Error(`Missing connection string for migrations (${envVar})`);
  }
  return value;
}
