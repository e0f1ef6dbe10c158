import { Inject, Injectable, Logger, type OnModuleDestroy } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Kysely, PostgresDialect, sql } from 'kysely';
import { Pool } from 'pg';
import type { AppEnv } from '../../../config/env';
import type { LedgerDatabase } from './database.types';

@Injectable()
export class DatabaseService implements OnModuleDestroy {
  private readonly logger = new Logger(DatabaseService.name);
  private readonly db: Kysely<LedgerDatabase>;

  constructor(@Inject(ConfigService) config: ConfigService<AppEnv, true>) {
    const connectionString = config.get('DATABASE_URL', { infer: true });

    const dialect = new PostgresDialect({
      pool: new Pool({ connectionString }),
    });

    this.db = new Kysely<LedgerDatabase>({ dialect });
  }

  getDb(): Kysely<LedgerDatabase> {
    return this.db;
  }

  /** True when the pool can run a trivial query. */
  async ping(): Promise<boolean> {
    try {
      await sql`select 1`.execute(this.db);
      return true;
    } catch (error) {
      this.logger.warn(`Database ping failed: ${error instanceof Error ? error.message : String(error)}`);
      return false;
    }
  }

  async onModuleDestroy(): Promise<void> {
    await this.db.destroy();
  }
}
