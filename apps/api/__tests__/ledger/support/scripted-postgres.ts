import {
  Kysely,
  PostgresAdapter,
  PostgresIntrospector,
  PostgresQueryCompiler,
  type CompiledQuery,
  type DatabaseConnection,
  type Driver,
  type QueryResult,
} from 'kysely';

export type RecordedQuery = Readonly<{ sql: string; parameters: readonly unknown[] }>;

type ScriptedResponse = ReadonlyArray<Record<string, unknown>> | Error;

/**
 * Postgres stand-in for repository tests: kysely compiles real SQL, the driver
 * records it and answers each query with the next scripted row set (an empty
 * set once the script runs out).
 */
export class ScriptedPostgres {
  readonly queries: RecordedQuery[] = [];
  readonly transactions: Array<'begin' | 'commit' | 'rollback'> = [];
  private readonly script: ScriptedResponse[] = [];

  respond(...responses: ScriptedResponse[]): this {
    this.script.push(...responses);
    return this;
  }

  kysely<DB>(): Kysely<DB> {
    const driver = new ScriptedDriver(this);
    return new Kysely<DB>({
      dialect: {
        createAdapter: () => new PostgresAdapter(),
        createDriver: () => driver,
        createQueryCompiler: () => new PostgresQueryCompiler(),
        createIntrospector: (db) => new PostgresIntrospector(db),
      },
    });
  }

  answer<R>(query: CompiledQuery): QueryResult<R> {
    this.queries.push({ sql: query.sql, parameters: query.parameters });
    const next = this.script.shift() ?? [];
    if (next instanceof Error) {
      throw next;
    }
    // Scripted rows stand in for whatever shape the query selects.
    return { rows: [...next] as R[] };
  }
}

class ScriptedConnection implements DatabaseConnection {
  constructor(private readonly postgres: ScriptedPostgres) {}

  async executeQuery<R>(query: CompiledQuery): Promise<QueryResult<R>> {
    return this.postgres.answer<R>(query);
  }

  async *streamQuery<R>(): AsyncIterableIterator<QueryResult<R>> {
    throw new Error('Streaming is not scripted');
  }
}

class ScriptedDriver implements Driver {
  private readonly connection: ScriptedConnection;

  constructor(private readonly postgres: ScriptedPostgres) {
    this.connection = new ScriptedConnection(postgres);
  }

  async init(): Promise<void> {}

  async acquireConnection(): Promise<DatabaseConnection> {
    return this.connection;
  }

  async beginTransaction(): Promise<void> {
    this.postgres.transactions.push('begin');
  }

  async commitTransaction(): Promise<void> {
    this.postgres.transactions.push('commit');
  }

  async rollbackTransaction(): Promise<void> {
    this.postgres.transactions.push('rollback');
  }

  async releaseConnection(): Promise<void> {}

  async destroy(): Promise<void> {}
}
