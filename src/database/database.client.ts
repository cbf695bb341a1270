import { Pool, PoolClient, QueryResult, QueryResultRow } from 'pg';

import { DatabaseConfig } from './database.config';

/**
 * Anything that can run a parameterised statement: the pool itself, or a
 * client checked out for the duration of a transaction.
 */
export interface Queryable {
  query<T extends QueryResultRow = QueryResultRow>(
    queryText: string,
    values?: ReadonlyArray<unknown>,
  ): Promise<QueryResult<T>>;
}

/**
 * COMMIT was sent but did not succeed, so the server may or may not have
 * applied the transaction.
 */
export class TransactionCommitError extends Error {
  constructor(cause: unknown) {
    super('Transaction commit failed; outcome unknown', { cause });
    this.name = 'TransactionCommitError';
  }
}

export class DatabaseClient implements Queryable {
  private static instance: DatabaseClient | undefined;
  private readonly pool: Pool;

  private constructor(private readonly config: DatabaseConfig) {
    this.pool = new Pool(config.toPoolConfig());
  }

  static async initialize(config: DatabaseConfig = DatabaseConfig.fromEnv()): Promise<DatabaseClient> {
    if (!DatabaseClient.instance) {
      const client = new DatabaseClient(config);
      await client.verifyConnection();
      DatabaseClient.instance = client;
    }

    return DatabaseClient.instance;
  }

  static getInstance(): DatabaseClient {
    if (!DatabaseClient.instance) {
      throw new Error('DatabaseClient has not been initialized. Call initialize() first.');
    }

    return DatabaseClient.instance;
  }

  async query<T extends QueryResultRow = QueryResultRow>(
    queryText: string,
    values?: ReadonlyArray<unknown>,
  ): Promise<QueryResult<T>> {
    const bindings = values ? [...values] : undefined;
    return this.pool.query<T>(queryText, bindings);
  }

  async transaction<T>(callback: (client: Queryable) => Promise<T>): Promise<T> {
    const client = await this.pool.connect();

    try {
      await client.query('BEGIN');

      let result: T;
      try {
        result = await callback(DatabaseClient.scoped(client));
      } catch (error) {
        await client.query('ROLLBACK');
        throw error;
      }

      try {
        await client.query('COMMIT');
      } catch (error) {
        throw new TransactionCommitError(error);
      }

      return result;
    } finally {
      client.release();
    }
  }

  /**
   * Dedicated connection for LISTEN. The caller owns it and must release it.
   */
  async connectListener(): Promise<PoolClient> {
    return this.pool.connect();
  }

  async disconnect(): Promise<void> {
    await this.pool.end();
    DatabaseClient.instance = undefined;
  }

  get databaseName(): string {
    return this.config.database;
  }

  private static scoped(client: PoolClient): Queryable {
    return {
      query: <T extends QueryResultRow = QueryResultRow>(queryText: string, values?: ReadonlyArray<unknown>) =>
        client.query<T>(queryText, values ? [...values] : undefined),
    };
  }

  private async verifyConnection(): Promise<void> {
    const client = await this.pool.connect();

    try {
      await client.query('SELECT 1');
    } finally {
      client.release();
    }
  }
}
