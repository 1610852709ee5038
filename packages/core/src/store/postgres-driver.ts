import pg from 'pg';
import { DeadlineTransaction } from './deadline.js';
import {
  DEFAULT_TRANSACTION_TIMEOUT_MS,
  type QueryResult,
  type SqlValue,
  type StoreDriver,
  type StoreTransaction,
  type TransactionOptions,
} from './types.js';

export interface DatabaseConfig {
  connectionString: string;
  max?: number;
}

export function createPool(config: DatabaseConfig): pg.Pool {
  return new pg.Pool({
    connectionString: config.connectionString,
    max: config.max ?? 10,
  });
}

async function runQuery(
  conn: pg.Pool | pg.PoolClient,
  sql: string,
  params: readonly SqlValue[] = [],
): Promise<QueryResult> {
  const result = await conn.query(sql, [...params]);
  return { rows: result.rows, rowCount: result.rowCount ?? 0 };
}

/** Recorder on PostgreSQL (`db_url: postgresql://...`). */
export class PostgresStoreDriver implements StoreDriver {
  readonly dialect = 'postgres' as const;

  constructor(private readonly pool: pg.Pool) {}

  static connect(config: DatabaseConfig): PostgresStoreDriver {
    return new PostgresStoreDriver(createPool(config));
  }

  async query(sql: string, params?: readonly SqlValue[]): Promise<QueryResult> {
    return runQuery(this.pool, sql, params);
  }

  async transaction<T>(
    fn: (tx: StoreTransaction) => Promise<T>,
    options: TransactionOptions = {},
  ): Promise<T> {
    const timeoutMs = options.timeoutMs ?? DEFAULT_TRANSACTION_TIMEOUT_MS;
    const client = await this.pool.connect();
    try {
      await client.query('BEGIN');
      await client.query(`SET LOCAL statement_timeout = ${Math.max(1, Math.floor(timeoutMs))}`);
      const tx = new DeadlineTransaction(
        { query: (sql, params) => runQuery(client, sql, params) },
        timeoutMs,
      );
      const result = await fn(tx);
      tx.assertOpen();
      await client.query('COMMIT');
      return result;
    } catch (error) {
      await client.query('ROLLBACK');
      throw error;
    } finally {
      client.release();
    }
  }

  async listTables(): Promise<string[]> {
    const { rows } = await this.pool.query(
      `SELECT table_name FROM information_schema.tables WHERE table_schema = current_schema()`,
    );
    return rows.map((row: { table_name: string }) => row.table_name);
  }

  async listColumns(table: string): Promise<string[]> {
    const { rows } = await this.pool.query(
      `SELECT column_name FROM information_schema.columns
       WHERE table_schema = current_schema() AND table_name = $1
       ORDER BY ordinal_position`,
      [table],
    );
    return rows.map((row: { column_name: string }) => row.column_name);
  }

  async ping(): Promise<void> {
    await this.pool.query('SELECT 1');
  }

  async close(): Promise<void> {
    await this.pool.end();
  }
}
