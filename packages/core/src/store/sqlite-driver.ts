import Database from 'better-sqlite3';
import type { Database as SqliteDatabase } from 'better-sqlite3';
import { KeyedLock } from '../shared/concurrency.js';
import { DeadlineTransaction } from './deadline.js';
import {
  DEFAULT_TRANSACTION_TIMEOUT_MS,
  type QueryResult,
  type SqlValue,
  type StoreDriver,
  type StoreTransaction,
  type TransactionOptions,
} from './types.js';

const CONNECTION_KEY = 'sqlite';
const DEFAULT_BUSY_TIMEOUT_MS = 10_000;

export interface SqliteStoreOptions {
  /** How long to wait for Home Assistant's own write lock. */
  busyTimeoutMs?: number;
}

/**
 * Rewrites `$n` placeholders to positional `?` and reorders the parameters to
 * match, so one SQL text serves both dialects.
 */
export function toPositionalPlaceholders(
  sql: string,
  params: readonly SqlValue[],
): { sql: string; params: SqlValue[] } {
  const ordered: SqlValue[] = [];
  const rewritten = sql.replace(/\$(\d+)/g, (_match, index: string) => {
    const position = Number(index) - 1;
    if (position < 0 || position >= params.length) {
      throw new RangeError(`Placeholder $${index} has no parameter (got ${params.length})`);
    }
    ordered.push(params[position]);
    return '?';
  });
  return { sql: rewritten, params: ordered };
}

function isRow(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

/**
 * Recorder on its default on-disk SQLite file. better-sqlite3 exposes one
 * synchronous connection, so every statement and transaction is serialized
 * through a single lock; a transaction never shares the connection with
 * another worker.
 */
export class SqliteStoreDriver implements StoreDriver {
  readonly dialect = 'sqlite' as const;
  private readonly lock = new KeyedLock();

  constructor(private readonly db: SqliteDatabase) {}

  static open(path: string, options: SqliteStoreOptions = {}): SqliteStoreDriver {
    const db = new Database(path, { fileMustExist: true });
    db.pragma(`busy_timeout = ${options.busyTimeoutMs ?? DEFAULT_BUSY_TIMEOUT_MS}`);
    return new SqliteStoreDriver(db);
  }

  async query(sql: string, params: readonly SqlValue[] = []): Promise<QueryResult> {
    return this.lock.run(CONNECTION_KEY, async () => this.execute(sql, params));
  }

  async transaction<T>(
    fn: (tx: StoreTransaction) => Promise<T>,
    options: TransactionOptions = {},
  ): Promise<T> {
    const timeoutMs = options.timeoutMs ?? DEFAULT_TRANSACTION_TIMEOUT_MS;
    return this.lock.run(CONNECTION_KEY, async () => {
      this.db.exec('BEGIN IMMEDIATE');
      try {
        const tx = new DeadlineTransaction(
          { query: async (sql, params) => this.execute(sql, params ?? []) },
          timeoutMs,
        );
        const result = await fn(tx);
        tx.assertOpen();
        this.db.exec('COMMIT');
        return result;
      } catch (error) {
        if (this.db.inTransaction) {
          this.db.exec('ROLLBACK');
        }
        throw error;
      }
    });
  }

  async listTables(): Promise<string[]> {
    const { rows } = await this.query(
      `SELECT name FROM sqlite_master WHERE type = 'table' ORDER BY name`,
    );
    return rows.map((row) => String(row.name));
  }

  async listColumns(table: string): Promise<string[]> {
    const { rows } = await this.query(`SELECT name FROM pragma_table_info($1)`, [table]);
    return rows.map((row) => String(row.name));
  }

  async ping(): Promise<void> {
    await this.query('SELECT 1');
  }

  async close(): Promise<void> {
    await this.lock.run(CONNECTION_KEY, async () => {
      this.db.close();
    });
  }

  private execute(sql: string, params: readonly SqlValue[]): QueryResult {
    const positional = toPositionalPlaceholders(sql, params);
    const statement = this.db.prepare(positional.sql);
    if (statement.reader) {
      const rows = statement.all(...positional.params).filter(isRow);
      return { rows, rowCount: rows.length };
    }
    const info = statement.run(...positional.params);
    return { rows: [], rowCount: info.changes };
  }
}
