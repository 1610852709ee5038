export type SqlValue = string | number | bigint | Buffer | null;

export interface QueryResult {
  rows: Record<string, unknown>[];
  rowCount: number;
}

export interface StoreQueryable {
  query(sql: string, params?: readonly SqlValue[]): Promise<QueryResult>;
}

/** Handle valid only inside the callback passed to `StoreDriver.transaction`. */
export type StoreTransaction = StoreQueryable;

export interface TransactionOptions {
  timeoutMs?: number;
}

export type StoreDialect = 'sqlite' | 'postgres';

/**
 * Connection to the recorder database. SQL is written with `$n` placeholders
 * regardless of dialect.
 */
export interface StoreDriver extends StoreQueryable {
  readonly dialect: StoreDialect;
  transaction<T>(fn: (tx: StoreTransaction) => Promise<T>, options?: TransactionOptions): Promise<T>;
  listTables(): Promise<string[]>;
  listColumns(table: string): Promise<string[]>;
  ping(): Promise<void>;
  close(): Promise<void>;
}

export const DEFAULT_TRANSACTION_TIMEOUT_MS = 10_000;
