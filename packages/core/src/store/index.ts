export { openStore } from './open-store.js';
export type { StoreLocation } from './open-store.js';
export { PostgresStoreDriver, createPool } from './postgres-driver.js';
export type { DatabaseConfig } from './postgres-driver.js';
export { SqliteStoreDriver, toPositionalPlaceholders } from './sqlite-driver.js';
export type { SqliteStoreOptions } from './sqlite-driver.js';
export { DeadlineTransaction } from './deadline.js';
export { DEFAULT_TRANSACTION_TIMEOUT_MS } from './types.js';
export type {
  SqlValue,
  QueryResult,
  StoreQueryable,
  StoreTransaction,
  TransactionOptions,
  StoreDialect,
  StoreDriver,
} from './types.js';
