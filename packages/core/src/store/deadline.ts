import { StoreTimeoutError } from '../shared/errors.js';
import type { QueryResult, SqlValue, StoreQueryable, StoreTransaction } from './types.js';

/**
 * Wraps a transaction handle so that no statement is issued after the
 * deadline. Drivers check `expired` before committing and roll back instead.
 */
export class DeadlineTransaction implements StoreTransaction {
  private readonly deadline: number;

  constructor(
    private readonly inner: StoreQueryable,
    private readonly timeoutMs: number,
    private readonly now: () => number = Date.now,
  ) {
    this.deadline = now() + timeoutMs;
  }

  get expired(): boolean {
    return this.now() > this.deadline;
  }

  assertOpen(): void {
    if (this.expired) {
      throw new StoreTimeoutError(this.timeoutMs);
    }
  }

  async query(sql: string, params?: readonly SqlValue[]): Promise<QueryResult> {
    this.assertOpen();
    return this.inner.query(sql, params);
  }
}
