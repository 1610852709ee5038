import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import Database from 'better-sqlite3';
import { StoreTimeoutError } from '../shared/errors.js';
import { SqliteStoreDriver, toPositionalPlaceholders } from './sqlite-driver.js';

describe('toPositionalPlaceholders', () => {
  it('should rewrite $n placeholders and order parameters by appearance', () => {
    const result = toPositionalPlaceholders('UPDATE t SET a = $2, b = $3 WHERE id = $1', [7, 'x', null]);

    expect(result.sql).toBe('UPDATE t SET a = ?, b = ? WHERE id = ?');
    expect(result.params).toEqual(['x', null, 7]);
  });

  it('should repeat a parameter referenced twice', () => {
    const result = toPositionalPlaceholders('VALUES ($1, $2, $1)', [1.5, 'on']);

    expect(result.sql).toBe('VALUES (?, ?, ?)');
    expect(result.params).toEqual([1.5, 'on', 1.5]);
  });

  it('should reject a placeholder without a parameter', () => {
    expect(() => toPositionalPlaceholders('SELECT $2', ['only'])).toThrow(RangeError);
  });
});

describe('SqliteStoreDriver', () => {
  let store: SqliteStoreDriver;

  beforeEach(() => {
    const db = new Database(':memory:');
    db.exec('CREATE TABLE items (id INTEGER PRIMARY KEY, name TEXT NOT NULL)');
    store = new SqliteStoreDriver(db);
  });

  afterEach(async () => {
    await store.close();
  });

  it('should return rows for reads and affected counts for writes', async () => {
    const insert = await store.query('INSERT INTO items (name) VALUES ($1)', ['lamp']);
    const select = await store.query('SELECT id, name FROM items WHERE name = $1', ['lamp']);

    expect(insert.rowCount).toBe(1);
    expect(select.rows).toEqual([{ id: 1, name: 'lamp' }]);
  });

  it('should return rows from INSERT ... RETURNING', async () => {
    const { rows } = await store.query('INSERT INTO items (name) VALUES ($1) RETURNING id', ['fan']);
    expect(rows).toEqual([{ id: 1 }]);
  });

  it('should commit a transaction that completes', async () => {
    await store.transaction(async (tx) => {
      await tx.query('INSERT INTO items (name) VALUES ($1)', ['a']);
      await tx.query('INSERT INTO items (name) VALUES ($1)', ['b']);
    });

    const { rows } = await store.query('SELECT COUNT(*) AS n FROM items');
    expect(rows[0].n).toBe(2);
  });

  it('should roll back a transaction that throws', async () => {
    await expect(
      store.transaction(async (tx) => {
        await tx.query('INSERT INTO items (name) VALUES ($1)', ['a']);
        throw new Error('abort');
      }),
    ).rejects.toThrow('abort');

    const { rows } = await store.query('SELECT COUNT(*) AS n FROM items');
    expect(rows[0].n).toBe(0);
  });

  it('should roll back a transaction that outlives its deadline', async () => {
    await expect(
      store.transaction(
        async (tx) => {
          await tx.query('INSERT INTO items (name) VALUES ($1)', ['slow']);
          await new Promise((resolve) => setTimeout(resolve, 20));
        },
        { timeoutMs: 5 },
      ),
    ).rejects.toBeInstanceOf(StoreTimeoutError);

    const { rows } = await store.query('SELECT COUNT(*) AS n FROM items');
    expect(rows[0].n).toBe(0);
  });

  it('should list tables and columns', async () => {
    expect(await store.listTables()).toEqual(['items']);
    expect(await store.listColumns('items')).toEqual(['id', 'name']);
    expect(await store.listColumns('missing')).toEqual([]);
  });
});
