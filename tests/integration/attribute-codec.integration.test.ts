import { describe, it, expect, beforeEach } from 'vitest';
import { AttributeCodec, HistoryWriter, encodeAttributes } from '@history-injector/core';
import type { RecorderSchemaAdapter, SqliteStoreDriver } from '@history-injector/core';
import type { Database } from 'better-sqlite3';
import { countRows, createRecorder } from '../helpers/recorder-database.js';

describe('AttributeCodec (SQLite recorder)', () => {
  let db: Database;
  let store: SqliteStoreDriver;
  let schema: RecorderSchemaAdapter;
  let codec: AttributeCodec;

  beforeEach(async () => {
    ({ db, store, schema } = await createRecorder());
    codec = new AttributeCodec(store, schema);
  });

  it('should store a new blob with its canonical text and hash', async () => {
    const blob = await codec.resolve({ unit_of_measurement: '°C', friendly_name: 'Bedroom' });

    expect(blob.reused).toBe(false);
    expect(blob.sharedAttrs).toBe('{"friendly_name":"Bedroom","unit_of_measurement":"°C"}');
    expect(db.prepare('SELECT hash, shared_attrs FROM state_attributes WHERE attributes_id = ?').get(blob.attributesId)).toEqual({
      hash: blob.hash,
      shared_attrs: blob.sharedAttrs,
    });
  });

  it('should reuse the blob for an equal mapping in any key order', async () => {
    const first = await codec.resolve({ a: 1, b: [1, 2] });
    const second = await codec.resolve({ b: [1, 2], a: 1 });

    expect(second).toEqual({ ...first, reused: true });
    expect(countRows(db, 'state_attributes')).toBe(1);
  });

  it('should store one blob when equal mappings are resolved concurrently', async () => {
    const blobs = await Promise.all(Array.from({ length: 5 }, () => codec.resolve({ mode: 'heat' })));

    expect(new Set(blobs.map((b) => b.attributesId)).size).toBe(1);
    expect(countRows(db, 'state_attributes')).toBe(1);
  });

  it('should store a separate blob when the hash collides with different text', async () => {
    const { hash } = encodeAttributes({ mode: 'cool' });
    db.prepare('INSERT INTO state_attributes (hash, shared_attrs) VALUES (?, ?)').run(hash, '{"other":true}');

    const blob = await codec.resolve({ mode: 'cool' });

    expect(blob.reused).toBe(false);
    expect(blob.hash).toBe(hash);
    expect(countRows(db, 'state_attributes')).toBe(2);
  });

  it('should store the empty mapping as {}', async () => {
    const blob = await codec.resolve({});
    expect(blob.sharedAttrs).toBe('{}');
  });

  it('should count the states that reference a blob', async () => {
    const writer = new HistoryWriter(store, schema);
    const metadataId = await schema.insertMetadata(store, 'sensor.office');
    const blob = await codec.resolve({ unit_of_measurement: 'lx' });

    expect(await codec.referenceCount(blob.attributesId)).toBe(0);
    for (const minute of ['00', '05']) {
      await writer.write({
        metadataId,
        attributesId: blob.attributesId,
        state: '300',
        timestamp: new Date(`2023-04-15T02:${minute}:00Z`),
      });
    }
    expect(await codec.referenceCount(blob.attributesId)).toBe(2);
  });
});
