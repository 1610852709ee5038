import { describe, it, expect, vi } from 'vitest';
import {
  ApiEntityCreator,
  AttributeCodec,
  EntityApiClient,
  EntityResolver,
  HistoryWriter,
  StoreEntityCreator,
  type EntityCreator,
} from '@history-injector/core';
import { Dispatcher, MessageDecoder, TimestampValidator } from '@history-injector/pipeline';
import { countRows, createRecorder, statesFor } from '../helpers/recorder-database.js';

const NOW = new Date('2023-04-20T00:00:00Z');
const PREFIX = 'homeassistant/history/';

interface PipelineOptions {
  createMissingEntities?: boolean;
  creator?: (recorder: Awaited<ReturnType<typeof createRecorder>>) => EntityCreator;
}

async function createPipeline(options: PipelineOptions = {}) {
  const recorder = await createRecorder();
  const { store, schema } = recorder;
  const creator = options.creator ? options.creator(recorder) : new StoreEntityCreator(store, schema);
  const dispatcher = new Dispatcher({
    decoder: await MessageDecoder.create({ topicPrefix: PREFIX, defaultEntityIdPrefix: 'sensor.' }),
    timestamps: new TimestampValidator({ maxTimestampOffsetDays: 30, now: () => NOW }),
    resolver: new EntityResolver(store, schema, {
      createMissingEntities: options.createMissingEntities ?? true,
      creator,
      sleep: async () => {},
    }),
    codec: new AttributeCodec(store, schema),
    writer: new HistoryWriter(store, schema),
  });
  return { ...recorder, dispatcher };
}

function publish(entityId: string, payload: unknown) {
  return { topic: `${PREFIX}${entityId}`, payload: Buffer.from(JSON.stringify(payload)) };
}

describe('ingestion into a SQLite recorder', () => {
  it('should write a reading for an existing entity at its own timestamp', async () => {
    const { db, store, schema, dispatcher } = await createPipeline();
    const metadataId = await schema.insertMetadata(store, 'sensor.bedroom_temperature');

    const report = await dispatcher.dispatch(
      publish('sensor.bedroom_temperature', {
        state: '23.5',
        timestamp: '2023-04-15T02:30:00Z',
        attributes: { unit_of_measurement: '°C', friendly_name: 'Bedroom Temperature' },
      }),
    );

    expect(report.records[0]).toMatchObject({ status: 'committed', write: 'inserted' });
    const rows = statesFor(db, 'sensor.bedroom_temperature');
    expect(rows).toHaveLength(1);
    expect(rows[0]).toMatchObject({
      metadata_id: metadataId,
      state: '23.5',
      last_updated_ts: 1681525800,
      last_changed_ts: 1681525800,
      old_state_id: null,
    });
    expect(db.prepare('SELECT shared_attrs FROM state_attributes WHERE attributes_id = ?').get(rows[0].attributes_id)).toEqual({
      shared_attrs: '{"friendly_name":"Bedroom Temperature","unit_of_measurement":"°C"}',
    });
  });

  it('should leave the store unchanged when a message is redelivered', async () => {
    const { db, dispatcher } = await createPipeline();
    const message = publish('sensor.office', {
      records: [
        { state: '1', timestamp: '2023-04-15T00:00:00Z' },
        { state: '2', timestamp: '2023-04-15T00:05:00Z' },
      ],
    });

    await dispatcher.dispatch(message);
    const before = statesFor(db, 'sensor.office');
    const second = await dispatcher.dispatch(message);

    expect(second.records.map((r) => r.status === 'committed' && r.write)).toEqual(['overwritten', 'overwritten']);
    expect(statesFor(db, 'sensor.office')).toEqual(before);
    expect(countRows(db, 'states_meta')).toBe(1);
    expect(countRows(db, 'state_attributes')).toBe(1);
  });

  it('should accept readings out of order', async () => {
    const { db, dispatcher } = await createPipeline();

    await dispatcher.dispatch(publish('sensor.office', { state: 'late', timestamp: '2023-04-15T03:00:00Z' }));
    await dispatcher.dispatch(publish('sensor.office', { state: 'early', timestamp: '2023-04-15T01:00:00Z' }));

    expect(statesFor(db, 'sensor.office').map((row) => row.state)).toEqual(['early', 'late']);
  });

  it('should write nothing for readings outside the window', async () => {
    const { db, dispatcher } = await createPipeline();

    const report = await dispatcher.dispatch(
      publish('sensor.office', {
        records: [
          { state: '1', timestamp: '2023-03-20T23:59:59Z' },
          { state: '2', timestamp: '2023-04-20T00:00:01Z' },
        ],
      }),
    );

    expect(report.records.map((r) => r.status === 'rejected' && r.code)).toEqual([
      'TIMESTAMP_OUT_OF_WINDOW',
      'TIMESTAMP_OUT_OF_WINDOW',
    ]);
    expect(countRows(db, 'states')).toBe(0);
    expect(countRows(db, 'states_meta')).toBe(0);
  });

  it('should write nothing for epoch seconds beyond the date range', async () => {
    const { db, dispatcher } = await createPipeline();

    const report = await dispatcher.dispatch(publish('sensor.office', { state: '1', timestamp: 1e20 }));

    expect(report.records[0]).toMatchObject({ status: 'rejected', stage: 'decoded', code: 'INVALID_TIMESTAMP' });
    expect(dispatcher.stats.recordsCommitted).toBe(0);
    expect(countRows(db, 'states')).toBe(0);
  });

  it('should keep processing after a malformed payload', async () => {
    const { db, dispatcher } = await createPipeline();

    const dropped = await dispatcher.dispatch({ topic: `${PREFIX}sensor.office`, payload: Buffer.from('{oops') });
    const report = await dispatcher.dispatch(
      publish('sensor.office', { state: '21.0', timestamp: '2023-04-15T00:00:00Z' }),
    );

    expect(dropped).toMatchObject({ status: 'dropped', code: 'DECODE_ERROR' });
    expect(report.records[0]).toMatchObject({ status: 'committed', write: 'inserted' });
    expect(statesFor(db, 'sensor.office').map((row) => row.state)).toEqual(['21.0']);
  });

  it('should create a new entity once for concurrent messages', async () => {
    const { db, dispatcher } = await createPipeline();

    const reports = await Promise.all(
      Array.from({ length: 10 }, (_, i) =>
        dispatcher.dispatch(
          publish('sensor.new_probe', {
            state: String(i),
            timestamp: `2023-04-15T00:${String(i).padStart(2, '0')}:00Z`,
          }),
        ),
      ),
    );

    expect(reports.every((r) => r.records[0].status === 'committed')).toBe(true);
    expect(countRows(db, 'states_meta')).toBe(1);
    expect(statesFor(db, 'sensor.new_probe')).toHaveLength(10);
  });

  it('should share one attribute blob between readings with equal attributes', async () => {
    const { db, dispatcher } = await createPipeline();
    const attributes = { unit_of_measurement: '%', device_class: 'humidity' };

    await dispatcher.dispatch(
      publish('sensor.humidity', {
        records: [
          { state: '40', timestamp: '2023-04-15T00:00:00Z', attributes },
          { state: '41', timestamp: '2023-04-15T00:05:00Z', attributes: { device_class: 'humidity', unit_of_measurement: '%' } },
        ],
      }),
    );

    const rows = statesFor(db, 'sensor.humidity');
    expect(rows).toHaveLength(2);
    expect(rows[0].attributes_id).toBe(rows[1].attributes_id);
    expect(countRows(db, 'state_attributes')).toBe(1);
  });

  it('should reject readings for unknown entities when creation is disabled', async () => {
    const { db, dispatcher } = await createPipeline({ createMissingEntities: false });

    const report = await dispatcher.dispatch(
      publish('sensor.ghost', { state: '1', timestamp: '2023-04-15T00:00:00Z' }),
    );

    expect(report.records[0]).toMatchObject({ status: 'rejected', code: 'ENTITY_NOT_FOUND' });
    expect(countRows(db, 'states_meta')).toBe(0);
    expect(countRows(db, 'states')).toBe(0);
  });

  it('should register a missing entity through the REST API and wait for the recorder', async () => {
    const posted: string[] = [];
    const { db, dispatcher } = await createPipeline({
      creator: ({ db: recorderDb, store, schema }) => {
        const fetchImpl = vi.fn(async (input: string | URL | Request, init?: RequestInit) => {
          const url = String(input);
          if (init?.method === 'POST') {
            posted.push(typeof init.body === 'string' ? init.body : '');
            // The recorder registers the entity as a side effect of the new state.
            recorderDb.prepare('INSERT INTO states_meta (entity_id) VALUES (?)').run(url.slice(url.lastIndexOf('/') + 1));
            return new Response('{}', { status: 201 });
          }
          return new Response('', { status: 404 });
        });
        const client = new EntityApiClient({ baseUrl: 'http://ha.local/api', token: 'test-secret', fetch: fetchImpl });
        return new ApiEntityCreator(client, store, schema, { sleep: async () => {} });
      },
    });

    const report = await dispatcher.dispatch(
      publish('sensor.cellar_temperature', {
        state: '12.0',
        timestamp: '2023-04-15T00:00:00Z',
        attributes: { unit_of_measurement: '°C' },
      }),
    );

    expect(report.records[0]).toMatchObject({ status: 'committed' });
    expect(posted).toEqual([
      '{"state":"unknown","attributes":{"unit_of_measurement":"°C","friendly_name":"Cellar Temperature"}}',
    ]);
    expect(statesFor(db, 'sensor.cellar_temperature')).toHaveLength(1);
  });

  it('should give up on an entity the API accepts but the recorder never registers', async () => {
    let clock = 0;
    const { db, dispatcher } = await createPipeline({
      creator: ({ store, schema }) => {
        const client = new EntityApiClient({
          baseUrl: 'http://ha.local/api',
          token: 'test-secret',
          fetch: async (_input, init) => new Response('{}', { status: init?.method === 'POST' ? 201 : 404 }),
        });
        return new ApiEntityCreator(client, store, schema, {
          metadataWaitMs: 1000,
          pollIntervalMs: 250,
          now: () => clock,
          sleep: async (ms) => {
            clock += ms;
          },
        });
      },
    });

    const report = await dispatcher.dispatch(
      publish('sensor.phantom', { state: '1', timestamp: '2023-04-15T00:00:00Z' }),
    );

    expect(report.records[0]).toMatchObject({
      status: 'rejected',
      stage: 'timestamp-checked',
      code: 'ENTITY_CREATION_FAILED',
    });
    expect(countRows(db, 'states')).toBe(0);
  });
});
