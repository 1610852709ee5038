import type { StoreQueryable } from '../store/types.js';
import { toInteger, toNullableString, type StateRow } from '../shared/types.js';
import type { RecorderSchemaProfile } from './profiles.js';
import { QUERIES } from './recorder.queries.js';

/** `origin_idx` value the recorder uses for states that did not originate locally. */
export const ORIGIN_REMOTE = 1;

export interface AttributeCandidate {
  attributesId: number;
  sharedAttrs: string | null;
}

export function toEpochSeconds(date: Date): number {
  return date.getTime() / 1000;
}

/**
 * All SQL the injector issues against the recorder goes through this adapter,
 * which is bound to the profile selected for the detected schema version.
 */
export class RecorderSchemaAdapter {
  constructor(
    readonly profile: RecorderSchemaProfile,
    readonly schemaVersion: number,
  ) {}

  async findMetadataId(conn: StoreQueryable, entityId: string): Promise<number | null> {
    const { rows } = await conn.query(QUERIES.FIND_METADATA_ID, [entityId]);
    return rows.length > 0 ? toInteger(rows[0].metadata_id, 'metadata_id') : null;
  }

  async insertMetadata(conn: StoreQueryable, entityId: string): Promise<number> {
    const { rows } = await conn.query(QUERIES.INSERT_METADATA, [entityId]);
    return toInteger(rows[0]?.metadata_id, 'metadata_id');
  }

  async metadataExists(conn: StoreQueryable, metadataId: number): Promise<boolean> {
    const { rows } = await conn.query(QUERIES.METADATA_EXISTS, [metadataId]);
    return rows.length > 0;
  }

  async findAttributeCandidates(conn: StoreQueryable, hash: number): Promise<AttributeCandidate[]> {
    const { rows } = await conn.query(QUERIES.FIND_ATTRIBUTES_BY_HASH, [hash]);
    return rows.map((row) => ({
      attributesId: toInteger(row.attributes_id, 'attributes_id'),
      sharedAttrs: toNullableString(row.shared_attrs),
    }));
  }

  async insertAttributes(conn: StoreQueryable, hash: number, sharedAttrs: string): Promise<number> {
    const { rows } = await conn.query(QUERIES.INSERT_ATTRIBUTES, [hash, sharedAttrs]);
    return toInteger(rows[0]?.attributes_id, 'attributes_id');
  }

  async attributesExist(conn: StoreQueryable, attributesId: number): Promise<boolean> {
    const { rows } = await conn.query(QUERIES.ATTRIBUTES_EXIST, [attributesId]);
    return rows.length > 0;
  }

  async countAttributeReferences(conn: StoreQueryable, attributesId: number): Promise<number> {
    const { rows } = await conn.query(QUERIES.COUNT_ATTRIBUTE_REFERENCES, [attributesId]);
    return toInteger(rows[0]?.refs ?? 0, 'refs');
  }

  async findStateAt(conn: StoreQueryable, metadataId: number, lastUpdated: Date): Promise<number | null> {
    const { rows } = await conn.query(QUERIES.FIND_STATE_AT, [
      metadataId,
      toEpochSeconds(lastUpdated),
    ]);
    return rows.length > 0 ? toInteger(rows[0].state_id, 'state_id') : null;
  }

  async insertState(conn: StoreQueryable, row: StateRow): Promise<number> {
    const sql = this.profile.writesLastReported
      ? QUERIES.INSERT_STATE_WITH_LAST_REPORTED
      : QUERIES.INSERT_STATE;
    const { rows } = await conn.query(sql, [
      row.metadataId,
      row.state,
      row.attributesId,
      toEpochSeconds(row.lastUpdated),
      toEpochSeconds(row.lastChanged),
      ORIGIN_REMOTE,
    ]);
    return toInteger(rows[0]?.state_id, 'state_id');
  }

  async updateState(conn: StoreQueryable, stateId: number, row: StateRow): Promise<void> {
    await conn.query(QUERIES.UPDATE_STATE, [
      stateId,
      row.state,
      row.attributesId,
      toEpochSeconds(row.lastChanged),
      ORIGIN_REMOTE,
    ]);
  }
}
