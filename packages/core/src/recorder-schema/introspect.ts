import { FatalSchemaMismatchError } from '../shared/errors.js';
import { toInteger } from '../shared/types.js';
import type { StoreDriver } from '../store/types.js';
import { RecorderSchemaAdapter } from './adapter.js';
import { QUERIES } from './recorder.queries.js';
import { RECORDER_PROFILES, findProfile, supportedRange, type RecorderSchemaProfile } from './profiles.js';

/**
 * Detects the recorder schema version and returns the adapter for it. Any
 * unknown version or missing table/column is fatal: nothing is written
 * against a layout that has not been verified.
 */
export async function inspectRecorderSchema(
  store: StoreDriver,
  profiles: readonly RecorderSchemaProfile[] = RECORDER_PROFILES,
): Promise<RecorderSchemaAdapter> {
  const tables = new Set(await store.listTables());
  if (!tables.has('schema_changes')) {
    throw new FatalSchemaMismatchError(
      'Recorder database has no schema_changes table; is this a Home Assistant recorder database?',
      null,
      ['schema_changes'],
    );
  }

  const { rows } = await store.query(QUERIES.LATEST_SCHEMA_VERSION);
  if (rows.length === 0) {
    throw new FatalSchemaMismatchError('schema_changes is empty; schema version unknown', null);
  }
  const schemaVersion = toInteger(rows[0].schema_version, 'schema_version');

  const profile = findProfile(schemaVersion, profiles);
  if (!profile) {
    throw new FatalSchemaMismatchError(
      `Unsupported recorder schema version ${schemaVersion} (supported: ${supportedRange(profiles)})`,
      schemaVersion,
    );
  }

  const missing: string[] = [];
  for (const [table, columns] of Object.entries(profile.requiredColumns)) {
    if (!tables.has(table)) {
      missing.push(table);
      continue;
    }
    const present = new Set(await store.listColumns(table));
    for (const column of columns) {
      if (!present.has(column)) missing.push(`${table}.${column}`);
    }
  }

  if (missing.length > 0) {
    throw new FatalSchemaMismatchError(
      `Recorder schema ${schemaVersion} does not match profile ${profile.id}; missing: ${missing.join(', ')}`,
      schemaVersion,
      missing,
    );
  }

  return new RecorderSchemaAdapter(profile, schemaVersion);
}
