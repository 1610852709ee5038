export type JsonPrimitive = string | number | boolean | null;
export type JsonValue = JsonPrimitive | JsonValue[] | JsonObject;
export interface JsonObject {
  [key: string]: JsonValue;
}

export const STATE_SOURCE = 'history-injector';

/** A decoded reading whose timestamp has passed validation. */
export interface HistoryRecord {
  entityId: string;
  state: string;
  timestamp: Date;
  attributes: JsonObject;
}

export type EntityOrigin = 'existing' | 'api-created' | 'store-created';

export interface EntityMetadata {
  entityId: string;
  internalId: number;
  origin: EntityOrigin;
}

export interface AttributeBlob {
  attributesId: number;
  hash: number;
  sharedAttrs: string;
  reused: boolean;
}

export interface StateRow {
  metadataId: number;
  attributesId: number;
  state: string;
  lastUpdated: Date;
  lastChanged: Date;
  source: typeof STATE_SOURCE;
}

export function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Integer columns come back as numbers from SQLite and as strings from pg
 * (BIGINT). Both are normalized here.
 */
export function toInteger(value: unknown, column: string): number {
  const parsed = typeof value === 'string' ? Number(value) : value;
  if (typeof parsed !== 'number' || !Number.isSafeInteger(parsed)) {
    throw new TypeError(`Expected integer in column ${column}, got ${String(value)}`);
  }
  return parsed;
}

export function toNullableString(value: unknown): string | null {
  if (value === null || value === undefined) return null;
  if (typeof value === 'string') return value;
  if (Buffer.isBuffer(value)) return value.toString('utf-8');
  return String(value);
}
