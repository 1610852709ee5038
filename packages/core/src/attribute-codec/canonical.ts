import type { JsonObject, JsonValue } from '../shared/types.js';

const FNV_OFFSET_BASIS_32 = 0x811c9dc5;
const FNV_PRIME_32 = 0x01000193;

/**
 * Compact JSON with object keys sorted by code unit at every depth. Array
 * order is significant and kept.
 */
export function canonicalJson(value: JsonValue): string {
  if (value === null || typeof value !== 'object') {
    return JSON.stringify(value);
  }
  if (Array.isArray(value)) {
    return `[${value.map(canonicalJson).join(',')}]`;
  }
  const keys = Object.keys(value).sort();
  return `{${keys.map((key) => `${JSON.stringify(key)}:${canonicalJson(value[key])}`).join(',')}}`;
}

/** FNV-1a 32-bit over the UTF-8 bytes; the digest stored in `state_attributes.hash`. */
export function fnv1a32(input: string): number {
  let hash = FNV_OFFSET_BASIS_32;
  for (const byte of Buffer.from(input, 'utf-8')) {
    hash ^= byte;
    hash = Math.imul(hash, FNV_PRIME_32) >>> 0;
  }
  return hash >>> 0;
}

export interface EncodedAttributes {
  hash: number;
  sharedAttrs: string;
}

export function encodeAttributes(attributes: JsonObject): EncodedAttributes {
  const sharedAttrs = canonicalJson(attributes);
  return { hash: fnv1a32(sharedAttrs), sharedAttrs };
}
