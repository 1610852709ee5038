export { AttributeCodec } from './attribute-codec.js';
export type { AttributeCodecOptions } from './attribute-codec.js';
export { canonicalJson, fnv1a32, encodeAttributes } from './canonical.js';
export type { EncodedAttributes } from './canonical.js';
