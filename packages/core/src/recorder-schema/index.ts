export { RecorderSchemaAdapter, ORIGIN_REMOTE, toEpochSeconds } from './adapter.js';
export type { AttributeCandidate } from './adapter.js';
export { inspectRecorderSchema } from './introspect.js';
export { RECORDER_PROFILES, findProfile, supportedRange } from './profiles.js';
export type { RecorderSchemaProfile } from './profiles.js';
