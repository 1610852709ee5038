export { Dispatcher } from './dispatcher.js';
export type { DispatcherDependencies } from './dispatcher.js';
export { MessageDecoder, ENTITY_ID_PATTERN, subscriptionPrefix } from './message-decoder.js';
export type { MessageDecoderOptions } from './message-decoder.js';
export { TimestampValidator, parseTimestamp } from './timestamp-validator.js';
export type { TimestampWindowOptions, TimestampWindow } from './timestamp-validator.js';
export type {
  InboundMessage,
  DecodedRecord,
  DecodedMessage,
  RecordStage,
  CommittedRecord,
  RejectedRecord,
  RecordOutcome,
  MessageReport,
  DispatcherStats,
} from './types.js';
