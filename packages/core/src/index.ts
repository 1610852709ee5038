// Shared
export {
  InjectorError,
  DecodeError,
  InvalidTimestampError,
  TimestampOutOfWindowError,
  EntityNotFoundError,
  EntityCreationFailedError,
  StoreWriteError,
  StoreTimeoutError,
  FatalSchemaMismatchError,
  ConfigurationError,
  isFatalError,
  describeCause,
} from './shared/errors.js';
export { STATE_SOURCE, isJsonObject, toInteger } from './shared/types.js';
export type {
  JsonPrimitive,
  JsonValue,
  JsonObject,
  HistoryRecord,
  EntityOrigin,
  EntityMetadata,
  AttributeBlob,
  StateRow,
} from './shared/types.js';
export { KeyedLock, Semaphore, sleep } from './shared/concurrency.js';
export { createLogger, silentLogger } from './shared/logger.js';
export type { Logger } from './shared/logger.js';
export { createSchemaValidator } from './shared/schema-validator.js';
export type { SchemaValidator, SchemaValidationResult } from './shared/schema-validator.js';

// Store
export {
  openStore,
  PostgresStoreDriver,
  createPool,
  SqliteStoreDriver,
  toPositionalPlaceholders,
  DeadlineTransaction,
  DEFAULT_TRANSACTION_TIMEOUT_MS,
} from './store/index.js';
export type {
  StoreLocation,
  DatabaseConfig,
  SqliteStoreOptions,
  SqlValue,
  QueryResult,
  StoreQueryable,
  StoreTransaction,
  TransactionOptions,
  StoreDialect,
  StoreDriver,
} from './store/index.js';

// Recorder schema
export {
  RecorderSchemaAdapter,
  ORIGIN_REMOTE,
  toEpochSeconds,
  inspectRecorderSchema,
  RECORDER_PROFILES,
  findProfile,
  supportedRange,
} from './recorder-schema/index.js';
export type { AttributeCandidate, RecorderSchemaProfile } from './recorder-schema/index.js';

// Attribute codec
export { AttributeCodec, canonicalJson, fnv1a32, encodeAttributes } from './attribute-codec/index.js';
export type { AttributeCodecOptions, EncodedAttributes } from './attribute-codec/index.js';

// Entity resolver
export {
  EntityResolver,
  EntityApiClient,
  EntityApiError,
  ApiEntityCreator,
  StoreEntityCreator,
  deriveFriendlyName,
  DEFAULT_RETRY_POLICY,
  retryDelayMs,
} from './entity-resolver/index.js';
export type {
  EntityResolverOptions,
  RetryPolicy,
  EntityApiClientOptions,
  StatePayload,
  EntityCreator,
  ApiEntityCreatorOptions,
} from './entity-resolver/index.js';

// History writer
export { HistoryWriter } from './history-writer/index.js';
export type { StateWrite, WriteOutcome, WriteResult, HistoryWriterOptions } from './history-writer/index.js';

// Observability
export { getTracer, startSpan, endSpan, recordStage, SpanStatusCode } from './observability/index.js';
export type { Span, StageAttributes } from './observability/index.js';
