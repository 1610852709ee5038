import {
  DecodeError,
  InjectorError,
  KeyedLock,
  Semaphore,
  describeCause,
  endSpan,
  isFatalError,
  recordStage,
  silentLogger,
  startSpan,
  type AttributeBlob,
  type EntityMetadata,
  type HistoryRecord,
  type JsonObject,
  type Logger,
  type Span,
  type StateWrite,
  type WriteResult,
} from '@history-injector/core';
import type { MessageDecoder } from './message-decoder.js';
import type { TimestampValidator } from './timestamp-validator.js';
import type {
  DecodedMessage,
  DecodedRecord,
  DispatcherStats,
  InboundMessage,
  MessageReport,
  RecordOutcome,
  RecordStage,
} from './types.js';

export interface DispatcherDependencies {
  decoder: Pick<MessageDecoder, 'decode'>;
  timestamps: Pick<TimestampValidator, 'validate'>;
  resolver: { resolve(entityId: string, initialAttributes: JsonObject): Promise<EntityMetadata> };
  codec: { resolve(attributes: JsonObject): Promise<AttributeBlob> };
  writer: { write(entry: StateWrite): Promise<WriteResult> };
  logger?: Logger;
  /** Messages processed at once; messages for one entity never overlap. */
  workerConcurrency?: number;
}

const DEFAULT_WORKER_CONCURRENCY = 4;

/**
 * Applies inbound messages to the recorder. Records of one message are
 * applied strictly in order. Messages for the same entity are serialized;
 * messages for different entities run in parallel up to the worker limit.
 * The entity lock is taken before a worker slot so a queue of messages for
 * one busy entity never holds slots other entities could use.
 */
export class Dispatcher {
  private readonly entityLocks = new KeyedLock();
  private readonly slots: Semaphore;
  private readonly logger: Logger;
  private readonly inflight = new Set<Promise<MessageReport>>();
  private closed = false;
  private readonly counters = {
    messagesReceived: 0,
    messagesDropped: 0,
    recordsCommitted: 0,
    recordsOverwritten: 0,
    recordsRejected: 0,
  };

  constructor(private readonly deps: DispatcherDependencies) {
    this.slots = new Semaphore(deps.workerConcurrency ?? DEFAULT_WORKER_CONCURRENCY);
    this.logger = deps.logger ?? silentLogger();
  }

  /**
   * Resolves with the per-record report. Rejects only with a fatal error, in
   * which case ingestion must stop.
   */
  async dispatch(message: InboundMessage): Promise<MessageReport> {
    this.counters.messagesReceived += 1;
    if (this.closed) {
      return this.drop(message.topic, null, 'SHUTTING_DOWN', 'Dispatcher is closed');
    }

    const task = this.process(message);
    this.inflight.add(task);
    try {
      return await task;
    } finally {
      this.inflight.delete(task);
    }
  }

  /** Stops accepting messages and waits for the ones in flight. */
  async close(): Promise<void> {
    this.closed = true;
    await Promise.allSettled([...this.inflight]);
  }

  get stats(): DispatcherStats {
    return { ...this.counters, inFlight: this.inflight.size };
  }

  private async process(message: InboundMessage): Promise<MessageReport> {
    const span = startSpan('history.dispatch', { 'messaging.destination': message.topic });

    let decoded: DecodedMessage;
    try {
      decoded = this.deps.decoder.decode(message);
    } catch (error) {
      if (!(error instanceof DecodeError)) {
        endSpan(span, error instanceof Error ? error : new Error(describeCause(error)));
        throw error;
      }
      endSpan(span, error);
      return this.drop(message.topic, null, error.code, error.message);
    }

    span.setAttribute('entity_id', decoded.entityId);
    span.setAttribute('record_count', decoded.records.length);

    try {
      const records = await this.entityLocks.run(decoded.entityId, () =>
        this.slots.run(() => this.applyRecords(decoded, span)),
      );
      endSpan(span);

      const committed = records.filter((r) => r.status === 'committed').length;
      this.logger.info(
        {
          topic: decoded.topic,
          entityId: decoded.entityId,
          committed,
          rejected: records.length - committed,
        },
        'Processed historical data',
      );
      return { topic: decoded.topic, entityId: decoded.entityId, status: 'processed', records };
    } catch (error) {
      endSpan(span, error instanceof Error ? error : new Error(describeCause(error)));
      throw error;
    }
  }

  private async applyRecords(decoded: DecodedMessage, span: Span): Promise<RecordOutcome[]> {
    const outcomes: RecordOutcome[] = [];
    for (const record of decoded.records) {
      outcomes.push(await this.applyRecord(decoded.topic, record, span));
    }
    return outcomes;
  }

  private async applyRecord(topic: string, record: DecodedRecord, span: Span): Promise<RecordOutcome> {
    let stage: RecordStage = 'decoded';
    try {
      const reading: HistoryRecord = {
        entityId: record.entityId,
        state: record.state,
        timestamp: this.deps.timestamps.validate(record.rawTimestamp),
        attributes: record.attributes,
      };
      const { timestamp } = reading;
      const isoTimestamp = timestamp.toISOString();
      stage = 'timestamp-checked';
      recordStage(span, stage, record.index, { timestamp: isoTimestamp });

      const entity = await this.deps.resolver.resolve(reading.entityId, reading.attributes);
      stage = 'entity-resolved';
      recordStage(span, stage, record.index, { metadata_id: entity.internalId, origin: entity.origin });

      const blob = await this.deps.codec.resolve(reading.attributes);
      stage = 'attributes-encoded';
      recordStage(span, stage, record.index, { attributes_id: blob.attributesId, reused: blob.reused });

      const result = await this.deps.writer.write({
        metadataId: entity.internalId,
        attributesId: blob.attributesId,
        state: reading.state,
        timestamp,
      });
      stage = 'committed';
      recordStage(span, stage, record.index, { state_id: result.stateId, write: result.outcome });

      this.counters.recordsCommitted += 1;
      if (result.outcome === 'overwritten') {
        this.counters.recordsOverwritten += 1;
        this.logger.debug(
          { entityId: record.entityId, timestamp: isoTimestamp, stateId: result.stateId },
          'Overwrote state at existing timestamp',
        );
      }
      return {
        index: record.index,
        status: 'committed',
        timestamp: isoTimestamp,
        stateId: result.stateId,
        write: result.outcome,
        attributesId: blob.attributesId,
        reusedAttributes: blob.reused,
      };
    } catch (error) {
      if (isFatalError(error)) throw error;

      const code = error instanceof InjectorError ? error.code : 'UNEXPECTED_ERROR';
      const reason = describeCause(error);
      const context = { topic, entityId: record.entityId, recordIndex: record.index, stage, code, reason };
      if (error instanceof InjectorError) {
        this.logger.warn(context, 'Rejected historical record');
      } else {
        this.logger.error({ ...context, err: error }, 'Rejected historical record after unexpected error');
      }
      recordStage(span, 'rejected', record.index, { failed_stage: stage, code });

      this.counters.recordsRejected += 1;
      return { index: record.index, status: 'rejected', stage, code, reason };
    }
  }

  private drop(topic: string, entityId: string | null, code: string, reason: string): MessageReport {
    this.counters.messagesDropped += 1;
    this.logger.warn({ topic, code, reason }, 'Dropped message');
    return { topic, entityId, status: 'dropped', records: [], code, reason };
  }
}
