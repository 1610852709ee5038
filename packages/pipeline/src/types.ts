import type { JsonObject, WriteOutcome } from '@history-injector/core';

export interface InboundMessage {
  topic: string;
  payload: Uint8Array | string;
}

export interface DecodedRecord {
  entityId: string;
  /** Position in the message; 0 for a single-record payload. */
  index: number;
  state: string;
  rawTimestamp: string | number;
  attributes: JsonObject;
}

export interface DecodedMessage {
  topic: string;
  entityId: string;
  records: readonly DecodedRecord[];
}

export type RecordStage =
  | 'received'
  | 'decoded'
  | 'timestamp-checked'
  | 'entity-resolved'
  | 'attributes-encoded'
  | 'committed'
  | 'rejected';

export interface CommittedRecord {
  index: number;
  status: 'committed';
  timestamp: string;
  stateId: number;
  write: WriteOutcome;
  attributesId: number;
  reusedAttributes: boolean;
}

export interface RejectedRecord {
  index: number;
  status: 'rejected';
  /** Last stage the record reached before failing. */
  stage: RecordStage;
  code: string;
  reason: string;
}

export type RecordOutcome = CommittedRecord | RejectedRecord;

export interface MessageReport {
  topic: string;
  entityId: string | null;
  status: 'processed' | 'dropped';
  records: RecordOutcome[];
  code?: string;
  reason?: string;
}

export interface DispatcherStats {
  messagesReceived: number;
  messagesDropped: number;
  recordsCommitted: number;
  recordsOverwritten: number;
  recordsRejected: number;
  inFlight: number;
}
