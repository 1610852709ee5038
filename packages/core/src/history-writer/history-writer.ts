import { InjectorError, StoreWriteError } from '../shared/errors.js';
import { STATE_SOURCE, type StateRow } from '../shared/types.js';
import type { RecorderSchemaAdapter } from '../recorder-schema/adapter.js';
import type { StoreDriver } from '../store/types.js';
import { DEFAULT_TRANSACTION_TIMEOUT_MS } from '../store/types.js';

export interface StateWrite {
  metadataId: number;
  attributesId: number;
  state: string;
  timestamp: Date;
}

export type WriteOutcome = 'inserted' | 'overwritten';

export interface WriteResult {
  stateId: number;
  outcome: WriteOutcome;
}

export interface HistoryWriterOptions {
  transactionTimeoutMs?: number;
}

export class HistoryWriter {
  constructor(
    private readonly store: StoreDriver,
    private readonly schema: RecorderSchemaAdapter,
    private readonly options: HistoryWriterOptions = {},
  ) {}

  /**
   * Writes one state row in a single transaction. A row already present at
   * the same (metadata_id, last_updated_ts) is overwritten with the values
   * received last; rows older than the newest one are inserted as usual.
   */
  async write(entry: StateWrite): Promise<WriteResult> {
    const row: StateRow = {
      metadataId: entry.metadataId,
      attributesId: entry.attributesId,
      state: entry.state,
      lastUpdated: entry.timestamp,
      lastChanged: entry.timestamp,
      source: STATE_SOURCE,
    };

    try {
      return await this.store.transaction(
        async (tx) => {
          if (!(await this.schema.metadataExists(tx, row.metadataId))) {
            throw new StoreWriteError(`states_meta row ${row.metadataId} does not exist`);
          }
          if (!(await this.schema.attributesExist(tx, row.attributesId))) {
            throw new StoreWriteError(`state_attributes row ${row.attributesId} does not exist`);
          }

          const existingId = await this.schema.findStateAt(tx, row.metadataId, row.lastUpdated);
          if (existingId !== null) {
            await this.schema.updateState(tx, existingId, row);
            return { stateId: existingId, outcome: 'overwritten' as const };
          }
          const stateId = await this.schema.insertState(tx, row);
          return { stateId, outcome: 'inserted' as const };
        },
        { timeoutMs: this.options.transactionTimeoutMs ?? DEFAULT_TRANSACTION_TIMEOUT_MS },
      );
    } catch (error) {
      if (error instanceof InjectorError) throw error;
      throw new StoreWriteError(`Failed to write state for metadata_id ${row.metadataId}`, error);
    }
  }
}
