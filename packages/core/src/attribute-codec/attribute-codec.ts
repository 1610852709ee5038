import { KeyedLock } from '../shared/concurrency.js';
import { InjectorError, StoreWriteError } from '../shared/errors.js';
import type { AttributeBlob, JsonObject } from '../shared/types.js';
import type { RecorderSchemaAdapter } from '../recorder-schema/adapter.js';
import type { StoreDriver } from '../store/types.js';
import { DEFAULT_TRANSACTION_TIMEOUT_MS } from '../store/types.js';
import { encodeAttributes, type EncodedAttributes } from './canonical.js';

export interface AttributeCodecOptions {
  transactionTimeoutMs?: number;
}

/**
 * Content-addressed `state_attributes` rows. Equal attribute mappings always
 * resolve to the same row; rows are never updated once written.
 *
 * Each blob is resolved in its own short transaction, committed before the
 * state row that references it. Resolution for one hash is serialized
 * in-process so concurrent records cannot insert the same blob twice.
 */
export class AttributeCodec {
  private readonly hashLocks = new KeyedLock();

  constructor(
    private readonly store: StoreDriver,
    private readonly schema: RecorderSchemaAdapter,
    private readonly options: AttributeCodecOptions = {},
  ) {}

  encode(attributes: JsonObject): EncodedAttributes {
    return encodeAttributes(attributes);
  }

  async resolve(attributes: JsonObject): Promise<AttributeBlob> {
    const { hash, sharedAttrs } = this.encode(attributes);

    try {
      return await this.hashLocks.run(String(hash), () =>
        this.store.transaction(
          async (tx) => {
            // Hash collisions are possible; only an exact text match is reused.
            const candidates = await this.schema.findAttributeCandidates(tx, hash);
            const match = candidates.find((candidate) => candidate.sharedAttrs === sharedAttrs);
            if (match) {
              return { attributesId: match.attributesId, hash, sharedAttrs, reused: true };
            }
            const attributesId = await this.schema.insertAttributes(tx, hash, sharedAttrs);
            return { attributesId, hash, sharedAttrs, reused: false };
          },
          { timeoutMs: this.options.transactionTimeoutMs ?? DEFAULT_TRANSACTION_TIMEOUT_MS },
        ),
      );
    } catch (error) {
      if (error instanceof InjectorError) throw error;
      throw new StoreWriteError(`Failed to store attributes (hash ${hash})`, error);
    }
  }

  /** Number of state rows referencing a blob; the recorder keeps no stored refcount. */
  async referenceCount(attributesId: number): Promise<number> {
    return this.schema.countAttributeReferences(this.store, attributesId);
  }
}
