import { sleep as defaultSleep } from '../shared/concurrency.js';
import type { EntityOrigin, JsonObject } from '../shared/types.js';
import type { RecorderSchemaAdapter } from '../recorder-schema/adapter.js';
import type { StoreDriver } from '../store/types.js';
import { EntityApiError, type EntityApiClient } from './entity-api.client.js';

/** Registers an entity and returns its recorder `metadata_id`. */
export interface EntityCreator {
  readonly origin: EntityOrigin;
  createEntity(entityId: string, initialAttributes: JsonObject): Promise<number>;
}

/**
 * "sensor.bedroom_temperature" -> "Bedroom Temperature"
 */
export function deriveFriendlyName(entityId: string): string {
  const objectId = entityId.slice(entityId.indexOf('.') + 1);
  return objectId
    .split('_')
    .filter((word) => word.length > 0)
    .map((word) => word.charAt(0).toUpperCase() + word.slice(1).toLowerCase())
    .join(' ');
}

export interface ApiEntityCreatorOptions {
  /** Upper bound on waiting for the recorder to commit the new `states_meta` row. */
  metadataWaitMs?: number;
  pollIntervalMs?: number;
  sleep?: (ms: number) => Promise<void>;
  now?: () => number;
}

/**
 * Creates the entity through the REST API, then waits for the recorder to
 * register it. An entity the API already knows is not posted again, so a
 * retry never resets a live state.
 */
export class ApiEntityCreator implements EntityCreator {
  readonly origin = 'api-created' as const;

  constructor(
    private readonly client: EntityApiClient,
    private readonly store: StoreDriver,
    private readonly schema: RecorderSchemaAdapter,
    private readonly options: ApiEntityCreatorOptions = {},
  ) {}

  async createEntity(entityId: string, initialAttributes: JsonObject): Promise<number> {
    if (!(await this.client.stateExists(entityId))) {
      const attributes: JsonObject = { ...initialAttributes };
      if (!('friendly_name' in attributes)) {
        attributes.friendly_name = deriveFriendlyName(entityId);
      }
      await this.client.setState(entityId, { state: 'unknown', attributes });
    }
    return this.awaitMetadata(entityId);
  }

  private async awaitMetadata(entityId: string): Promise<number> {
    const now = this.options.now ?? Date.now;
    const wait = this.options.sleep ?? defaultSleep;
    const pollIntervalMs = this.options.pollIntervalMs ?? 250;
    const deadline = now() + (this.options.metadataWaitMs ?? 15_000);

    for (;;) {
      const metadataId = await this.schema.findMetadataId(this.store, entityId);
      if (metadataId !== null) return metadataId;
      if (now() >= deadline) {
        throw new EntityApiError(
          `Entity ${entityId} was accepted by the API but never appeared in the recorder`,
          null,
          true,
        );
      }
      await wait(pollIntervalMs);
    }
  }
}

/** Inserts the `states_meta` row directly; used when no API token is configured. */
export class StoreEntityCreator implements EntityCreator {
  readonly origin = 'store-created' as const;

  constructor(
    private readonly store: StoreDriver,
    private readonly schema: RecorderSchemaAdapter,
  ) {}

  async createEntity(entityId: string): Promise<number> {
    return this.store.transaction(async (tx) => {
      const existing = await this.schema.findMetadataId(tx, entityId);
      if (existing !== null) return existing;
      return this.schema.insertMetadata(tx, entityId);
    });
  }
}
