import type { Logger } from 'pino';
import { sleep as defaultSleep } from '../shared/concurrency.js';
import {
  EntityCreationFailedError,
  EntityNotFoundError,
  StoreWriteError,
} from '../shared/errors.js';
import { silentLogger } from '../shared/logger.js';
import type { EntityMetadata, JsonObject } from '../shared/types.js';
import type { RecorderSchemaAdapter } from '../recorder-schema/adapter.js';
import type { StoreQueryable } from '../store/types.js';
import { EntityApiError } from './entity-api.client.js';
import type { EntityCreator } from './entity-creators.js';
import { DEFAULT_RETRY_POLICY, retryDelayMs, type RetryPolicy } from './retry-policy.js';

export interface EntityResolverOptions {
  createMissingEntities: boolean;
  creator?: EntityCreator;
  /** Total creation attempts per resolution, including the first. */
  maxAttempts?: number;
  retry?: Partial<RetryPolicy>;
  sleep?: (ms: number) => Promise<void>;
  random?: () => number;
  logger?: Logger;
}

const DEFAULT_MAX_ATTEMPTS = 3;

function isRetryable(error: unknown): boolean {
  return error instanceof EntityApiError ? error.retryable : true;
}

/**
 * Maps entity ids to recorder `metadata_id`s. Resolutions are cached for the
 * lifetime of the instance; concurrent misses for one entity id share a
 * single in-flight lookup, so an entity is created at most once.
 */
export class EntityResolver {
  private readonly cache = new Map<string, EntityMetadata>();
  private readonly inflight = new Map<string, Promise<EntityMetadata>>();
  private readonly logger: Logger;
  private readonly maxAttempts: number;
  private readonly retry: RetryPolicy;

  constructor(
    private readonly store: StoreQueryable,
    private readonly schema: RecorderSchemaAdapter,
    private readonly options: EntityResolverOptions,
  ) {
    this.logger = options.logger ?? silentLogger();
    this.maxAttempts = Math.max(1, options.maxAttempts ?? DEFAULT_MAX_ATTEMPTS);
    this.retry = { ...DEFAULT_RETRY_POLICY, ...options.retry };
  }

  async resolve(entityId: string, initialAttributes: JsonObject = {}): Promise<EntityMetadata> {
    const cached = this.cache.get(entityId);
    if (cached) return cached;

    const existing = this.inflight.get(entityId);
    if (existing) return existing;

    const pending = this.load(entityId, initialAttributes).then((metadata) => {
      this.cache.set(entityId, metadata);
      return metadata;
    });
    this.inflight.set(entityId, pending);

    try {
      return await pending;
    } finally {
      this.inflight.delete(entityId);
    }
  }

  /** Drops one cached entity, or all of them. */
  invalidate(entityId?: string): void {
    if (entityId === undefined) {
      this.cache.clear();
    } else {
      this.cache.delete(entityId);
    }
  }

  get cachedEntities(): number {
    return this.cache.size;
  }

  private async load(entityId: string, initialAttributes: JsonObject): Promise<EntityMetadata> {
    let internalId: number | null;
    try {
      internalId = await this.schema.findMetadataId(this.store, entityId);
    } catch (error) {
      throw new StoreWriteError(`Failed to look up entity ${entityId}`, error);
    }
    if (internalId !== null) {
      return { entityId, internalId, origin: 'existing' };
    }

    const creator = this.options.creator;
    if (!this.options.createMissingEntities || !creator) {
      throw new EntityNotFoundError(entityId);
    }
    return this.createWithRetry(creator, entityId, initialAttributes);
  }

  private async createWithRetry(
    creator: EntityCreator,
    entityId: string,
    initialAttributes: JsonObject,
  ): Promise<EntityMetadata> {
    const wait = this.options.sleep ?? defaultSleep;

    for (let attempt = 1; ; attempt++) {
      try {
        const internalId = await creator.createEntity(entityId, initialAttributes);
        this.logger.info({ entityId, internalId, origin: creator.origin, attempt }, 'Entity created');
        return { entityId, internalId, origin: creator.origin };
      } catch (error) {
        if (!isRetryable(error) || attempt >= this.maxAttempts) {
          throw new EntityCreationFailedError(entityId, attempt, error);
        }
        const delayMs = retryDelayMs(attempt, this.retry, this.options.random);
        this.logger.warn(
          { entityId, attempt, delayMs, err: error },
          'Entity creation failed, retrying',
        );
        await wait(delayMs);
      }
    }
  }
}
