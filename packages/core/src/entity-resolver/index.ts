export { EntityResolver } from './entity-resolver.js';
export type { EntityResolverOptions } from './entity-resolver.js';
export { DEFAULT_RETRY_POLICY, retryDelayMs } from './retry-policy.js';
export type { RetryPolicy } from './retry-policy.js';
export { EntityApiClient, EntityApiError } from './entity-api.client.js';
export type { EntityApiClientOptions, StatePayload } from './entity-api.client.js';
export {
  ApiEntityCreator,
  StoreEntityCreator,
  deriveFriendlyName,
} from './entity-creators.js';
export type { EntityCreator, ApiEntityCreatorOptions } from './entity-creators.js';
