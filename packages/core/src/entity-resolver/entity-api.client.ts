import { InjectorError, describeCause } from '../shared/errors.js';
import type { JsonObject } from '../shared/types.js';

export interface EntityApiClientOptions {
  /** Home Assistant REST base, e.g. `http://supervisor/core/api`. */
  baseUrl: string;
  token: string;
  timeoutMs?: number;
  fetch?: typeof fetch;
}

export interface StatePayload {
  state: string;
  attributes: JsonObject;
}

export class EntityApiError extends InjectorError {
  constructor(
    message: string,
    public readonly status: number | null,
    public readonly retryable: boolean,
    cause?: unknown,
  ) {
    super(message, 'ENTITY_API_ERROR', cause);
    this.name = 'EntityApiError';
  }
}

const DEFAULT_TIMEOUT_MS = 10_000;

function isRetryableStatus(status: number): boolean {
  return status >= 500 || status === 408 || status === 429;
}

/** Minimal client for the Home Assistant `/api/states` endpoints. */
export class EntityApiClient {
  private readonly baseUrl: string;
  private readonly fetchImpl: typeof fetch;

  constructor(private readonly options: EntityApiClientOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, '');
    this.fetchImpl = options.fetch ?? fetch;
  }

  async stateExists(entityId: string): Promise<boolean> {
    const response = await this.request('GET', entityId);
    if (response.status === 404) return false;
    if (response.ok) return true;
    throw await this.toError('look up', entityId, response);
  }

  async setState(entityId: string, payload: StatePayload): Promise<void> {
    const response = await this.request('POST', entityId, payload);
    if (!response.ok) {
      throw await this.toError('create', entityId, response);
    }
  }

  private async request(method: 'GET' | 'POST', entityId: string, body?: StatePayload): Promise<Response> {
    const url = `${this.baseUrl}/states/${encodeURIComponent(entityId)}`;
    try {
      return await this.fetchImpl(url, {
        method,
        headers: {
          Authorization: `Bearer ${this.options.token}`,
          'Content-Type': 'application/json',
        },
        body: body ? JSON.stringify(body) : undefined,
        signal: AbortSignal.timeout(this.options.timeoutMs ?? DEFAULT_TIMEOUT_MS),
      });
    } catch (error) {
      throw new EntityApiError(
        `${method} ${url} failed: ${describeCause(error)}`,
        null,
        true,
        error,
      );
    }
  }

  private async toError(action: string, entityId: string, response: Response): Promise<EntityApiError> {
    const text = await response.text().catch(() => '');
    return new EntityApiError(
      `Failed to ${action} entity ${entityId} via API: ${response.status}${text ? ` - ${text.slice(0, 200)}` : ''}`,
      response.status,
      isRetryableStatus(response.status),
    );
  }
}
