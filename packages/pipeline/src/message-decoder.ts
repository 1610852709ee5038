import {
  DecodeError,
  createSchemaValidator,
  describeCause,
  isJsonObject,
  type JsonObject,
  type SchemaValidator,
} from '@history-injector/core';
import type { DecodedMessage, DecodedRecord, InboundMessage } from './types.js';

/** Home Assistant entity id: `domain.object_id`, lowercase, no leading/trailing/double underscores. */
export const ENTITY_ID_PATTERN = /^(?!.+__)(?!_)[\da-z_]+(?<!_)\.(?!_)[\da-z_]+(?<!_)$/;

const MAX_STATE_LENGTH = 255;

const RECORD_SCHEMA = {
  type: 'object',
  required: ['state', 'timestamp'],
  properties: {
    state: {
      anyOf: [
        { type: 'string', minLength: 1, maxLength: MAX_STATE_LENGTH },
        { type: 'number' },
        { type: 'boolean' },
      ],
    },
    timestamp: {
      anyOf: [{ type: 'string', minLength: 1 }, { type: 'number' }],
    },
    attributes: { type: 'object' },
  },
};

const BATCH_SCHEMA = {
  type: 'object',
  required: ['records'],
  properties: {
    records: { type: 'array', minItems: 1, items: RECORD_SCHEMA },
  },
};

export interface MessageDecoderOptions {
  /** Topic prefix the entity id follows, e.g. `homeassistant/history/`. */
  topicPrefix: string;
  /** Prepended to ids without a domain, e.g. `sensor.`. */
  defaultEntityIdPrefix: string;
}

/**
 * `homeassistant/history/+` -> `homeassistant/history/`. The prefix is the
 * subscription up to its first wildcard level; a topic without wildcards
 * contributes everything but its last level.
 */
export function subscriptionPrefix(topic: string): string {
  const levels = topic.split('/');
  const wildcardAt = levels.findIndex((level) => level === '+' || level === '#');
  const fixed = wildcardAt === -1 ? levels.slice(0, -1) : levels.slice(0, wildcardAt);
  return fixed.length === 0 ? '' : `${fixed.join('/')}/`;
}

function stateToString(value: unknown): string {
  return typeof value === 'string' ? value : String(value);
}

const utf8 = new TextDecoder('utf-8', { fatal: true });

export class MessageDecoder {
  private constructor(
    private readonly options: MessageDecoderOptions,
    private readonly recordValidator: SchemaValidator,
    private readonly batchValidator: SchemaValidator,
  ) {}

  static async create(options: MessageDecoderOptions): Promise<MessageDecoder> {
    const [recordValidator, batchValidator] = await Promise.all([
      createSchemaValidator(RECORD_SCHEMA),
      createSchemaValidator(BATCH_SCHEMA),
    ]);
    return new MessageDecoder(options, recordValidator, batchValidator);
  }

  /**
   * Decodes one inbound message into its records, in payload order. Any
   * problem with the message as a whole throws `DecodeError`.
   */
  decode(message: InboundMessage): DecodedMessage {
    const { topic } = message;
    const data = this.parse(message);
    const entityId = this.entityIdFor(topic, data);

    let rawRecords: unknown[];
    if ('records' in data) {
      this.check(this.batchValidator, data, topic);
      rawRecords = Array.isArray(data.records) ? data.records : [];
    } else {
      this.check(this.recordValidator, data, topic);
      rawRecords = [data];
    }

    const records = rawRecords.filter(isJsonObject).map(
      (raw, index): DecodedRecord => ({
        entityId,
        index,
        state: stateToString(raw.state),
        rawTimestamp: typeof raw.timestamp === 'number' ? raw.timestamp : String(raw.timestamp),
        attributes: isJsonObject(raw.attributes) ? raw.attributes : {},
      }),
    );

    return { topic, entityId, records };
  }

  private parse(message: InboundMessage): JsonObject {
    let parsed: unknown;
    try {
      const text = typeof message.payload === 'string' ? message.payload : utf8.decode(message.payload);
      parsed = JSON.parse(text);
    } catch (error) {
      throw new DecodeError(`Payload is not valid UTF-8 JSON: ${describeCause(error)}`, message.topic, undefined, error);
    }
    if (!isJsonObject(parsed)) {
      throw new DecodeError('Payload must be a JSON object', message.topic);
    }
    return parsed;
  }

  private check(validator: SchemaValidator, data: JsonObject, topic: string): void {
    const result = validator.validate(data);
    if (!result.valid) {
      throw new DecodeError(`Payload failed validation: ${result.errors.join('; ')}`, topic);
    }
  }

  private entityIdFor(topic: string, data: JsonObject): string {
    const { topicPrefix, defaultEntityIdPrefix } = this.options;
    if (!topic.startsWith(topicPrefix)) {
      throw new DecodeError(`Topic does not start with ${topicPrefix}`, topic, 'topic');
    }

    let candidate = topic.slice(topicPrefix.length).replace(/^\/+|\/+$/g, '');
    if (candidate === '') {
      if (typeof data.entity_id === 'string' && data.entity_id !== '') {
        candidate = data.entity_id;
      } else if (typeof data.device_id === 'string' && data.device_id !== '') {
        candidate = `${defaultEntityIdPrefix}${data.device_id}`;
      } else {
        throw new DecodeError('Could not determine entity_id from topic or payload', topic, 'entity_id');
      }
    }

    if (candidate.includes('/')) {
      throw new DecodeError(`Topic suffix "${candidate}" spans more than one level`, topic, 'topic');
    }
    const entityId = candidate.includes('.') ? candidate : `${defaultEntityIdPrefix}${candidate}`;
    if (!ENTITY_ID_PATTERN.test(entityId)) {
      throw new DecodeError(`Invalid entity_id "${entityId}"`, topic, 'entity_id');
    }
    return entityId;
  }
}
