import { readFile } from 'node:fs/promises';
import { extname } from 'node:path';
import yaml from 'js-yaml';
import {
  ConfigurationError,
  createSchemaValidator,
  describeCause,
  isJsonObject,
  type JsonObject,
} from '@history-injector/core';

export const DEFAULT_OPTIONS_PATH = '/data/options.json';

export const LOG_LEVELS = ['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

export interface InjectorConfig {
  mqttHost: string;
  mqttPort: number;
  mqttUsername: string | null;
  mqttPassword: string | null;
  mqttTopic: string;
  /** SQLite recorder file; ignored when `databaseUrl` is set. */
  databasePath: string;
  databaseUrl: string | null;
  apiUrl: string;
  /** Null when neither the options nor `SUPERVISOR_TOKEN` provide one. */
  apiToken: string | null;
  maxTimestampOffsetDays: number;
  clockSkewToleranceSeconds: number;
  defaultEntityIdPrefix: string;
  createMissingEntities: boolean;
  workerConcurrency: number;
  entityCreationTimeoutSeconds: number;
  entityCreationAttempts: number;
  transactionTimeoutSeconds: number;
  logLevel: LogLevel;
  /** 0 disables the health endpoint. */
  healthPort: number;
}

const OPTIONS_SCHEMA = {
  type: 'object',
  properties: {
    mqtt_host: { type: 'string', minLength: 1, default: 'core-mosquitto' },
    mqtt_port: { type: 'integer', minimum: 1, maximum: 65535, default: 1883 },
    mqtt_username: { type: 'string', default: '' },
    mqtt_password: { type: 'string', default: '' },
    mqtt_topic: { type: 'string', minLength: 1, default: 'homeassistant/history/+' },
    ha_database_path: { type: 'string', default: '/config/home-assistant_v2.db' },
    ha_database_url: { type: 'string', default: '' },
    ha_api_url: { type: 'string', minLength: 1, default: 'http://supervisor/core/api' },
    ha_token: { type: 'string', default: '' },
    max_timestamp_offset_days: { type: 'integer', minimum: 1, maximum: 365, default: 30 },
    clock_skew_tolerance_seconds: { type: 'integer', minimum: 0, maximum: 86400, default: 0 },
    default_entity_id_prefix: { type: 'string', pattern: '^[a-z0-9_]+\\.$', default: 'sensor.' },
    create_missing_entities: { type: 'boolean', default: true },
    worker_concurrency: { type: 'integer', minimum: 1, maximum: 64, default: 4 },
    entity_creation_timeout_seconds: { type: 'integer', minimum: 1, maximum: 300, default: 10 },
    entity_creation_attempts: { type: 'integer', minimum: 1, maximum: 10, default: 3 },
    transaction_timeout_seconds: { type: 'integer', minimum: 1, maximum: 300, default: 10 },
    log_level: { type: 'string', enum: [...LOG_LEVELS], default: 'info' },
    health_port: { type: 'integer', minimum: 0, maximum: 65535, default: 0 },
  },
};

export interface LoadConfigOptions {
  /** Defaults to `HISTORY_INJECTOR_OPTIONS`, then `/data/options.json`. */
  path?: string;
  env?: NodeJS.ProcessEnv;
}

/**
 * Reads the add-on options file (JSON, or YAML by extension), fills defaults
 * and validates ranges. A missing file at the default location means all
 * defaults; a missing file that was asked for explicitly is an error.
 */
export async function loadConfig(options: LoadConfigOptions = {}): Promise<InjectorConfig> {
  const env = options.env ?? process.env;
  const explicitPath = options.path ?? env.HISTORY_INJECTOR_OPTIONS;
  const path = explicitPath ?? DEFAULT_OPTIONS_PATH;

  const raw = await readOptionsFile(path, explicitPath !== undefined);
  return parseOptions(raw, env);
}

/** Validates already-parsed options; `default` keywords fill missing keys in place. */
export async function parseOptions(raw: JsonObject, env: NodeJS.ProcessEnv = {}): Promise<InjectorConfig> {
  const options: JsonObject = { ...raw };
  if (env.LOG_LEVEL && options.log_level === undefined) {
    options.log_level = env.LOG_LEVEL;
  }

  const validator = await createSchemaValidator(OPTIONS_SCHEMA);
  const result = validator.validate(options);
  if (!result.valid) {
    throw new ConfigurationError(`Invalid options: ${result.errors.join('; ')}`, { errors: result.errors });
  }

  const token = readString(options, 'ha_token') || env.SUPERVISOR_TOKEN || '';
  return {
    mqttHost: readString(options, 'mqtt_host'),
    mqttPort: readNumber(options, 'mqtt_port'),
    mqttUsername: readString(options, 'mqtt_username') || null,
    mqttPassword: readString(options, 'mqtt_password') || null,
    mqttTopic: readString(options, 'mqtt_topic'),
    databasePath: readString(options, 'ha_database_path'),
    databaseUrl: readString(options, 'ha_database_url') || null,
    apiUrl: readString(options, 'ha_api_url').replace(/\/+$/, ''),
    apiToken: token === '' ? null : token,
    maxTimestampOffsetDays: readNumber(options, 'max_timestamp_offset_days'),
    clockSkewToleranceSeconds: readNumber(options, 'clock_skew_tolerance_seconds'),
    defaultEntityIdPrefix: readString(options, 'default_entity_id_prefix'),
    createMissingEntities: readBoolean(options, 'create_missing_entities'),
    workerConcurrency: readNumber(options, 'worker_concurrency'),
    entityCreationTimeoutSeconds: readNumber(options, 'entity_creation_timeout_seconds'),
    entityCreationAttempts: readNumber(options, 'entity_creation_attempts'),
    transactionTimeoutSeconds: readNumber(options, 'transaction_timeout_seconds'),
    logLevel: readLogLevel(options),
    healthPort: readNumber(options, 'health_port'),
  };
}

async function readOptionsFile(path: string, required: boolean): Promise<JsonObject> {
  let content: string;
  try {
    content = await readFile(path, 'utf-8');
  } catch (error) {
    if (!required && isMissingFile(error)) return {};
    throw new ConfigurationError(`Cannot read options file ${path}: ${describeCause(error)}`);
  }

  const ext = extname(path).toLowerCase();
  let parsed: unknown;
  try {
    parsed = ext === '.yaml' || ext === '.yml' ? yaml.load(content) : JSON.parse(content);
  } catch (error) {
    throw new ConfigurationError(`Cannot parse options file ${path}: ${describeCause(error)}`);
  }

  if (parsed === undefined || parsed === null) return {};
  if (!isJsonObject(parsed)) {
    throw new ConfigurationError(`Options file ${path} must contain an object`);
  }
  return parsed;
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

function readString(options: JsonObject, key: string): string {
  const value = options[key];
  if (typeof value !== 'string') throw new ConfigurationError(`Option ${key} must be a string`);
  return value;
}

function readNumber(options: JsonObject, key: string): number {
  const value = options[key];
  if (typeof value !== 'number') throw new ConfigurationError(`Option ${key} must be a number`);
  return value;
}

function readBoolean(options: JsonObject, key: string): boolean {
  const value = options[key];
  if (typeof value !== 'boolean') throw new ConfigurationError(`Option ${key} must be a boolean`);
  return value;
}

function readLogLevel(options: JsonObject): LogLevel {
  const value = readString(options, 'log_level');
  const level = LOG_LEVELS.find((candidate) => candidate === value);
  if (!level) throw new ConfigurationError(`Unknown log level ${value}`);
  return level;
}
