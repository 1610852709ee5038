import type { FastifyInstance } from 'fastify';
import {
  ApiEntityCreator,
  AttributeCodec,
  EntityApiClient,
  EntityResolver,
  HistoryWriter,
  StoreEntityCreator,
  inspectRecorderSchema,
  openStore,
  type EntityCreator,
  type Logger,
  type RecorderSchemaAdapter,
  type StoreDriver,
} from '@history-injector/core';
import { Dispatcher, MessageDecoder, TimestampValidator, subscriptionPrefix } from '@history-injector/pipeline';
import type { InjectorConfig } from './config.js';
import { HistorySubscriber } from './mqtt-subscriber.js';
import { createServer } from './server.js';

export interface RunningInjector {
  dispatcher: Dispatcher;
  subscriber: HistorySubscriber;
  /** Stops the subscriber, drains the dispatcher, closes the store. */
  stop(): Promise<void>;
}

export interface StartOptions {
  /** Receives the error that stopped ingestion. */
  onFatal: (error: unknown) => void;
  store?: StoreDriver;
}

function selectCreator(
  config: InjectorConfig,
  store: StoreDriver,
  schema: RecorderSchemaAdapter,
  logger: Logger,
): EntityCreator | undefined {
  if (!config.createMissingEntities) return undefined;
  if (config.apiToken === null) {
    logger.warn('No Home Assistant API token configured; missing entities are registered in the recorder directly');
    return new StoreEntityCreator(store, schema);
  }
  const client = new EntityApiClient({
    baseUrl: config.apiUrl,
    token: config.apiToken,
    timeoutMs: config.entityCreationTimeoutSeconds * 1000,
  });
  return new ApiEntityCreator(client, store, schema);
}

/**
 * Wires the pipeline against the configured recorder and starts consuming.
 * Schema introspection runs before anything subscribes; a mismatch rejects
 * with `FatalSchemaMismatchError` and leaves nothing running.
 */
export async function startInjector(
  config: InjectorConfig,
  logger: Logger,
  options: StartOptions,
): Promise<RunningInjector> {
  const store =
    options.store ??
    openStore({ path: config.databasePath, url: config.databaseUrl ?? undefined, poolSize: config.workerConcurrency + 1 });

  let schema: RecorderSchemaAdapter;
  try {
    schema = await inspectRecorderSchema(store);
  } catch (error) {
    await store.close();
    throw error;
  }
  logger.info(
    { dialect: store.dialect, schemaVersion: schema.schemaVersion, profile: schema.profile.id },
    'Recorder schema verified',
  );

  const transactionTimeoutMs = config.transactionTimeoutSeconds * 1000;
  const resolver = new EntityResolver(store, schema, {
    createMissingEntities: config.createMissingEntities,
    creator: selectCreator(config, store, schema, logger),
    maxAttempts: config.entityCreationAttempts,
    logger: logger.child({ component: 'entity-resolver' }),
  });

  const dispatcher = new Dispatcher({
    decoder: await MessageDecoder.create({
      topicPrefix: subscriptionPrefix(config.mqttTopic),
      defaultEntityIdPrefix: config.defaultEntityIdPrefix,
    }),
    timestamps: new TimestampValidator({
      maxTimestampOffsetDays: config.maxTimestampOffsetDays,
      clockSkewToleranceMs: config.clockSkewToleranceSeconds * 1000,
    }),
    resolver,
    codec: new AttributeCodec(store, schema, { transactionTimeoutMs }),
    writer: new HistoryWriter(store, schema, { transactionTimeoutMs }),
    logger: logger.child({ component: 'dispatcher' }),
    workerConcurrency: config.workerConcurrency,
  });

  const subscriber = new HistorySubscriber(dispatcher, {
    host: config.mqttHost,
    port: config.mqttPort,
    username: config.mqttUsername,
    password: config.mqttPassword,
    topic: config.mqttTopic,
    logger: logger.child({ component: 'mqtt' }),
    onFatal: options.onFatal,
  });

  let server: FastifyInstance | null = null;
  if (config.healthPort > 0) {
    server = createServer({ store, broker: subscriber, dispatcher, logger });
    await server.listen({ port: config.healthPort, host: '0.0.0.0' });
    logger.info({ port: config.healthPort }, 'Health endpoint listening');
  }

  subscriber.start();

  let stopping: Promise<void> | null = null;
  const stop = (): Promise<void> => {
    stopping ??= (async () => {
      await subscriber.stop();
      await dispatcher.close();
      if (server) await server.close();
      await store.close();
      logger.info(dispatcher.stats, 'History injector stopped');
    })();
    return stopping;
  };

  return { dispatcher, subscriber, stop };
}
