export { loadConfig, parseOptions, DEFAULT_OPTIONS_PATH, LOG_LEVELS } from './config.js';
export type { InjectorConfig, LoadConfigOptions, LogLevel } from './config.js';
export { HistorySubscriber, createClientId } from './mqtt-subscriber.js';
export type { BrokerClient, HistorySubscriberOptions, MessageSink } from './mqtt-subscriber.js';
export { createServer } from './server.js';
export type { ServerDeps } from './server.js';
export { startInjector } from './injector.js';
export type { RunningInjector, StartOptions } from './injector.js';
