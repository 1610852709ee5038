import { randomBytes } from 'node:crypto';
import { connect, type IClientOptions } from 'mqtt';
import { describeCause, silentLogger, type Logger } from '@history-injector/core';
import type { InboundMessage, MessageReport } from '@history-injector/pipeline';

export interface MessageSink {
  dispatch(message: InboundMessage): Promise<MessageReport>;
}

/** The part of `MqttClient` the subscriber drives. */
export interface BrokerClient {
  readonly connected: boolean;
  on(event: 'connect' | 'reconnect' | 'close', listener: () => void): unknown;
  on(event: 'error', listener: (error: Error) => void): unknown;
  on(event: 'message', listener: (topic: string, payload: Buffer) => void): unknown;
  subscribe(topic: string, options: { qos: 0 | 1 | 2 }, callback: (error: Error | null) => void): unknown;
  endAsync(): Promise<void>;
}

export interface HistorySubscriberOptions {
  host: string;
  port: number;
  username?: string | null;
  password?: string | null;
  topic: string;
  clientId?: string;
  reconnectPeriodMs?: number;
  logger?: Logger;
  /** Called once when dispatch fails with an error ingestion cannot continue past. */
  onFatal: (error: unknown) => void;
  connect?: (url: string, options: IClientOptions) => BrokerClient;
}

const DEFAULT_RECONNECT_PERIOD_MS = 10_000;

export function createClientId(): string {
  return `history-injector-${randomBytes(4).toString('hex')}`;
}

/**
 * Subscribes to the history topic at QoS 1 and hands every message to the
 * dispatcher. The client reconnects on its own; subscriptions are renewed on
 * every connect.
 */
export class HistorySubscriber {
  private client: BrokerClient | null = null;
  private readonly logger: Logger;
  private failed = false;

  constructor(
    private readonly sink: MessageSink,
    private readonly options: HistorySubscriberOptions,
  ) {
    this.logger = options.logger ?? silentLogger();
  }

  get connected(): boolean {
    return this.client?.connected ?? false;
  }

  start(): void {
    if (this.client) return;
    const { host, port, topic } = this.options;
    const connectFn: (url: string, options: IClientOptions) => BrokerClient = this.options.connect ?? connect;
    const client = connectFn(`mqtt://${host}:${port}`, {
      clientId: this.options.clientId ?? createClientId(),
      username: this.options.username ?? undefined,
      password: this.options.password ?? undefined,
      reconnectPeriod: this.options.reconnectPeriodMs ?? DEFAULT_RECONNECT_PERIOD_MS,
      resubscribe: false,
    });
    this.client = client;

    client.on('connect', () => {
      this.logger.info({ host, port }, 'Connected to MQTT broker');
      client.subscribe(topic, { qos: 1 }, (error) => {
        if (error) {
          this.logger.error({ err: error, topic }, 'Failed to subscribe');
          return;
        }
        this.logger.info({ topic }, 'Subscribed to history topic');
      });
    });
    client.on('reconnect', () => this.logger.warn({ host, port }, 'Reconnecting to MQTT broker'));
    client.on('close', () => this.logger.debug('MQTT connection closed'));
    client.on('error', (error) => this.logger.error({ err: error }, 'MQTT client error'));
    client.on('message', (messageTopic, payload) => this.handle(messageTopic, payload));
  }

  async stop(): Promise<void> {
    const client = this.client;
    this.client = null;
    if (client) await client.endAsync();
  }

  private handle(topic: string, payload: Buffer): void {
    this.sink.dispatch({ topic, payload }).then(
      (report) => {
        this.logger.debug({ topic, status: report.status, records: report.records.length }, 'Message handled');
      },
      (error: unknown) => {
        this.logger.fatal({ topic, err: error, reason: describeCause(error) }, 'Ingestion stopped');
        if (!this.failed) {
          this.failed = true;
          this.options.onFatal(error);
        }
      },
    );
  }
}
