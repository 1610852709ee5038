import { EventEmitter } from 'node:events';
import { describe, it, expect, vi } from 'vitest';
import type { IClientOptions } from 'mqtt';
import { FatalSchemaMismatchError } from '@history-injector/core';
import type { InboundMessage, MessageReport } from '@history-injector/pipeline';
import { HistorySubscriber, createClientId, type BrokerClient } from './mqtt-subscriber.js';

class FakeBrokerClient extends EventEmitter implements BrokerClient {
  connected = false;

  subscribe = vi.fn((_topic: string, _options: { qos: 0 | 1 | 2 }, callback: (error: Error | null) => void) => {
    callback(null);
    return this;
  });

  endAsync = vi.fn(async () => {
    this.connected = false;
  });

  acceptConnection(): void {
    this.connected = true;
    this.emit('connect');
  }
}

const flush = (): Promise<void> => new Promise((resolve) => setTimeout(resolve, 0));

function setup(dispatchImpl?: (message: InboundMessage) => Promise<MessageReport>) {
  const client = new FakeBrokerClient();
  const connect = vi.fn((_url: string, _options: IClientOptions): BrokerClient => client);
  const dispatch = vi.fn(
    dispatchImpl ??
      (async (message: InboundMessage): Promise<MessageReport> => ({
        topic: message.topic,
        entityId: 'sensor.office',
        status: 'processed',
        records: [],
      })),
  );
  const onFatal = vi.fn();
  const subscriber = new HistorySubscriber(
    { dispatch },
    {
      host: 'broker.local',
      port: 1883,
      username: 'injector',
      password: 'test-secret',
      topic: 'homeassistant/history/+',
      clientId: 'history-injector-test',
      onFatal,
      connect,
    },
  );
  return { client, connect, dispatch, onFatal, subscriber };
}

describe('HistorySubscriber', () => {
  it('should connect to the configured broker with a reconnecting client', () => {
    const { connect, subscriber } = setup();

    subscriber.start();

    expect(connect).toHaveBeenCalledTimes(1);
    expect(connect).toHaveBeenCalledWith('mqtt://broker.local:1883', {
      clientId: 'history-injector-test',
      username: 'injector',
      password: 'test-secret',
      reconnectPeriod: 10_000,
      resubscribe: false,
    });
  });

  it('should not open a second client when started twice', () => {
    const { connect, subscriber } = setup();

    subscriber.start();
    subscriber.start();

    expect(connect).toHaveBeenCalledTimes(1);
  });

  it('should subscribe at QoS 1 on every connect', () => {
    const { client, subscriber } = setup();
    subscriber.start();

    client.acceptConnection();
    client.acceptConnection();

    expect(client.subscribe).toHaveBeenCalledTimes(2);
    expect(client.subscribe).toHaveBeenNthCalledWith(2, 'homeassistant/history/+', { qos: 1 }, expect.any(Function));
  });

  it('should report the client connection state', () => {
    const { client, subscriber } = setup();
    expect(subscriber.connected).toBe(false);

    subscriber.start();
    client.acceptConnection();

    expect(subscriber.connected).toBe(true);
  });

  it('should hand each message to the sink', async () => {
    const { client, dispatch, onFatal, subscriber } = setup();
    subscriber.start();
    const payload = Buffer.from('{"state":"1","timestamp":"2023-04-15T00:00:00Z"}');

    client.emit('message', 'homeassistant/history/sensor.office', payload);
    await flush();

    expect(dispatch).toHaveBeenCalledWith({ topic: 'homeassistant/history/sensor.office', payload });
    expect(onFatal).not.toHaveBeenCalled();
  });

  it('should signal a fatal dispatch error only once', async () => {
    const failure = new FatalSchemaMismatchError('states table is missing', 48, ['states']);
    const { client, onFatal, subscriber } = setup(async () => {
      throw failure;
    });
    subscriber.start();

    client.emit('message', 'homeassistant/history/sensor.a', Buffer.from('{}'));
    client.emit('message', 'homeassistant/history/sensor.b', Buffer.from('{}'));
    await flush();

    expect(onFatal).toHaveBeenCalledTimes(1);
    expect(onFatal).toHaveBeenCalledWith(failure);
  });

  it('should end the client on stop', async () => {
    const { client, subscriber } = setup();
    subscriber.start();
    client.acceptConnection();

    await subscriber.stop();
    await subscriber.stop();

    expect(client.endAsync).toHaveBeenCalledTimes(1);
    expect(subscriber.connected).toBe(false);
  });
});

describe('createClientId', () => {
  it('should add a random hex suffix', () => {
    expect(createClientId()).toMatch(/^history-injector-[0-9a-f]{8}$/);
  });
});
