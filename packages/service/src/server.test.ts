import { describe, it, expect } from 'vitest';
import { silentLogger } from '@history-injector/core';
import type { DispatcherStats } from '@history-injector/pipeline';
import { createServer } from './server.js';

const stats: DispatcherStats = {
  messagesReceived: 5,
  messagesDropped: 1,
  recordsCommitted: 7,
  recordsOverwritten: 2,
  recordsRejected: 0,
  inFlight: 0,
};

function serverWith(ping: () => Promise<void>, connected: boolean) {
  return createServer({
    store: { ping },
    broker: { connected },
    dispatcher: { stats },
    logger: silentLogger(),
    checkTimeoutMs: 50,
  });
}

describe('GET /health', () => {
  it('should report ok when the database and broker are reachable', async () => {
    const app = serverWith(async () => {}, true);

    const response = await app.inject({ method: 'GET', url: '/health' });

    expect(response.statusCode).toBe(200);
    const body = response.json();
    expect(body.status).toBe('ok');
    expect(body.checks).toEqual({ database: 'ok', broker: 'ok' });
    expect(body.stats).toEqual(stats);
    await app.close();
  });

  it('should report degraded when the broker is disconnected', async () => {
    const app = serverWith(async () => {}, false);

    const response = await app.inject({ method: 'GET', url: '/health' });

    expect(response.statusCode).toBe(503);
    expect(response.json().checks).toEqual({ database: 'ok', broker: 'error' });
    await app.close();
  });

  it('should report degraded when the database check fails or hangs', async () => {
    const failing = serverWith(async () => {
      throw new Error('unable to open database file');
    }, true);
    const hanging = serverWith(() => new Promise<void>(() => {}), true);

    const failed = await failing.inject({ method: 'GET', url: '/health' });
    const timedOut = await hanging.inject({ method: 'GET', url: '/health' });

    expect(failed.statusCode).toBe(503);
    expect(failed.json().checks.database).toBe('error');
    expect(timedOut.statusCode).toBe(503);
    await failing.close();
    await hanging.close();
  });
});
