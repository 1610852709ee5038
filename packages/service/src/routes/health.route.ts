import type { FastifyInstance } from 'fastify';
import type { DispatcherStats } from '@history-injector/pipeline';
import type { Logger, StoreDriver } from '@history-injector/core';

export interface HealthDependencies {
  store: Pick<StoreDriver, 'ping'>;
  broker: { readonly connected: boolean };
  dispatcher: { readonly stats: DispatcherStats };
  logger: Logger;
  checkTimeoutMs?: number;
}

export function registerHealthRoutes(app: FastifyInstance, deps: HealthDependencies): void {
  app.get('/health', async (_request, reply) => {
    let storeStatus: 'ok' | 'error' = 'error';

    let timer: NodeJS.Timeout | undefined;
    try {
      const timeoutPromise = new Promise<never>((_resolve, reject) => {
        timer = setTimeout(() => reject(new Error('timeout')), deps.checkTimeoutMs ?? 3000);
      });
      await Promise.race([deps.store.ping(), timeoutPromise]);
      storeStatus = 'ok';
    } catch (error) {
      deps.logger.warn({ err: error }, 'Health check: recorder database unreachable');
    } finally {
      clearTimeout(timer);
    }

    const brokerStatus = deps.broker.connected ? 'ok' : 'error';
    const healthy = storeStatus === 'ok' && brokerStatus === 'ok';

    return reply.status(healthy ? 200 : 503).send({
      status: healthy ? 'ok' : 'degraded',
      timestamp: new Date().toISOString(),
      checks: {
        database: storeStatus,
        broker: brokerStatus,
      },
      stats: deps.dispatcher.stats,
    });
  });
}
