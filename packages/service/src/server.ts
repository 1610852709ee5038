import Fastify from 'fastify';
import type { FastifyInstance } from 'fastify';
import { registerHealthRoutes, type HealthDependencies } from './routes/health.route.js';

export type ServerDeps = HealthDependencies;

export function createServer(deps: ServerDeps): FastifyInstance {
  const app = Fastify({ logger: false });

  registerHealthRoutes(app, deps);

  app.setErrorHandler((error, _request, reply) => {
    deps.logger.error({ err: error }, 'Health server error');
    return reply.status(500).send({
      error: 'Internal Server Error',
      message: 'An unexpected error occurred',
    });
  });

  return app;
}
