import type { FastifyInstance } from 'fastify';

import type { AppContext } from '../types';

export const registerHealthRoutes = (app: FastifyInstance, ctx: AppContext) => {
  app.get('/healthz', async () => ({ status: 'ok' }));

  app.get('/readyz', async (request, reply) => {
    const stations: Record<string, boolean> = {};
    for (const station of ctx.config.stations) {
      stations[station.code] = ctx.store.isReady(station.code);
    }

    const allReady = Object.values(stations).every(Boolean);
    if (!allReady) {
      return reply.status(503).send({ status: 'not_ready', stations });
    }
    return { status: 'ready', stations };
  });

  app.get('/metrics', async (request, reply) => {
    reply.header('Content-Type', ctx.metrics.register.contentType);
    return ctx.metrics.register.metrics();
  });
};
