import type { FastifyInstance } from 'fastify';

import type { AppContext } from './types';

/**
 * Stops every station's poller, waiting for cycles in progress, before the HTTP server closes so
 * no cycle writes to a closed app.
 */
export const shutdownExporter = async (app: FastifyInstance, ctx: AppContext, signal: string): Promise<void> => {
  const stations = ctx.config.stations.map((station) => station.code);
  const running = stations.filter((code) => ctx.poller.isRunning(code));
  app.log.info({ signal, stations, running }, 'Stopping K-index pollers');
  await ctx.poller.stop();
  app.log.info({ signal }, 'K-index pollers stopped, closing HTTP server');
  await app.close();
};
