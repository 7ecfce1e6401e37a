import fastify, { type FastifyInstance } from 'fastify';

import type { ExporterConfig } from './config';
import { mapErrorToResponse } from './errors';
import { createLogger } from './logger';
import { createMetrics } from './metrics';
import { createKIndexPoller } from './poller';
import { registerHealthRoutes } from './routes/health';
import { registerStationRoutes } from './routes/stations';
import { createFileSource } from './sources';
import { StationReportStore } from './store';
import type { AppContext, ObservatoryFileSource } from './types';

export interface CreateAppOptions {
  /** Replaces the configured FTP or directory source, e.g. with an in-memory one. */
  source?: ObservatoryFileSource;
  now?: () => Date;
}

interface CreateAppResult {
  app: FastifyInstance;
  ctx: AppContext;
}

export const createApp = async (config: ExporterConfig, options: CreateAppOptions = {}): Promise<CreateAppResult> => {
  const app = fastify({ logger: createLogger(config.logLevel) });

  const metrics = createMetrics();
  const store = new StationReportStore();
  const source = options.source ?? createFileSource(config, app.log);
  const poller = createKIndexPoller({
    stations: config.stations,
    source,
    store,
    metrics,
    logger: app.log,
    now: options.now
  });

  const ctx: AppContext = {
    config,
    store,
    metrics,
    poller
  };

  registerHealthRoutes(app, ctx);
  registerStationRoutes(app, ctx);

  app.setErrorHandler((error, request, reply) => {
    const mapped = mapErrorToResponse(error);
    if (mapped.statusCode >= 500) {
      request.log.error({ err: error }, 'Unhandled error');
    }
    reply.status(mapped.statusCode).send({ message: mapped.message, details: mapped.details });
  });

  app.addHook('onClose', async () => {
    await poller.stop();
  });

  return { app, ctx };
};
