import process from 'node:process';

import { createApp } from './app';
import { loadConfig } from './config';
import { shutdownExporter } from './lifecycle';

const start = async () => {
  const config = loadConfig();
  const { app, ctx } = await createApp(config);

  try {
    await app.listen({ port: config.port, host: config.host });
    app.log.info(
      { port: config.port, host: config.host, stations: config.stations.map((station) => station.code) },
      'K-index exporter listening'
    );
  } catch (error) {
    app.log.error({ err: error }, 'Failed to start K-index exporter');
    process.exit(1);
  }

  if (config.pollerEnabled) {
    ctx.poller.start();
  }

  const shutdown = async (signal: NodeJS.Signals) => {
    try {
      await shutdownExporter(app, ctx, signal);
      process.exit(0);
    } catch (error) {
      app.log.error({ err: error }, 'Error during shutdown');
      process.exit(1);
    }
  };

  process.once('SIGTERM', () => void shutdown('SIGTERM'));
  process.once('SIGINT', () => void shutdown('SIGINT'));
};

start().catch((error) => {
  // eslint-disable-next-line no-console
  console.error('Uncaught error in K-index exporter', error);
  process.exit(1);
});
