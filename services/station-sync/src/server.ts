import process from 'node:process';

import { loadServiceConfig } from './config/serviceConfig';
import { createApp, describeStartup } from './app';

const start = async () => {
  const config = loadServiceConfig();
  const { app, ctx } = await createApp(config);

  try {
    await app.listen({ port: config.port, host: config.host });
    app.log.info(describeStartup(config), 'station sync service listening');
  } catch (error) {
    app.log.error({ err: error }, 'Failed to start station sync service');
    process.exit(1);
  }

  const shutdown = async (signal: NodeJS.Signals) => {
    app.log.info(
      { signal, loopRunning: ctx.orchestrator.running, cycles: ctx.orchestrator.status().cycles },
      'shutting down station sync service'
    );
    try {
      await app.close();
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
  console.error('Uncaught error in station sync service', error);
  process.exit(1);
});
