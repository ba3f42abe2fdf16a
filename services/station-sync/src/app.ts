import fastify, { type FastifyInstance } from 'fastify';

import type { ServiceConfig } from './config/serviceConfig';
import { createHttpErrorHandler } from './errors';
import { createLogger } from './logger';
import { createMetrics } from './metrics';
import { registerHealthRoutes } from './routes/health';
import { registerSyncRoutes } from './routes/sync';
import { createSyncRuntime, type RuntimeOverrides } from './runtime';
import type { AppContext } from './types';

interface CreateAppResult {
  app: FastifyInstance;
  ctx: AppContext;
}

/** Boot summary logged once the server listens. Endpoints and credentials stay out of it. */
export const describeStartup = (config: ServiceConfig) => ({
  port: config.port,
  host: config.host,
  experiments: config.sync.experiments,
  autostart: config.sync.autostart,
  intervalSeconds: config.sync.intervalSeconds,
  bucket: config.s3.bucket,
  metricsEnabled: config.metricsEnabled
});

export const createApp = async (
  config: ServiceConfig,
  overrides: RuntimeOverrides = {}
): Promise<CreateAppResult> => {
  const app = fastify({ logger: createLogger(config.logLevel) });
  const metrics = createMetrics();
  const { orchestrator, platform } = createSyncRuntime(config, app.log, metrics, overrides);

  const ctx: AppContext = {
    config,
    orchestrator,
    platform,
    metrics
  };

  app.setErrorHandler(createHttpErrorHandler());
  registerHealthRoutes(app, ctx);
  registerSyncRoutes(app, ctx);

  app.addHook('onReady', async () => {
    if (!config.sync.autostart) {
      return;
    }
    try {
      await orchestrator.start({
        groups: config.sync.experiments,
        intervalMs: config.sync.intervalSeconds * 1_000,
        continuous: true
      });
    } catch (error) {
      app.log.error({ err: error }, 'Failed to start synchronization loop');
    }
  });

  app.addHook('onClose', async () => {
    if (orchestrator.running) {
      await orchestrator.stop();
    }
  });

  return { app, ctx };
};
