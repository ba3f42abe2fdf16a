import type { FastifyInstance } from 'fastify';

import type { AppContext } from '../types';

export const registerHealthRoutes = (app: FastifyInstance, ctx: AppContext) => {
  app.get('/healthz', async () => ({ status: 'ok' }));

  app.get('/readyz', async (request, reply) => {
    const components = {
      platform: ctx.platform.connected
    };
    if (!components.platform) {
      return reply.status(503).send({ status: 'not_ready', components });
    }
    return { status: 'ready', components };
  });

  if (ctx.config.metricsEnabled) {
    app.get('/metrics', async (request, reply) => {
      ctx.metrics.deviceCacheSize.set(ctx.orchestrator.devices.size);
      reply.header('Content-Type', ctx.metrics.register.contentType);
      return ctx.metrics.register.metrics();
    });
  }
};
