import type { FastifyInstance } from 'fastify';
import { z } from 'zod';

import { MAX_INTERVAL_SECONDS, MIN_INTERVAL_SECONDS } from '../config/serviceConfig';
import { SyncNotRunningError } from '../errors';
import type { AppContext } from '../types';

const groupsSchema = z.array(z.string().trim().min(1)).min(1).optional();

const runBodySchema = z
  .object({
    groups: groupsSchema
  })
  .default({});

const startBodySchema = z
  .object({
    groups: groupsSchema,
    intervalSeconds: z.number().int().min(MIN_INTERVAL_SECONDS).max(MAX_INTERVAL_SECONDS).optional(),
    continuous: z.boolean().optional()
  })
  .default({});

const TOKEN_VISIBLE_CHARS = 10;

export function maskToken(token: string): string {
  return `${token.slice(0, TOKEN_VISIBLE_CHARS)}...`;
}

export const registerSyncRoutes = (app: FastifyInstance, ctx: AppContext) => {
  const { orchestrator } = ctx;

  app.post('/sync/run', async (request) => {
    const body = runBodySchema.parse(request.body ?? undefined);
    return orchestrator.runCycle(body.groups);
  });

  app.post('/sync/start', async (request, reply) => {
    const body = startBodySchema.parse(request.body ?? undefined);
    const intervalSeconds = body.intervalSeconds ?? ctx.config.sync.intervalSeconds;
    const continuous = body.continuous ?? true;
    await orchestrator.start({
      groups: body.groups,
      intervalMs: intervalSeconds * 1_000,
      continuous
    });
    const status = orchestrator.status();
    return reply.status(202).send({
      status: 'started',
      groups: status.groups,
      intervalSeconds,
      continuous
    });
  });

  app.post('/sync/stop', async () => {
    if (!orchestrator.running) {
      throw new SyncNotRunningError();
    }
    await orchestrator.stop();
    return { status: 'stopped', state: orchestrator.state };
  });

  app.get('/sync/status', async () => orchestrator.status());

  app.get('/sync/devices', async () => {
    const devices = orchestrator.devices.list().map((device) => ({
      deviceId: device.deviceId,
      deviceName: device.deviceName,
      token: maskToken(device.authToken)
    }));
    return { total: devices.length, devices };
  });

  app.get('/sync/groups', async () => ({ groups: await orchestrator.listGroups() }));

  app.delete('/sync/cache', async () => {
    await orchestrator.clearCaches();
    return { status: 'cleared', cachedDevices: orchestrator.devices.size };
  });
};
