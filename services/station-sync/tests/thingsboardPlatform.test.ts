import assert from 'node:assert/strict';
import { once } from 'node:events';
import http from 'node:http';
import type { AddressInfo } from 'node:net';
import { after, before, beforeEach, test } from 'node:test';
import { ThingsboardClient } from '@station-sync/thingsboard-client';
import { ThingsboardTelemetryPlatform } from '../src/clients/thingsboardPlatform';

interface RecordedRequest {
  method: string;
  path: string;
  authorization: string | undefined;
  body: unknown;
}

const requests: RecordedRequest[] = [];
let server: http.Server;
let baseUrl = '';

before(async () => {
  server = http.createServer((req, res) => {
    const chunks: Buffer[] = [];
    req.on('data', (chunk: Buffer) => chunks.push(chunk));
    req.on('end', () => {
      const raw = Buffer.concat(chunks).toString('utf8');
      const body: unknown = raw ? JSON.parse(raw) : null;
      const url = new URL(req.url ?? '/', 'http://localhost');
      const authorization = req.headers['x-authorization'];
      requests.push({
        method: req.method ?? '',
        path: `${url.pathname}${url.search}`,
        authorization: typeof authorization === 'string' ? authorization : undefined,
        body
      });

      res.setHeader('Content-Type', 'application/json');
      if (url.pathname === '/api/auth/login') {
        res.end(JSON.stringify({ token: 'jwt-test' }));
        return;
      }
      if (url.pathname === '/api/tenant/devices') {
        if (url.searchParams.get('deviceName') === 'CARUARU - Processed') {
          res.end(
            JSON.stringify({
              id: { id: 'device-caruaru', entityType: 'DEVICE' },
              name: 'CARUARU - Processed',
              type: 'weather_station_processed'
            })
          );
          return;
        }
        res.statusCode = 404;
        res.end(JSON.stringify({ status: 404, message: "Requested item wasn't found!", errorCode: 32 }));
        return;
      }
      if (url.pathname === '/api/device') {
        res.end(
          JSON.stringify({
            id: { id: 'device-new', entityType: 'DEVICE' },
            name: 'PETROLINA - Processed',
            type: 'weather_station_processed',
            label: 'Processed data - PETROLINA'
          })
        );
        return;
      }
      if (url.pathname === '/api/device/device-caruaru/credentials') {
        res.end(JSON.stringify({ credentialsType: 'ACCESS_TOKEN', credentialsId: 'caruaru-token' }));
        return;
      }
      if (url.pathname === '/api/device/device-blank/credentials') {
        res.end(JSON.stringify({ credentialsType: 'ACCESS_TOKEN', credentialsId: '' }));
        return;
      }
      res.end();
    });
  });
  server.listen(0, '127.0.0.1');
  await once(server, 'listening');
  const address = server.address() as AddressInfo;
  baseUrl = `http://127.0.0.1:${address.port}`;
});

after(() => {
  server.closeAllConnections();
  server.close();
});

beforeEach(() => {
  requests.length = 0;
});

function createPlatform(): ThingsboardTelemetryPlatform {
  return new ThingsboardTelemetryPlatform(
    new ThingsboardClient({
      baseUrl,
      credentials: { username: 'tenant@example.test', password: 'test-secret' },
      fetchTimeoutMs: 2_000,
      telemetryTimeoutMs: 2_000
    })
  );
}

test('connects by logging in', async () => {
  const platform = createPlatform();
  assert.equal(platform.connected, false);

  await platform.connect();

  assert.equal(platform.connected, true);
  assert.deepEqual(requests[0], {
    method: 'POST',
    path: '/api/auth/login',
    authorization: undefined,
    body: { username: 'tenant@example.test', password: 'test-secret' }
  });
});

test('maps devices and tokens', async () => {
  const platform = createPlatform();
  await platform.connect();

  assert.deepEqual(await platform.findDevice('CARUARU - Processed'), {
    id: 'device-caruaru',
    name: 'CARUARU - Processed'
  });
  assert.equal(await platform.findDevice('UNKNOWN - Processed'), null);
  assert.equal(await platform.getToken('device-caruaru'), 'caruaru-token');
  assert.equal(await platform.getToken('device-blank'), null);
});

test('creates devices and publishes server attributes', async () => {
  const platform = createPlatform();
  await platform.connect();

  const device = await platform.createDevice({
    name: 'PETROLINA - Processed',
    type: 'weather_station_processed',
    label: 'Processed data - PETROLINA'
  });
  await platform.setAttributes(device.id, { station: 'PETROLINA', source: 'experiment-sync' });

  assert.deepEqual(device, { id: 'device-new', name: 'PETROLINA - Processed' });
  const [create, attributes] = requests.slice(1);
  assert.equal(create.path, '/api/device');
  assert.equal(create.authorization, 'Bearer jwt-test');
  assert.deepEqual(create.body, {
    name: 'PETROLINA - Processed',
    type: 'weather_station_processed',
    label: 'Processed data - PETROLINA'
  });
  assert.equal(attributes.path, '/api/plugins/telemetry/DEVICE/device-new/SERVER_SCOPE');
  assert.deepEqual(attributes.body, { station: 'PETROLINA', source: 'experiment-sync' });
});

test('pushes timeseries with the device token', async () => {
  const platform = createPlatform();

  await platform.pushTimeseries('caruaru-token', [
    { ts: 1_704_067_200_000, values: { temperatura: 20.5 } },
    { ts: 1_704_070_800_000, values: { temperatura: 21.5, estacao: 'A' } }
  ]);

  assert.equal(requests.length, 1);
  assert.equal(requests[0].path, '/api/v1/caruaru-token/telemetry');
  assert.equal(requests[0].authorization, undefined);
  assert.deepEqual(requests[0].body, [
    { ts: 1_704_067_200_000, values: { temperatura: 20.5 } },
    { ts: 1_704_070_800_000, values: { temperatura: 21.5, estacao: 'A' } }
  ]);
});
