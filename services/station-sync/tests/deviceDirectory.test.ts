import assert from 'node:assert/strict';
import test from 'node:test';
import { DeviceUnavailableError } from '../src/errors';
import { DeviceDirectory, deviceNameForStation } from '../src/sync/deviceDirectory';
import { FakePlatform, silentLogger } from './helpers';

test('device names replace underscores with spaces', () => {
  assert.equal(deviceNameForStation('ARCO_VERDE'), 'ARCO VERDE - Processed');
  assert.equal(deviceNameForStation('PETROLINA'), 'PETROLINA - Processed');
});

test('returns an existing device with its token', async () => {
  const platform = new FakePlatform();
  platform.addDevice('ARCO VERDE - Processed', 'arco-token');
  const directory = new DeviceDirectory(platform, silentLogger);

  const record = await directory.getOrCreate('ARCO_VERDE');

  assert.deepEqual(record, { deviceId: 'device-1', deviceName: 'ARCO VERDE - Processed', authToken: 'arco-token' });
  assert.deepEqual(platform.calls, ['find:ARCO VERDE - Processed', 'token:device-1']);
  assert.equal(platform.created.length, 0);
});

test('second lookup for the same station is served from the cache', async () => {
  const platform = new FakePlatform();
  const directory = new DeviceDirectory(platform, silentLogger);

  const first = await directory.getOrCreate('PETROLINA');
  const callsAfterFirst = platform.calls.length;
  const second = await directory.getOrCreate('PETROLINA');

  assert.equal(second, first);
  assert.equal(platform.calls.length, callsAfterFirst);
  assert.equal(platform.created.length, 1);
  assert.equal(directory.size, 1);
});

test('creates missing devices with the processed type, label and attributes', async () => {
  const platform = new FakePlatform();
  const directory = new DeviceDirectory(platform, silentLogger);

  const record = await directory.getOrCreate('SERRA_TALHADA');

  assert.deepEqual(platform.created, [
    { name: 'SERRA TALHADA - Processed', type: 'weather_station_processed', label: 'Processed data - SERRA_TALHADA' }
  ]);
  assert.equal(record.authToken, 'token-for-SERRA-TALHADA---Processed');
  assert.deepEqual(platform.attributes, [
    { deviceId: 'device-1', attributes: { station: 'SERRA_TALHADA', source: 'experiment-sync' } }
  ]);
});

test('attribute failures do not fail device creation', async () => {
  const platform = new FakePlatform();
  platform.attributesError = new Error('attributes rejected');
  const directory = new DeviceDirectory(platform, silentLogger);

  const record = await directory.getOrCreate('CARUARU');
  assert.equal(record.deviceName, 'CARUARU - Processed');
  assert.equal(directory.size, 1);
});

test('a failed lookup is treated as not found', async () => {
  const platform = new FakePlatform();
  platform.lookupError = new Error('lookup timed out');
  const directory = new DeviceDirectory(platform, silentLogger);

  const record = await directory.getOrCreate('CABROBO');
  assert.equal(record.deviceName, 'CABROBO - Processed');
  assert.deepEqual(platform.calls.slice(0, 2), ['find:CABROBO - Processed', 'create:CABROBO - Processed']);
});

test('never returns a device without a token', async () => {
  const platform = new FakePlatform();
  platform.addDevice('FLORESTA - Processed', null);
  const directory = new DeviceDirectory(platform, silentLogger);

  await assert.rejects(directory.getOrCreate('FLORESTA'), (error: unknown) => {
    assert.ok(error instanceof DeviceUnavailableError);
    assert.equal(error.code, 'device_unavailable');
    return true;
  });
  assert.equal(directory.size, 0);
});

test('creation failures surface as device unavailable', async () => {
  const platform = new FakePlatform();
  platform.createError = new Error('tenant quota exceeded');
  const directory = new DeviceDirectory(platform, silentLogger);

  await assert.rejects(directory.getOrCreate('OURICURI'), DeviceUnavailableError);
});

test('evict and clear drop cached devices', async () => {
  const platform = new FakePlatform();
  const directory = new DeviceDirectory(platform, silentLogger);
  await directory.getOrCreate('PETROLINA');
  await directory.getOrCreate('CARUARU');

  assert.equal(directory.evict('PETROLINA'), true);
  assert.deepEqual(
    directory.list().map((device) => device.deviceName),
    ['CARUARU - Processed']
  );
  directory.clear();
  assert.equal(directory.size, 0);
});
