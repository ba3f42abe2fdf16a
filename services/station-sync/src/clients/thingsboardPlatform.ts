import { ThingsboardClient } from '@station-sync/thingsboard-client';
import type { ThingsboardDevice, TimeseriesEntry } from '@station-sync/thingsboard-client';
import type { CreateDeviceRequest, PlatformDevice, TelemetryPlatform, TelemetryRecord } from '../sync/types';

function toPlatformDevice(device: ThingsboardDevice): PlatformDevice {
  return { id: device.id.id, name: device.name };
}

export class ThingsboardTelemetryPlatform implements TelemetryPlatform {
  constructor(private readonly client: ThingsboardClient) {}

  get connected(): boolean {
    return this.client.authenticated;
  }

  async connect(): Promise<void> {
    await this.client.login();
  }

  async findDevice(name: string): Promise<PlatformDevice | null> {
    const device = await this.client.getDeviceByName(name);
    return device ? toPlatformDevice(device) : null;
  }

  async createDevice(request: CreateDeviceRequest): Promise<PlatformDevice> {
    const device = await this.client.createDevice(request);
    return toPlatformDevice(device);
  }

  async getToken(deviceId: string): Promise<string | null> {
    return this.client.getDeviceAccessToken(deviceId);
  }

  async setAttributes(deviceId: string, attributes: Record<string, string>): Promise<void> {
    await this.client.saveDeviceAttributes(deviceId, attributes, 'SERVER_SCOPE');
  }

  async pushTimeseries(token: string, batch: TelemetryRecord[]): Promise<void> {
    const entries: TimeseriesEntry[] = batch.map((record) => ({ ts: record.ts, values: record.values }));
    await this.client.postTelemetry(token, entries);
  }
}
