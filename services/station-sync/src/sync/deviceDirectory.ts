import { DeviceUnavailableError } from '../errors';
import type { SyncLogger } from '../logger';
import type { DeviceRecord, PlatformDevice, TelemetryPlatform } from './types';
import { errorMessage } from './utils';

export const PROCESSED_DEVICE_TYPE = 'weather_station_processed';
export const DEVICE_ATTRIBUTE_SOURCE = 'experiment-sync';

export function deviceNameForStation(station: string): string {
  return `${station.replace(/_/g, ' ')} - Processed`;
}

export function deviceLabelForStation(station: string): string {
  return `Processed data - ${station}`;
}

/**
 * Cache-aside map from station names to platform devices. Entries live until
 * they are evicted or the directory is cleared.
 */
export class DeviceDirectory {
  private readonly cache = new Map<string, DeviceRecord>();

  constructor(
    private readonly platform: TelemetryPlatform,
    private readonly logger: SyncLogger
  ) {}

  get size(): number {
    return this.cache.size;
  }

  list(): DeviceRecord[] {
    return Array.from(this.cache.values());
  }

  evict(station: string): boolean {
    return this.cache.delete(deviceNameForStation(station));
  }

  clear(): void {
    this.cache.clear();
  }

  async getOrCreate(station: string): Promise<DeviceRecord> {
    const deviceName = deviceNameForStation(station);
    const cached = this.cache.get(deviceName);
    if (cached) {
      this.logger.debug({ station, deviceName }, 'device served from cache');
      return cached;
    }

    const existing = await this.lookup(deviceName);
    if (existing) {
      const record = await this.withToken(station, existing);
      this.logger.info({ station, deviceName, deviceId: record.deviceId }, 'existing device resolved');
      return record;
    }

    let created: PlatformDevice;
    try {
      created = await this.platform.createDevice({
        name: deviceName,
        type: PROCESSED_DEVICE_TYPE,
        label: deviceLabelForStation(station)
      });
    } catch (error) {
      throw new DeviceUnavailableError(station, 'device creation failed', error);
    }

    const record = await this.withToken(station, created);
    await this.publishAttributes(station, created.id);
    this.logger.info({ station, deviceName, deviceId: record.deviceId }, 'device created');
    return record;
  }

  private async lookup(deviceName: string): Promise<PlatformDevice | null> {
    try {
      return await this.platform.findDevice(deviceName);
    } catch (error) {
      this.logger.warn({ deviceName, error: errorMessage(error) }, 'device lookup failed; treating as not found');
      return null;
    }
  }

  private async withToken(station: string, device: PlatformDevice): Promise<DeviceRecord> {
    let token: string | null;
    try {
      token = await this.platform.getToken(device.id);
    } catch (error) {
      throw new DeviceUnavailableError(station, 'token retrieval failed', error);
    }
    if (!token) {
      throw new DeviceUnavailableError(station, 'device has no access token');
    }
    const record: DeviceRecord = { deviceId: device.id, deviceName: device.name, authToken: token };
    this.cache.set(deviceNameForStation(station), record);
    return record;
  }

  private async publishAttributes(station: string, deviceId: string): Promise<void> {
    try {
      await this.platform.setAttributes(deviceId, { station, source: DEVICE_ATTRIBUTE_SOURCE });
    } catch (error) {
      this.logger.warn({ station, deviceId, error: errorMessage(error) }, 'failed to publish device attributes');
    }
  }
}
