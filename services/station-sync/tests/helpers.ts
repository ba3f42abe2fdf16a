import pino from 'pino';
import type { ServiceConfig } from '../src/config/serviceConfig';
import type {
  CreateDeviceRequest,
  ExperimentStore,
  ObjectStore,
  PlatformDevice,
  RunRecord,
  TelemetryPlatform,
  TelemetryRecord
} from '../src/sync/types';

export const silentLogger = pino({ level: 'silent' });

export function makeRun(overrides: Partial<RunRecord> = {}): RunRecord {
  return {
    runId: 'run-1',
    runName: 'unnamed-run',
    startTime: 1_700_000_000_000,
    tags: {},
    params: {},
    ...overrides
  };
}

export class FakeExperimentStore implements ExperimentStore {
  readonly runs = new Map<string, RunRecord[]>();
  readonly failingGroups = new Set<string>();
  readonly requests: Array<{ group: string; maxResults: number }> = [];

  constructor(groups: Record<string, RunRecord[]> = {}) {
    for (const [group, runs] of Object.entries(groups)) {
      this.runs.set(group, runs);
    }
  }

  async listGroups(): Promise<string[]> {
    return Array.from(this.runs.keys());
  }

  async getRuns(group: string, options: { maxResults: number }): Promise<RunRecord[]> {
    this.requests.push({ group, maxResults: options.maxResults });
    if (this.failingGroups.has(group)) {
      throw new Error(`tracking server unavailable for ${group}`);
    }
    const runs = this.runs.get(group) ?? [];
    return [...runs].sort((left, right) => right.startTime - left.startTime).slice(0, options.maxResults);
  }
}

export class FakeObjectStore implements ObjectStore {
  readonly objects = new Map<string, string>();
  readonly listed: string[] = [];

  constructor(objects: Record<string, string> = {}) {
    for (const [key, body] of Object.entries(objects)) {
      this.objects.set(key, body);
    }
  }

  async listKeys(prefix: string): Promise<string[]> {
    this.listed.push(prefix);
    return Array.from(this.objects.keys()).filter((key) => key.startsWith(prefix));
  }

  async getObject(key: string): Promise<Buffer> {
    const body = this.objects.get(key);
    if (body === undefined) {
      throw new Error(`NoSuchKey: ${key}`);
    }
    return Buffer.from(body, 'utf8');
  }
}

export class FakePlatform implements TelemetryPlatform {
  connected = false;
  connectError: Error | null = null;
  lookupError: Error | null = null;
  createError: Error | null = null;
  attributesError: Error | null = null;
  readonly devices = new Map<string, PlatformDevice>();
  readonly tokens = new Map<string, string | null>();
  readonly calls: string[] = [];
  readonly created: CreateDeviceRequest[] = [];
  readonly attributes: Array<{ deviceId: string; attributes: Record<string, string> }> = [];
  readonly pushes: Array<{ token: string; records: TelemetryRecord[] }> = [];
  /** 1-based indexes of pushes that should be rejected. */
  readonly failingPushes = new Set<number>();
  private nextId = 1;

  addDevice(name: string, token: string | null): PlatformDevice {
    const device = { id: `device-${this.nextId}`, name };
    this.nextId += 1;
    this.devices.set(name, device);
    this.tokens.set(device.id, token);
    return device;
  }

  async connect(): Promise<void> {
    this.calls.push('connect');
    if (this.connectError) {
      throw this.connectError;
    }
    this.connected = true;
  }

  async findDevice(name: string): Promise<PlatformDevice | null> {
    this.calls.push(`find:${name}`);
    if (this.lookupError) {
      throw this.lookupError;
    }
    return this.devices.get(name) ?? null;
  }

  async createDevice(request: CreateDeviceRequest): Promise<PlatformDevice> {
    this.calls.push(`create:${request.name}`);
    if (this.createError) {
      throw this.createError;
    }
    this.created.push(request);
    return this.addDevice(request.name, `token-for-${request.name.replace(/ /g, '-')}`);
  }

  async getToken(deviceId: string): Promise<string | null> {
    this.calls.push(`token:${deviceId}`);
    return this.tokens.get(deviceId) ?? null;
  }

  async setAttributes(deviceId: string, attributes: Record<string, string>): Promise<void> {
    this.calls.push(`attributes:${deviceId}`);
    if (this.attributesError) {
      throw this.attributesError;
    }
    this.attributes.push({ deviceId, attributes });
  }

  async pushTimeseries(token: string, batch: TelemetryRecord[]): Promise<void> {
    this.pushes.push({ token, records: batch });
    if (this.failingPushes.has(this.pushes.length)) {
      throw new Error('telemetry rejected');
    }
  }
}

export function makeConfig(overrides: Partial<ServiceConfig['sync']> = {}): ServiceConfig {
  return {
    host: '127.0.0.1',
    port: 0,
    logLevel: 'silent',
    metricsEnabled: true,
    sync: {
      experiments: ['data-pipeline'],
      intervalSeconds: 60,
      autostart: false,
      maxRunsPerPoll: 100,
      batchSize: 100,
      interRunDelayMs: 0,
      interChunkDelayMs: 0,
      maxRecordsPerRun: null,
      modelVariant: null,
      valueColumns: null,
      checkpointPath: null,
      dataPrefix: 'dados_imputados/resultados/dados_para_update_neon_',
      dataExtension: '.csv',
      ...overrides
    },
    mlflow: { trackingUri: 'http://127.0.0.1:1', timeoutMs: 1_000 },
    thingsboard: {
      url: 'http://127.0.0.1:1',
      username: 'tenant@example.test',
      password: 'test-secret',
      timeoutMs: 1_000,
      pushTimeoutMs: 1_000
    },
    s3: {
      bucket: 'test-bucket',
      region: 'us-east-1',
      endpoint: null,
      forcePathStyle: true,
      accessKeyId: null,
      secretAccessKey: null,
      sessionToken: null
    }
  };
}

/** Builds a station CSV with `rows` hourly readings; rows past `validRows` carry the null sentinel. */
export function buildStationCsv(rows: number, validRows: number): string {
  const lines = ['data;hora;temperatura;umidade'];
  for (let index = 0; index < rows; index += 1) {
    const day = Math.floor(index / 24) + 1;
    const hour = index % 24;
    const date = `2024-01-${String(day).padStart(2, '0')}`;
    const time = `${String(hour).padStart(2, '0')}00 UTC`;
    const temperature = index < validRows ? `${20 + (index % 10)},5` : '-9999';
    lines.push(`${date};${time};${temperature};-9999`);
  }
  return `${lines.join('\n')}\n`;
}
