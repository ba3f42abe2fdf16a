export interface RunRecord {
  runId: string;
  runName: string;
  /** Epoch milliseconds. */
  startTime: number;
  tags: Record<string, string>;
  params: Record<string, string>;
}

export interface DeviceRecord {
  deviceId: string;
  deviceName: string;
  authToken: string;
}

export type TelemetryValue = number | string | null;

export interface TelemetryRecord {
  ts: number;
  values: Record<string, TelemetryValue>;
}

export type SyncCheckpoint = Record<string, number>;

export interface BatchResult {
  success: number;
  failed: number;
  total: number;
}

export interface RunOutcome {
  runId: string;
  runName: string;
  stationName: string | null;
  deviceFound: boolean;
  dataFound: boolean;
  dataKey: string | null;
  recordsSent: number;
  recordsFailed: number;
  /** At least one record was delivered, even if some chunks failed. */
  success: boolean;
  /** Every record was delivered. */
  complete: boolean;
  error: string | null;
}

export interface GroupPollSummary {
  group: string;
  newRuns: number;
  error: string | null;
}

export interface SyncCycleSummary {
  startedAt: string;
  finishedAt: string;
  groups: GroupPollSummary[];
  outcomes: RunOutcome[];
  /** Runs a stop left unprocessed after their checkpoint had already advanced. */
  abandonedRunIds: string[];
  totals: {
    runs: number;
    successful: number;
    failed: number;
    recordsSent: number;
  };
}

export type SyncState =
  | 'idle'
  | 'polling'
  | 'resolving'
  | 'device_lookup'
  | 'data_lookup'
  | 'transforming'
  | 'delivering'
  | 'stopped';

export interface Dataset {
  columns: string[];
  rows: Array<Record<string, string | null>>;
}

export type TimestampRule =
  | { kind: 'column'; column: string }
  | { kind: 'date_hour'; dateColumn: string; hourColumn: string }
  | { kind: 'wall_clock' };

export type ColumnMap = Record<string, string>;

export interface ExperimentStore {
  listGroups(): Promise<string[]>;
  getRuns(group: string, options: { maxResults: number }): Promise<RunRecord[]>;
}

export interface ObjectStore {
  listKeys(prefix: string): Promise<string[]>;
  getObject(key: string): Promise<Buffer>;
}

export interface PlatformDevice {
  id: string;
  name: string;
}

export interface CreateDeviceRequest {
  name: string;
  type: string;
  label: string;
}

export interface TelemetryPlatform {
  readonly connected: boolean;
  connect(): Promise<void>;
  findDevice(name: string): Promise<PlatformDevice | null>;
  createDevice(request: CreateDeviceRequest): Promise<PlatformDevice>;
  getToken(deviceId: string): Promise<string | null>;
  setAttributes(deviceId: string, attributes: Record<string, string>): Promise<void>;
  pushTimeseries(token: string, batch: TelemetryRecord[]): Promise<void>;
}
