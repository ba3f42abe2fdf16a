const TRUE_VALUES = new Set(['1', 'true', 'yes', 'on']);
const FALSE_VALUES = new Set(['0', 'false', 'no', 'off']);

export const DEFAULT_EXPERIMENTS = ['data-pipeline', 'Imputacao por Estacao'];
export const MIN_INTERVAL_SECONDS = 10;
export const MAX_INTERVAL_SECONDS = 3_600;

export type SyncSettings = {
  experiments: string[];
  intervalSeconds: number;
  autostart: boolean;
  maxRunsPerPoll: number;
  batchSize: number;
  interRunDelayMs: number;
  interChunkDelayMs: number;
  maxRecordsPerRun: number | null;
  modelVariant: string | null;
  valueColumns: string | null;
  checkpointPath: string | null;
  dataPrefix: string;
  dataExtension: string;
};

export type MlflowSettings = {
  trackingUri: string;
  timeoutMs: number;
};

export type ThingsboardSettings = {
  url: string;
  username: string;
  password: string;
  timeoutMs: number;
  pushTimeoutMs: number;
};

export type S3Settings = {
  bucket: string;
  region: string;
  endpoint: string | null;
  forcePathStyle: boolean;
  accessKeyId: string | null;
  secretAccessKey: string | null;
  sessionToken: string | null;
};

export type ServiceConfig = {
  host: string;
  port: number;
  logLevel: string;
  metricsEnabled: boolean;
  sync: SyncSettings;
  mlflow: MlflowSettings;
  thingsboard: ThingsboardSettings;
  s3: S3Settings;
};

function parseBoolean(value: string | undefined, defaultValue: boolean): boolean {
  if (!value) {
    return defaultValue;
  }
  const normalized = value.trim().toLowerCase();
  if (TRUE_VALUES.has(normalized)) {
    return true;
  }
  if (FALSE_VALUES.has(normalized)) {
    return false;
  }
  return defaultValue;
}

function parsePort(value: string | undefined, defaultValue: number): number {
  if (!value) {
    return defaultValue;
  }
  const parsed = Number.parseInt(value, 10);
  if (!Number.isFinite(parsed) || parsed <= 0) {
    return defaultValue;
  }
  return parsed;
}

function parsePositiveInt(value: string | undefined, defaultValue: number): number {
  if (!value) {
    return defaultValue;
  }
  const parsed = Number.parseInt(value, 10);
  return Number.isFinite(parsed) && parsed > 0 ? parsed : defaultValue;
}

function parseNonNegativeInt(value: string | undefined, defaultValue: number): number {
  if (!value) {
    return defaultValue;
  }
  const parsed = Number.parseInt(value, 10);
  return Number.isFinite(parsed) && parsed >= 0 ? parsed : defaultValue;
}

function optionalString(value: string | undefined): string | null {
  const trimmed = value?.trim();
  return trimmed ? trimmed : null;
}

function requireString(name: string): string {
  const value = optionalString(process.env[name]);
  if (!value) {
    throw new Error(`${name} must be set`);
  }
  return value;
}

export function parseList(value: string | undefined, fallback: string[]): string[] {
  if (!value) {
    return [...fallback];
  }
  const entries = value
    .split(',')
    .map((entry) => entry.trim())
    .filter(Boolean);
  return entries.length > 0 ? Array.from(new Set(entries)) : [...fallback];
}

export function clampIntervalSeconds(value: number): number {
  return Math.min(Math.max(value, MIN_INTERVAL_SECONDS), MAX_INTERVAL_SECONDS);
}

function loadSyncSettings(): SyncSettings {
  const maxRecordsRaw = process.env.SYNC_MAX_RECORDS_PER_RUN;
  const maxRecordsPerRun = maxRecordsRaw ? parsePositiveInt(maxRecordsRaw, 0) || null : null;
  return {
    experiments: parseList(process.env.SYNC_EXPERIMENTS, DEFAULT_EXPERIMENTS),
    intervalSeconds: clampIntervalSeconds(parsePositiveInt(process.env.SYNC_INTERVAL_SECONDS, 60)),
    autostart: parseBoolean(process.env.SYNC_AUTOSTART, false),
    maxRunsPerPoll: parsePositiveInt(process.env.SYNC_MAX_RUNS_PER_POLL, 100),
    batchSize: parsePositiveInt(process.env.SYNC_BATCH_SIZE, 100),
    interRunDelayMs: parseNonNegativeInt(process.env.SYNC_INTER_RUN_DELAY_MS, 2_000),
    interChunkDelayMs: parseNonNegativeInt(process.env.SYNC_INTER_CHUNK_DELAY_MS, 100),
    maxRecordsPerRun,
    modelVariant: optionalString(process.env.SYNC_MODEL_VARIANT),
    valueColumns: optionalString(process.env.SYNC_VALUE_COLUMNS),
    checkpointPath: optionalString(process.env.SYNC_CHECKPOINT_PATH),
    dataPrefix: optionalString(process.env.SYNC_DATA_PREFIX) ?? 'dados_imputados/resultados/dados_para_update_neon_',
    dataExtension: optionalString(process.env.SYNC_DATA_EXTENSION) ?? '.csv'
  };
}

let cachedConfig: ServiceConfig | null = null;

export function loadServiceConfig(): ServiceConfig {
  if (cachedConfig) {
    return cachedConfig;
  }

  const host = process.env.SYNC_HOST?.trim() || '0.0.0.0';
  const port = parsePort(process.env.SYNC_PORT, 4300);
  const logLevel = process.env.SYNC_LOG_LEVEL?.trim() || 'info';
  const metricsEnabled = parseBoolean(process.env.SYNC_METRICS_ENABLED, true);

  const thingsboard: ThingsboardSettings = {
    url: optionalString(process.env.THINGSBOARD_URL) ?? 'http://localhost:8080',
    username: requireString('THINGSBOARD_USERNAME'),
    password: requireString('THINGSBOARD_PASSWORD'),
    timeoutMs: parsePositiveInt(process.env.THINGSBOARD_TIMEOUT_MS, 10_000),
    pushTimeoutMs: parsePositiveInt(process.env.THINGSBOARD_PUSH_TIMEOUT_MS, 30_000)
  };

  const s3: S3Settings = {
    bucket: requireString('S3_BUCKET_NAME'),
    region: optionalString(process.env.AWS_REGION) ?? 'us-east-1',
    endpoint: optionalString(process.env.AWS_S3_ENDPOINT),
    forcePathStyle: parseBoolean(process.env.AWS_S3_FORCE_PATH_STYLE, false),
    accessKeyId: optionalString(process.env.AWS_ACCESS_KEY_ID),
    secretAccessKey: optionalString(process.env.AWS_SECRET_ACCESS_KEY),
    sessionToken: optionalString(process.env.AWS_SESSION_TOKEN)
  };

  cachedConfig = {
    host,
    port,
    logLevel,
    metricsEnabled,
    sync: loadSyncSettings(),
    mlflow: {
      trackingUri: optionalString(process.env.MLFLOW_TRACKING_URI) ?? 'http://localhost:5000',
      timeoutMs: parsePositiveInt(process.env.MLFLOW_TIMEOUT_MS, 15_000)
    },
    thingsboard,
    s3
  } satisfies ServiceConfig;

  return cachedConfig;
}

export function resetServiceConfigCache(): void {
  cachedConfig = null;
}
