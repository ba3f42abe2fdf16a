export interface ThingsboardCredentials {
  username: string;
  password: string;
}

export interface ThingsboardClientOptions {
  baseUrl: string;
  credentials: ThingsboardCredentials;
  defaultHeaders?: Record<string, string>;
  userAgent?: string;
  fetchTimeoutMs?: number;
  telemetryTimeoutMs?: number;
}

export interface EntityId {
  id: string;
  entityType: string;
}

export interface ThingsboardDevice {
  id: EntityId;
  name: string;
  type: string | null;
  label: string | null;
  createdTime: number | null;
}

export interface CreateDeviceInput {
  name: string;
  type: string;
  label?: string | null;
}

export type AttributeScope = 'SERVER_SCOPE' | 'SHARED_SCOPE';

export type TelemetryValue = number | string | boolean | null;

export interface TimeseriesEntry {
  ts: number;
  values: Record<string, TelemetryValue>;
}

export interface RequestOptions {
  body?: unknown;
  query?: Record<string, string | number | boolean | undefined>;
  signal?: AbortSignal;
  timeoutMs?: number;
  authenticated?: boolean;
  expectJson?: boolean;
}
