export { ThingsboardClient } from './client';
export { ThingsboardAuthError, ThingsboardClientError, isNotFound } from './errors';
export type {
  AttributeScope,
  CreateDeviceInput,
  EntityId,
  TelemetryValue,
  ThingsboardClientOptions,
  ThingsboardCredentials,
  ThingsboardDevice,
  TimeseriesEntry
} from './types';
