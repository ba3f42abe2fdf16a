import type { FastifyError, FastifyReply, FastifyRequest } from 'fastify';
import { ThingsboardAuthError, ThingsboardClientError } from '@station-sync/thingsboard-client';
import { ZodError } from 'zod';
import { MlflowRequestError } from './clients/mlflowExperimentStore';

export type SyncErrorCode =
  | 'station_unresolvable'
  | 'device_unavailable'
  | 'data_not_found'
  | 'poll_failed'
  | 'invalid_device_token'
  | 'sync_busy'
  | 'sync_not_running';

export class SyncError extends Error {
  readonly code: SyncErrorCode;
  readonly details?: unknown;

  constructor(code: SyncErrorCode, message: string, details?: unknown) {
    super(message);
    this.name = 'SyncError';
    this.code = code;
    this.details = details;
  }
}

export class StationUnresolvableError extends SyncError {
  constructor(runId: string) {
    super('station_unresolvable', `Unable to resolve a station for run ${runId}`, { runId });
    this.name = 'StationUnresolvableError';
  }
}

export class DeviceUnavailableError extends SyncError {
  constructor(station: string, reason: string, cause?: unknown) {
    super('device_unavailable', `Device for station ${station} is unavailable: ${reason}`, {
      station,
      cause: cause instanceof Error ? cause.message : cause
    });
    this.name = 'DeviceUnavailableError';
  }
}

export class DataNotFoundError extends SyncError {
  constructor(station: string, model?: string | null) {
    super('data_not_found', `No dataset found for station ${station}`, { station, model: model ?? null });
    this.name = 'DataNotFoundError';
  }
}

export class PollFailureError extends SyncError {
  constructor(group: string, cause: unknown) {
    super(
      'poll_failed',
      `Failed to poll experiment group ${group}: ${cause instanceof Error ? cause.message : String(cause)}`,
      { group }
    );
    this.name = 'PollFailureError';
  }
}

export class InvalidDeviceTokenError extends SyncError {
  constructor(deviceName: string) {
    super('invalid_device_token', `Device ${deviceName} has no access token`, { deviceName });
    this.name = 'InvalidDeviceTokenError';
  }
}

export class SyncBusyError extends SyncError {
  constructor() {
    super('sync_busy', 'A synchronization loop is already running');
    this.name = 'SyncBusyError';
  }
}

export class SyncNotRunningError extends SyncError {
  constructor() {
    super('sync_not_running', 'No synchronization loop is running');
    this.name = 'SyncNotRunningError';
  }
}

export interface ErrorResponse {
  statusCode: number;
  error: string;
  message: string;
  details?: unknown;
}

const STATUS_BY_CODE: Record<SyncErrorCode, number> = {
  station_unresolvable: 422,
  device_unavailable: 502,
  data_not_found: 404,
  poll_failed: 502,
  invalid_device_token: 502,
  sync_busy: 409,
  sync_not_running: 409
};

export const mapErrorToResponse = (error: unknown): ErrorResponse => {
  if (error instanceof SyncError) {
    return {
      statusCode: STATUS_BY_CODE[error.code],
      error: error.code,
      message: error.message,
      details: error.details
    };
  }

  if (error instanceof ThingsboardAuthError) {
    return {
      statusCode: 502,
      error: 'platform_auth_failed',
      message: error.message
    };
  }

  if (error instanceof ThingsboardClientError || error instanceof MlflowRequestError) {
    return {
      statusCode: 502,
      error: 'upstream_error',
      message: error.message
    };
  }

  if (error instanceof ZodError) {
    return {
      statusCode: 400,
      error: 'invalid_request',
      message: 'Request validation failed',
      details: error.flatten()
    };
  }

  if (isFastifyClientError(error)) {
    return {
      statusCode: error.statusCode,
      error: 'invalid_request',
      message: error.message
    };
  }

  return {
    statusCode: 500,
    error: 'internal_error',
    message: 'Unexpected error'
  };
};

function isFastifyClientError(error: unknown): error is Error & { statusCode: number } {
  if (!(error instanceof Error) || !('statusCode' in error)) {
    return false;
  }
  const { statusCode } = error;
  return typeof statusCode === 'number' && statusCode >= 400 && statusCode < 500;
}

export function createHttpErrorHandler() {
  return function httpErrorHandler(error: FastifyError | Error, request: FastifyRequest, reply: FastifyReply): void {
    const mapped = mapErrorToResponse(error);
    if (mapped.statusCode >= 500) {
      request.log.error({ err: error }, 'Unhandled error while processing request');
    } else {
      request.log.debug({ err: error, code: mapped.error }, 'Request failed');
    }
    if (!reply.sent) {
      void reply.status(mapped.statusCode).send(mapped);
    }
  };
}
