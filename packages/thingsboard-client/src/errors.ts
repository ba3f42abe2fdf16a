export class ThingsboardClientError extends Error {
  readonly statusCode: number;
  readonly code: string | null;
  readonly details: unknown;

  constructor(message: string, options: { statusCode: number; code?: string | null; details?: unknown }) {
    super(message);
    this.name = 'ThingsboardClientError';
    this.statusCode = options.statusCode;
    this.code = options.code ?? null;
    this.details = options.details;
  }
}

export class ThingsboardAuthError extends ThingsboardClientError {
  constructor(message: string, options: { statusCode: number; details?: unknown }) {
    super(message, { statusCode: options.statusCode, code: 'AUTH_FAILED', details: options.details });
    this.name = 'ThingsboardAuthError';
  }
}

export function isNotFound(error: unknown): boolean {
  return error instanceof ThingsboardClientError && error.statusCode === 404;
}
