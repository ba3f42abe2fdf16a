import { fetch, Headers } from 'undici';
import type { RequestInit, Response } from 'undici';
import { z } from 'zod';
import { ThingsboardAuthError, ThingsboardClientError, isNotFound } from './errors';
import type {
  AttributeScope,
  CreateDeviceInput,
  RequestOptions,
  ThingsboardClientOptions,
  ThingsboardCredentials,
  ThingsboardDevice,
  TimeseriesEntry
} from './types';

const DEFAULT_TIMEOUT_MS = 10_000;
const DEFAULT_TELEMETRY_TIMEOUT_MS = 30_000;

const loginResponseSchema = z.object({
  token: z.string().min(1),
  refreshToken: z.string().optional()
});

const deviceSchema = z
  .object({
    id: z.object({
      id: z.string().min(1),
      entityType: z.string().default('DEVICE')
    }),
    name: z.string(),
    type: z.string().nullish(),
    label: z.string().nullish(),
    createdTime: z.number().nullish()
  })
  .transform(
    (value): ThingsboardDevice => ({
      id: value.id,
      name: value.name,
      type: value.type ?? null,
      label: value.label ?? null,
      createdTime: value.createdTime ?? null
    })
  );

const errorPayloadSchema = z.object({
  message: z.string().optional(),
  errorCode: z.union([z.number(), z.string()]).optional()
});

const credentialsSchema = z.object({
  credentialsId: z.string().nullish(),
  credentialsType: z.string().optional()
});

function combineSignals(primary: AbortController, external?: AbortSignal): void {
  if (!external) {
    return;
  }
  if (external.aborted) {
    primary.abort(external.reason);
    return;
  }
  external.addEventListener(
    'abort',
    () => {
      primary.abort(external.reason);
    },
    { once: true }
  );
}

function isAbortError(err: unknown): boolean {
  return err instanceof Error && (err.name === 'AbortError' || err.name === 'TimeoutError');
}

export class ThingsboardClient {
  private readonly baseUrl: URL;
  private readonly credentials: ThingsboardCredentials;
  private readonly defaultHeaders: Record<string, string>;
  private readonly userAgent?: string;
  private readonly fetchTimeoutMs: number;
  private readonly telemetryTimeoutMs: number;
  private jwtToken: string | null = null;
  private loginInFlight: Promise<string> | null = null;

  constructor(options: ThingsboardClientOptions) {
    if (!options.baseUrl) {
      throw new Error('ThingsboardClient requires a baseUrl');
    }
    this.baseUrl = new URL(options.baseUrl);
    this.credentials = options.credentials;
    this.defaultHeaders = options.defaultHeaders ?? {};
    this.userAgent = options.userAgent;
    this.fetchTimeoutMs = options.fetchTimeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.telemetryTimeoutMs = options.telemetryTimeoutMs ?? DEFAULT_TELEMETRY_TIMEOUT_MS;
  }

  get authenticated(): boolean {
    return this.jwtToken !== null;
  }

  async login(): Promise<string> {
    if (this.loginInFlight) {
      return this.loginInFlight;
    }
    this.loginInFlight = this.performLogin().finally(() => {
      this.loginInFlight = null;
    });
    return this.loginInFlight;
  }

  async getDeviceByName(name: string): Promise<ThingsboardDevice | null> {
    try {
      const payload = await this.request('GET', '/api/tenant/devices', {
        query: { deviceName: name }
      });
      if (!payload) {
        return null;
      }
      const device = deviceSchema.parse(payload);
      return device.name === name ? device : null;
    } catch (err) {
      if (isNotFound(err)) {
        return null;
      }
      throw err;
    }
  }

  async createDevice(input: CreateDeviceInput): Promise<ThingsboardDevice> {
    const body: Record<string, unknown> = {
      name: input.name,
      type: input.type
    };
    if (input.label) {
      body.label = input.label;
    }
    const payload = await this.request('POST', '/api/device', { body });
    return deviceSchema.parse(payload);
  }

  async getDeviceAccessToken(deviceId: string): Promise<string | null> {
    const payload = await this.request(
      'GET',
      `/api/device/${encodeURIComponent(deviceId)}/credentials`
    );
    const credentials = credentialsSchema.parse(payload);
    const token = credentials.credentialsId?.trim();
    return token ? token : null;
  }

  async saveDeviceAttributes(
    deviceId: string,
    attributes: Record<string, unknown>,
    scope: AttributeScope = 'SERVER_SCOPE'
  ): Promise<void> {
    await this.request('POST', `/api/plugins/telemetry/DEVICE/${encodeURIComponent(deviceId)}/${scope}`, {
      body: attributes,
      expectJson: false
    });
  }

  /**
   * Pushes a batch of timeseries entries through the device HTTP API. The call
   * is authorized by the device access token alone.
   */
  async postTelemetry(accessToken: string, entries: TimeseriesEntry[], signal?: AbortSignal): Promise<void> {
    await this.request('POST', `/api/v1/${encodeURIComponent(accessToken)}/telemetry`, {
      body: entries,
      authenticated: false,
      expectJson: false,
      timeoutMs: this.telemetryTimeoutMs,
      signal
    });
  }

  private async performLogin(): Promise<string> {
    let response: Response;
    try {
      response = await this.send('POST', '/api/auth/login', {
        body: { username: this.credentials.username, password: this.credentials.password },
        authenticated: false
      });
    } catch (err) {
      this.jwtToken = null;
      if (err instanceof ThingsboardClientError && (err.statusCode === 401 || err.statusCode === 403)) {
        throw new ThingsboardAuthError('ThingsBoard rejected the configured credentials', {
          statusCode: err.statusCode,
          details: err.details
        });
      }
      throw err;
    }
    const parsed = loginResponseSchema.safeParse(await response.json());
    if (!parsed.success) {
      throw new ThingsboardAuthError('ThingsBoard login response did not include a token', {
        statusCode: response.status,
        details: parsed.error.flatten()
      });
    }
    this.jwtToken = parsed.data.token;
    return parsed.data.token;
  }

  private async request(method: string, path: string, options: RequestOptions = {}): Promise<unknown> {
    const authenticated = options.authenticated ?? true;
    if (authenticated && !this.jwtToken) {
      await this.login();
    }

    let response: Response;
    try {
      response = await this.send(method, path, options);
    } catch (err) {
      if (!authenticated || !(err instanceof ThingsboardClientError) || err.statusCode !== 401) {
        throw err;
      }
      this.jwtToken = null;
      await this.login();
      response = await this.send(method, path, options);
    }

    if (options.expectJson === false) {
      return null;
    }
    const text = await response.text();
    if (!text) {
      return null;
    }
    return JSON.parse(text);
  }

  private async send(method: string, path: string, options: RequestOptions): Promise<Response> {
    const headers = this.buildHeaders(options.authenticated ?? true);

    let body: string | undefined;
    if (options.body !== undefined) {
      body = JSON.stringify(options.body);
      headers.set('Content-Type', 'application/json');
    }

    const url = this.buildUrl(path, options.query);
    const controller = new AbortController();
    combineSignals(controller, options.signal);
    const timeoutMs = options.timeoutMs ?? this.fetchTimeoutMs;
    let timeout: NodeJS.Timeout | undefined;
    if (timeoutMs > 0) {
      timeout = setTimeout(() => {
        controller.abort(new Error('Request timed out'));
      }, timeoutMs);
    }

    try {
      const response = await this.fetchRaw(url, {
        method,
        headers,
        body,
        signal: controller.signal
      });

      if (!response.ok) {
        await this.handleErrorResponse(response);
      }

      return response;
    } catch (err) {
      if (isAbortError(err) || controller.signal.aborted) {
        throw new ThingsboardClientError(`Request to ${method} ${url.pathname} aborted`, {
          statusCode: 0,
          code: 'ABORTED',
          details: err instanceof Error ? err.message : String(err)
        });
      }
      throw err;
    } finally {
      if (timeout) {
        clearTimeout(timeout);
      }
    }
  }

  private async fetchRaw(input: URL, init: RequestInit): Promise<Response> {
    return fetch(input, init);
  }

  private buildHeaders(authenticated: boolean): Headers {
    const headers = new Headers({ Accept: 'application/json' });
    for (const [key, value] of Object.entries(this.defaultHeaders)) {
      if (value !== undefined) {
        headers.set(key, value);
      }
    }
    if (this.userAgent) {
      headers.set('User-Agent', this.userAgent);
    }
    if (authenticated && this.jwtToken) {
      headers.set('X-Authorization', `Bearer ${this.jwtToken}`);
    }
    return headers;
  }

  private buildUrl(path: string, query?: Record<string, string | number | boolean | undefined>): URL {
    const url = new URL(path, this.baseUrl);
    if (query) {
      for (const [key, value] of Object.entries(query)) {
        if (value === undefined) {
          continue;
        }
        url.searchParams.set(key, String(value));
      }
    }
    return url;
  }

  private async handleErrorResponse(response: Response): Promise<never> {
    const text = await response.text().catch(() => '');
    let payload: unknown = text || null;
    if (text) {
      try {
        payload = JSON.parse(text);
      } catch {
        payload = text;
      }
    }

    const parsed = errorPayloadSchema.safeParse(payload);
    if (parsed.success && parsed.data.message !== undefined) {
      throw new ThingsboardClientError(parsed.data.message, {
        statusCode: response.status,
        code: parsed.data.errorCode !== undefined ? String(parsed.data.errorCode) : null,
        details: payload
      });
    }

    throw new ThingsboardClientError(response.statusText || 'ThingsBoard request failed', {
      statusCode: response.status,
      code: null,
      details: payload
    });
  }
}
