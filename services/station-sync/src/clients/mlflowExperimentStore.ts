import { fetch, Headers } from 'undici';
import type { Response } from 'undici';
import { z } from 'zod';
import type { ExperimentStore, RunRecord } from '../sync/types';

const DEFAULT_TIMEOUT_MS = 15_000;
const EXPERIMENT_PAGE_SIZE = 1_000;

export class MlflowRequestError extends Error {
  readonly statusCode: number;
  readonly errorCode: string | null;

  constructor(message: string, statusCode: number, errorCode: string | null = null) {
    super(message);
    this.name = 'MlflowRequestError';
    this.statusCode = statusCode;
    this.errorCode = errorCode;
  }
}

const keyValueSchema = z.object({ key: z.string(), value: z.string().nullish() });

const experimentSchema = z.object({
  experiment_id: z.string(),
  name: z.string(),
  lifecycle_stage: z.string().optional()
});

const searchExperimentsSchema = z.object({
  experiments: z.array(experimentSchema).default([]),
  next_page_token: z.string().optional()
});

const getExperimentSchema = z.object({ experiment: experimentSchema });

const runSchema = z.object({
  info: z.object({
    run_id: z.string(),
    run_name: z.string().optional(),
    start_time: z.union([z.number(), z.string()]).optional()
  }),
  data: z
    .object({
      tags: z.array(keyValueSchema).default([]),
      params: z.array(keyValueSchema).default([])
    })
    .default({})
});

const searchRunsSchema = z.object({
  runs: z.array(runSchema).default([])
});

const errorSchema = z.object({
  error_code: z.string().optional(),
  message: z.string().optional()
});

type MlflowRun = z.infer<typeof runSchema>;

function toRecord(entries: Array<z.infer<typeof keyValueSchema>>): Record<string, string> {
  const record: Record<string, string> = {};
  for (const entry of entries) {
    record[entry.key] = entry.value ?? '';
  }
  return record;
}

export function toRunRecord(run: MlflowRun): RunRecord {
  const tags = toRecord(run.data.tags);
  const startTime = Number(run.info.start_time ?? 0);
  return {
    runId: run.info.run_id,
    runName: run.info.run_name ?? tags['mlflow.runName'] ?? '',
    startTime: Number.isFinite(startTime) ? startTime : 0,
    tags,
    params: toRecord(run.data.params)
  };
}

export interface MlflowExperimentStoreOptions {
  trackingUri: string;
  timeoutMs?: number;
}

/** Experiment store backed by the MLflow tracking server REST API. */
export class MlflowExperimentStore implements ExperimentStore {
  private readonly baseUrl: URL;
  private readonly timeoutMs: number;

  constructor(options: MlflowExperimentStoreOptions) {
    this.baseUrl = new URL(options.trackingUri.endsWith('/') ? options.trackingUri : `${options.trackingUri}/`);
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  }

  async listGroups(): Promise<string[]> {
    const names: string[] = [];
    let pageToken: string | undefined;
    do {
      const payload = searchExperimentsSchema.parse(
        await this.request('POST', 'api/2.0/mlflow/experiments/search', {
          max_results: EXPERIMENT_PAGE_SIZE,
          ...(pageToken ? { page_token: pageToken } : {})
        })
      );
      for (const experiment of payload.experiments) {
        if (experiment.lifecycle_stage !== 'deleted') {
          names.push(experiment.name);
        }
      }
      pageToken = payload.next_page_token || undefined;
    } while (pageToken);
    return names;
  }

  async getRuns(group: string, options: { maxResults: number }): Promise<RunRecord[]> {
    const experimentId = await this.findExperimentId(group);
    if (!experimentId) {
      return [];
    }
    const payload = searchRunsSchema.parse(
      await this.request('POST', 'api/2.0/mlflow/runs/search', {
        experiment_ids: [experimentId],
        max_results: options.maxResults,
        order_by: ['attributes.start_time DESC']
      })
    );
    return payload.runs.map(toRunRecord);
  }

  private async findExperimentId(name: string): Promise<string | null> {
    try {
      const payload = getExperimentSchema.parse(
        await this.request('GET', 'api/2.0/mlflow/experiments/get-by-name', undefined, { experiment_name: name })
      );
      return payload.experiment.experiment_id;
    } catch (error) {
      if (error instanceof MlflowRequestError && (error.statusCode === 404 || error.errorCode === 'RESOURCE_DOES_NOT_EXIST')) {
        return null;
      }
      throw error;
    }
  }

  private async request(
    method: 'GET' | 'POST',
    path: string,
    body?: unknown,
    query?: Record<string, string>
  ): Promise<unknown> {
    const url = new URL(path, this.baseUrl);
    for (const [key, value] of Object.entries(query ?? {})) {
      url.searchParams.set(key, value);
    }
    const headers = new Headers({ Accept: 'application/json' });
    if (body !== undefined) {
      headers.set('Content-Type', 'application/json');
    }

    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(new Error('Request timed out')), this.timeoutMs);
    let response: Response;
    try {
      response = await fetch(url, {
        method,
        headers,
        body: body === undefined ? undefined : JSON.stringify(body),
        signal: controller.signal
      });
    } catch (error) {
      if (controller.signal.aborted) {
        throw new MlflowRequestError(`MLflow request ${method} ${url.pathname} timed out`, 0, 'ABORTED');
      }
      throw error;
    } finally {
      clearTimeout(timeout);
    }

    const text = await response.text();
    let payload: unknown = {};
    if (text) {
      try {
        payload = JSON.parse(text);
      } catch {
        payload = { message: text };
      }
    }
    if (!response.ok) {
      const parsed = errorSchema.safeParse(payload);
      const details: z.infer<typeof errorSchema> = parsed.success ? parsed.data : {};
      throw new MlflowRequestError(
        details.message ?? `MLflow request ${method} ${url.pathname} failed with status ${response.status}`,
        response.status,
        details.error_code ?? null
      );
    }
    return payload;
  }
}
