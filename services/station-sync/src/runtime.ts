import { ThingsboardClient } from '@station-sync/thingsboard-client';
import { MlflowExperimentStore } from './clients/mlflowExperimentStore';
import { S3ObjectStore, createS3Client } from './clients/s3ObjectStore';
import { ThingsboardTelemetryPlatform } from './clients/thingsboardPlatform';
import type { ServiceConfig } from './config/serviceConfig';
import type { SyncLogger } from './logger';
import type { StationSyncMetrics } from './metrics';
import { JsonFileCheckpointStore } from './sync/checkpoints';
import { SyncOrchestrator } from './sync/orchestrator';
import { parseColumnMap } from './sync/tabularTransformer';
import type { ExperimentStore, ObjectStore, TelemetryPlatform } from './sync/types';

export interface RuntimeOverrides {
  experiments?: ExperimentStore;
  objects?: ObjectStore;
  platform?: TelemetryPlatform;
  now?: () => number;
}

export interface SyncRuntime {
  orchestrator: SyncOrchestrator;
  platform: TelemetryPlatform;
}

const USER_AGENT = 'station-sync/0.1.0';

export function createSyncRuntime(
  config: ServiceConfig,
  logger: SyncLogger,
  metrics?: StationSyncMetrics,
  overrides: RuntimeOverrides = {}
): SyncRuntime {
  const experiments =
    overrides.experiments ??
    new MlflowExperimentStore({ trackingUri: config.mlflow.trackingUri, timeoutMs: config.mlflow.timeoutMs });

  const objects =
    overrides.objects ??
    new S3ObjectStore(
      createS3Client({
        region: config.s3.region,
        endpoint: config.s3.endpoint,
        forcePathStyle: config.s3.forcePathStyle,
        accessKeyId: config.s3.accessKeyId,
        secretAccessKey: config.s3.secretAccessKey,
        sessionToken: config.s3.sessionToken
      }),
      config.s3.bucket
    );

  const platform =
    overrides.platform ??
    new ThingsboardTelemetryPlatform(
      new ThingsboardClient({
        baseUrl: config.thingsboard.url,
        credentials: { username: config.thingsboard.username, password: config.thingsboard.password },
        userAgent: USER_AGENT,
        fetchTimeoutMs: config.thingsboard.timeoutMs,
        telemetryTimeoutMs: config.thingsboard.pushTimeoutMs
      })
    );

  const orchestrator = new SyncOrchestrator({
    experiments,
    objects,
    platform,
    logger,
    metrics,
    defaultGroups: config.sync.experiments,
    batchSize: config.sync.batchSize,
    interRunDelayMs: config.sync.interRunDelayMs,
    interChunkDelayMs: config.sync.interChunkDelayMs,
    maxRunsPerPoll: config.sync.maxRunsPerPoll,
    maxRecordsPerRun: config.sync.maxRecordsPerRun,
    modelVariant: config.sync.modelVariant,
    columnMap: parseColumnMap(config.sync.valueColumns),
    dataPrefix: config.sync.dataPrefix,
    dataExtension: config.sync.dataExtension,
    checkpointStore: config.sync.checkpointPath
      ? new JsonFileCheckpointStore(config.sync.checkpointPath, logger)
      : undefined,
    now: overrides.now
  });

  return { orchestrator, platform };
}
