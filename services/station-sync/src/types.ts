import type { ServiceConfig } from './config/serviceConfig';
import type { StationSyncMetrics } from './metrics';
import type { SyncOrchestrator } from './sync/orchestrator';
import type { TelemetryPlatform } from './sync/types';

export interface AppContext {
  config: ServiceConfig;
  orchestrator: SyncOrchestrator;
  platform: TelemetryPlatform;
  metrics: StationSyncMetrics;
}
