import { Counter, Gauge, Registry } from 'prom-client';

export interface StationSyncMetrics {
  register: Registry;
  runsProcessed: Counter<'result'>;
  recordsDelivered: Counter;
  recordsFailed: Counter;
  pollCycles: Counter;
  pollFailures: Counter<'group'>;
  deviceCacheSize: Gauge;
  loopRunning: Gauge;
}

export const createMetrics = (): StationSyncMetrics => {
  const register = new Registry();

  const runsProcessed = new Counter({
    name: 'station_sync_runs_processed_total',
    help: 'Experiment runs processed, labelled complete, partial or failed',
    registers: [register],
    labelNames: ['result'] as const
  });

  const recordsDelivered = new Counter({
    name: 'station_sync_records_delivered_total',
    help: 'Telemetry records accepted by the platform',
    registers: [register]
  });

  const recordsFailed = new Counter({
    name: 'station_sync_records_failed_total',
    help: 'Telemetry records in chunks the platform rejected',
    registers: [register]
  });

  const pollCycles = new Counter({
    name: 'station_sync_poll_cycles_total',
    help: 'Completed synchronization cycles',
    registers: [register]
  });

  const pollFailures = new Counter({
    name: 'station_sync_poll_failures_total',
    help: 'Experiment group polls that failed',
    registers: [register],
    labelNames: ['group'] as const
  });

  const deviceCacheSize = new Gauge({
    name: 'station_sync_device_cache_size',
    help: 'Devices held in the in-process directory cache',
    registers: [register]
  });

  const loopRunning = new Gauge({
    name: 'station_sync_loop_running',
    help: 'Whether the synchronization loop is running (1) or not (0)',
    registers: [register]
  });

  return {
    register,
    runsProcessed,
    recordsDelivered,
    recordsFailed,
    pollCycles,
    pollFailures,
    deviceCacheSize,
    loopRunning
  };
};
