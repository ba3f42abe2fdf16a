import {
  DataNotFoundError,
  DeviceUnavailableError,
  StationUnresolvableError,
  SyncBusyError,
  SyncNotRunningError
} from '../errors';
import type { SyncLogger } from '../logger';
import type { StationSyncMetrics } from '../metrics';
import { BatchDeliveryEngine, DEFAULT_BATCH_SIZE, DEFAULT_INTER_CHUNK_DELAY_MS } from './batchDelivery';
import { CheckpointTracker, type CheckpointStore } from './checkpoints';
import { parseDelimited } from './csv';
import { DataSourceLocator } from './dataSourceLocator';
import { DeviceDirectory } from './deviceDirectory';
import { DEFAULT_MAX_RUNS_PER_POLL, RunDiscovery } from './runDiscovery';
import { resolveStationWithStrategy } from './stationResolver';
import { detectTimestampRule, transformDataset } from './tabularTransformer';
import type {
  ColumnMap,
  DeviceRecord,
  ExperimentStore,
  GroupPollSummary,
  ObjectStore,
  RunOutcome,
  RunRecord,
  SyncCheckpoint,
  SyncCycleSummary,
  SyncState,
  TelemetryPlatform
} from './types';
import { delay, errorMessage } from './utils';

export const DEFAULT_INTER_RUN_DELAY_MS = 2_000;
export const DEFAULT_INTERVAL_MS = 60_000;

export interface SyncOrchestratorOptions {
  experiments: ExperimentStore;
  objects: ObjectStore;
  platform: TelemetryPlatform;
  logger: SyncLogger;
  defaultGroups: string[];
  metrics?: StationSyncMetrics;
  batchSize?: number;
  interRunDelayMs?: number;
  interChunkDelayMs?: number;
  maxRunsPerPoll?: number;
  maxRecordsPerRun?: number | null;
  modelVariant?: string | null;
  columnMap?: ColumnMap | null;
  dataPrefix?: string;
  dataExtension?: string;
  checkpointStore?: CheckpointStore;
  now?: () => number;
}

export interface StartOptions {
  groups?: string[];
  intervalMs?: number;
  continuous?: boolean;
}

export interface SyncStatus {
  state: SyncState;
  running: boolean;
  continuous: boolean;
  intervalMs: number | null;
  groups: string[];
  checkpoints: SyncCheckpoint;
  cachedDevices: number;
  cycles: number;
  lastCycle: SyncCycleSummary | null;
}

function emptyOutcome(run: RunRecord): RunOutcome {
  return {
    runId: run.runId,
    runName: run.runName,
    stationName: null,
    deviceFound: false,
    dataFound: false,
    dataKey: null,
    recordsSent: 0,
    recordsFailed: 0,
    success: false,
    complete: false,
    error: null
  };
}

/**
 * Drives discovery, resolution and delivery for experiment runs. A single
 * logical worker: runs are handled one at a time, and a stop request takes
 * effect between runs or during the sleep between cycles.
 */
export class SyncOrchestrator {
  readonly devices: DeviceDirectory;
  readonly checkpoints: CheckpointTracker;

  private readonly experiments: ExperimentStore;
  private readonly objects: ObjectStore;
  private readonly platform: TelemetryPlatform;
  private readonly logger: SyncLogger;
  private readonly metrics?: StationSyncMetrics;
  private readonly discovery: RunDiscovery;
  private readonly locator: DataSourceLocator;
  private readonly delivery: BatchDeliveryEngine;
  private readonly defaultGroups: string[];
  private readonly interRunDelayMs: number;
  private readonly maxRecordsPerRun: number | null;
  private readonly modelVariant: string | null;
  private readonly columnMap: ColumnMap | null;
  private readonly now: () => number;

  private currentState: SyncState = 'idle';
  private loop: Promise<void> | null = null;
  private loopGroups: string[] = [];
  private loopIntervalMs: number | null = null;
  private loopContinuous = false;
  private stopRequested = false;
  private sleepAbort: AbortController | null = null;
  private cycleInFlight = false;
  private starting = false;
  private restored = false;
  private cycles = 0;
  private lastCycle: SyncCycleSummary | null = null;

  constructor(options: SyncOrchestratorOptions) {
    this.experiments = options.experiments;
    this.objects = options.objects;
    this.platform = options.platform;
    this.logger = options.logger;
    this.metrics = options.metrics;
    this.defaultGroups = options.defaultGroups;
    this.interRunDelayMs = options.interRunDelayMs ?? DEFAULT_INTER_RUN_DELAY_MS;
    this.maxRecordsPerRun = options.maxRecordsPerRun ?? null;
    this.modelVariant = options.modelVariant ?? null;
    this.columnMap = options.columnMap ?? null;
    this.now = options.now ?? Date.now;

    this.devices = new DeviceDirectory(options.platform, options.logger);
    this.checkpoints = new CheckpointTracker(options.checkpointStore);
    this.discovery = new RunDiscovery(
      options.experiments,
      options.logger,
      options.maxRunsPerPoll ?? DEFAULT_MAX_RUNS_PER_POLL
    );
    this.locator = new DataSourceLocator(options.objects, {
      prefix: options.dataPrefix,
      extension: options.dataExtension
    });
    this.delivery = new BatchDeliveryEngine(options.platform, options.logger, {
      batchSize: options.batchSize ?? DEFAULT_BATCH_SIZE,
      interChunkDelayMs: options.interChunkDelayMs ?? DEFAULT_INTER_CHUNK_DELAY_MS
    });
  }

  get state(): SyncState {
    return this.currentState;
  }

  get running(): boolean {
    return this.loop !== null;
  }

  status(): SyncStatus {
    return {
      state: this.currentState,
      running: this.running,
      continuous: this.loopContinuous,
      intervalMs: this.loopIntervalMs,
      groups: this.running ? [...this.loopGroups] : [...this.defaultGroups],
      checkpoints: this.checkpoints.snapshot(),
      cachedDevices: this.devices.size,
      cycles: this.cycles,
      lastCycle: this.lastCycle
    };
  }

  async listGroups(): Promise<string[]> {
    return this.experiments.listGroups();
  }

  async syncOnce(groups?: string[]): Promise<RunOutcome[]> {
    const summary = await this.runCycle(groups);
    return summary.outcomes;
  }

  async runCycle(groups?: string[]): Promise<SyncCycleSummary> {
    if (this.running || this.cycleInFlight || this.starting) {
      throw new SyncBusyError();
    }
    this.stopRequested = false;
    this.cycleInFlight = true;
    try {
      if (!this.platform.connected) {
        await this.platform.connect();
      }
    } catch (error) {
      this.cycleInFlight = false;
      throw error;
    }
    try {
      return await this.executeCycle(this.pickGroups(groups));
    } finally {
      this.currentState = 'idle';
    }
  }

  async start(options: StartOptions = {}): Promise<void> {
    if (this.running || this.cycleInFlight || this.starting) {
      throw new SyncBusyError();
    }
    this.starting = true;
    try {
      await this.platform.connect();
    } finally {
      this.starting = false;
    }

    this.stopRequested = false;
    this.sleepAbort = new AbortController();
    this.loopGroups = this.pickGroups(options.groups);
    this.loopIntervalMs = options.intervalMs ?? DEFAULT_INTERVAL_MS;
    this.loopContinuous = options.continuous ?? true;
    this.metrics?.loopRunning.set(1);
    this.logger.info(
      { groups: this.loopGroups, intervalMs: this.loopIntervalMs, continuous: this.loopContinuous },
      'synchronization loop started'
    );
    this.loop = this.runLoop(this.loopGroups, this.loopIntervalMs, this.loopContinuous);
  }

  /** Resolves once the run in flight, if any, has finished. */
  async stop(): Promise<void> {
    const loop = this.loop;
    if (!loop) {
      throw new SyncNotRunningError();
    }
    this.stopRequested = true;
    this.sleepAbort?.abort();
    await loop;
  }

  /** Resolves when the current loop ends on its own or after a stop. */
  async wait(): Promise<void> {
    if (this.loop) {
      await this.loop;
    }
  }

  async clearCaches(): Promise<void> {
    if (this.running || this.cycleInFlight) {
      throw new SyncBusyError();
    }
    this.devices.clear();
    this.checkpoints.reset();
    this.metrics?.deviceCacheSize.set(0);
    await this.checkpoints.persist();
  }

  private pickGroups(groups?: string[]): string[] {
    const selected = (groups ?? []).map((group) => group.trim()).filter(Boolean);
    return selected.length > 0 ? Array.from(new Set(selected)) : [...this.defaultGroups];
  }

  private async runLoop(groups: string[], intervalMs: number, continuous: boolean): Promise<void> {
    try {
      while (!this.stopRequested) {
        try {
          await this.executeCycle(groups);
        } catch (error) {
          this.logger.error({ err: error }, 'synchronization cycle failed');
        }
        if (!continuous || this.stopRequested) {
          break;
        }
        this.currentState = 'idle';
        await delay(intervalMs, this.sleepAbort?.signal);
      }
    } finally {
      this.loop = null;
      this.sleepAbort = null;
      this.currentState = this.stopRequested ? 'stopped' : 'idle';
      this.metrics?.loopRunning.set(0);
      this.logger.info({ stopped: this.stopRequested, cycles: this.cycles }, 'synchronization loop finished');
    }
  }

  private async executeCycle(groups: string[]): Promise<SyncCycleSummary> {
    this.cycleInFlight = true;
    const startedAt = new Date(this.now()).toISOString();
    const groupSummaries: GroupPollSummary[] = [];
    const outcomes: RunOutcome[] = [];
    const abandoned: string[] = [];

    try {
      await this.restoreCheckpoints();
      let processed = 0;

      for (const group of groups) {
        if (this.stopRequested) {
          break;
        }
        this.currentState = 'polling';
        let runs: RunRecord[];
        try {
          runs = await this.discovery.poll(group, this.checkpoints);
        } catch (error) {
          this.metrics?.pollFailures.inc({ group });
          this.logger.warn({ group, error: errorMessage(error) }, 'experiment group poll failed; skipping');
          groupSummaries.push({ group, newRuns: 0, error: errorMessage(error) });
          continue;
        }
        groupSummaries.push({ group, newRuns: runs.length, error: null });
        if (runs.length > 0) {
          this.logger.info({ group, newRuns: runs.length }, 'new experiment runs found');
        }

        for (let index = 0; index < runs.length; index += 1) {
          if (processed > 0 && !this.stopRequested) {
            await delay(this.interRunDelayMs, this.sleepAbort?.signal);
          }
          if (this.stopRequested) {
            const remaining = runs.slice(index).map((run) => run.runId);
            abandoned.push(...remaining);
            this.logger.warn(
              { group, runIds: remaining, checkpoint: this.checkpoints.get(group) },
              'stop requested; runs behind the checkpoint were not processed'
            );
            break;
          }
          outcomes.push(await this.processRun(runs[index]));
          processed += 1;
        }
      }

      await this.persistCheckpoints();
    } finally {
      this.cycleInFlight = false;
    }

    const summary: SyncCycleSummary = {
      startedAt,
      finishedAt: new Date(this.now()).toISOString(),
      groups: groupSummaries,
      outcomes,
      abandonedRunIds: abandoned,
      totals: {
        runs: outcomes.length,
        successful: outcomes.filter((outcome) => outcome.success).length,
        failed: outcomes.filter((outcome) => !outcome.success).length,
        recordsSent: outcomes.reduce((sum, outcome) => sum + outcome.recordsSent, 0)
      }
    };
    this.cycles += 1;
    this.lastCycle = summary;
    this.metrics?.pollCycles.inc();
    this.logger.info({ groups: groups.length, ...summary.totals }, 'synchronization cycle finished');
    return summary;
  }

  private async processRun(run: RunRecord): Promise<RunOutcome> {
    const outcome = emptyOutcome(run);
    try {
      await this.processRunSteps(run, outcome);
    } catch (error) {
      outcome.error = errorMessage(error);
      this.logger.error({ runId: run.runId, station: outcome.stationName, err: error }, 'run processing failed');
    }
    outcome.success = outcome.recordsSent > 0;
    outcome.complete = outcome.success && outcome.recordsFailed === 0;
    this.metrics?.runsProcessed.inc({
      result: outcome.complete ? 'complete' : outcome.success ? 'partial' : 'failed'
    });
    this.metrics?.deviceCacheSize.set(this.devices.size);
    return outcome;
  }

  private async processRunSteps(run: RunRecord, outcome: RunOutcome): Promise<void> {
    this.currentState = 'resolving';
    const resolution = resolveStationWithStrategy(run);
    if (!resolution) {
      outcome.error = new StationUnresolvableError(run.runId).message;
      this.logger.info({ runId: run.runId, runName: run.runName }, 'run has no station metadata; skipping');
      return;
    }
    const station = resolution.station;
    outcome.stationName = station;
    this.logger.debug({ runId: run.runId, station, strategy: resolution.strategy }, 'station resolved');

    this.currentState = 'device_lookup';
    let device: DeviceRecord;
    try {
      device = await this.devices.getOrCreate(station);
    } catch (error) {
      if (error instanceof DeviceUnavailableError) {
        outcome.error = error.message;
        this.logger.error({ runId: run.runId, station, error: error.message }, 'device unavailable');
        return;
      }
      throw error;
    }
    outcome.deviceFound = true;

    this.currentState = 'data_lookup';
    const key = await this.locator.find(station, this.modelVariant);
    if (!key) {
      const notFound = new DataNotFoundError(station, this.modelVariant);
      outcome.error = notFound.message;
      this.logger.warn({ runId: run.runId, station, model: this.modelVariant }, 'no dataset found for station');
      return;
    }
    outcome.dataFound = true;
    outcome.dataKey = key;

    this.currentState = 'transforming';
    const content = await this.objects.getObject(key);
    const dataset = parseDelimited(content.toString('utf8'));
    const rule = detectTimestampRule(dataset.columns);
    let records = transformDataset(dataset, this.columnMap, rule, this.now());
    if (this.maxRecordsPerRun !== null && records.length > this.maxRecordsPerRun) {
      this.logger.warn(
        { station, records: records.length, limit: this.maxRecordsPerRun },
        'dataset exceeds per-run record limit; sending the most recent records'
      );
      records = records.slice(records.length - this.maxRecordsPerRun);
    }
    if (records.length === 0) {
      outcome.error = `Dataset ${key} produced no telemetry records`;
      this.logger.warn({ runId: run.runId, station, key, rows: dataset.rows.length }, 'dataset produced no records');
      return;
    }

    this.currentState = 'delivering';
    const result = await this.delivery.deliver(device, records);
    outcome.recordsSent = result.success;
    outcome.recordsFailed = result.failed;
    this.metrics?.recordsDelivered.inc(result.success);
    this.metrics?.recordsFailed.inc(result.failed);
    this.logger.info(
      { runId: run.runId, station, key, sent: result.success, failed: result.failed, total: result.total },
      'run delivered'
    );
  }

  private async restoreCheckpoints(): Promise<void> {
    if (this.restored) {
      return;
    }
    this.restored = true;
    await this.checkpoints.restore();
  }

  private async persistCheckpoints(): Promise<void> {
    try {
      await this.checkpoints.persist();
    } catch (error) {
      this.logger.warn({ error: errorMessage(error) }, 'failed to persist checkpoints');
    }
  }
}
