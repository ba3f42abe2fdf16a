import { PollFailureError } from '../errors';
import type { SyncLogger } from '../logger';
import type { CheckpointTracker } from './checkpoints';
import type { ExperimentStore, RunRecord } from './types';

export const DEFAULT_MAX_RUNS_PER_POLL = 100;

export class RunDiscovery {
  constructor(
    private readonly experiments: ExperimentStore,
    private readonly logger: SyncLogger,
    private readonly maxResults: number = DEFAULT_MAX_RUNS_PER_POLL
  ) {}

  /**
   * Returns runs newer than the group's checkpoint, newest first, and moves the
   * checkpoint to the newest start time returned. A run sharing the exact
   * checkpoint millisecond is not returned.
   */
  async poll(group: string, checkpoint: CheckpointTracker): Promise<RunRecord[]> {
    let runs: RunRecord[];
    try {
      runs = await this.experiments.getRuns(group, { maxResults: this.maxResults });
    } catch (error) {
      throw new PollFailureError(group, error);
    }

    const since = checkpoint.get(group);
    const fresh = runs
      .filter((run) => run.startTime > since)
      .sort((left, right) => right.startTime - left.startTime);

    if (fresh.length > 0) {
      checkpoint.advance(group, fresh[0].startTime);
    }
    this.logger.debug({ group, fetched: runs.length, fresh: fresh.length, since }, 'experiment group polled');
    return fresh;
  }
}
