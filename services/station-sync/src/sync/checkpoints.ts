import { promises as fs } from 'node:fs';
import path from 'node:path';
import type { SyncLogger } from '../logger';
import type { SyncCheckpoint } from './types';
import { errorMessage } from './utils';

export interface CheckpointStore {
  load(): Promise<SyncCheckpoint>;
  save(state: SyncCheckpoint): Promise<void>;
}

export class JsonFileCheckpointStore implements CheckpointStore {
  constructor(
    private readonly filePath: string,
    private readonly logger?: SyncLogger
  ) {}

  async load(): Promise<SyncCheckpoint> {
    try {
      const raw = await fs.readFile(this.filePath, 'utf8');
      const parsed: unknown = JSON.parse(raw);
      return sanitizeCheckpoint(parsed);
    } catch (error) {
      if (!isMissingFile(error)) {
        this.logger?.warn({ path: this.filePath, error: errorMessage(error) }, 'failed to read checkpoint');
      }
      return {};
    }
  }

  async save(state: SyncCheckpoint): Promise<void> {
    await fs.mkdir(path.dirname(this.filePath), { recursive: true });
    const payload = JSON.stringify(state, null, 2);
    await fs.writeFile(this.filePath, `${payload}\n`, 'utf8');
  }
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

function sanitizeCheckpoint(value: unknown): SyncCheckpoint {
  if (!value || typeof value !== 'object' || Array.isArray(value)) {
    return {};
  }
  const result: SyncCheckpoint = {};
  for (const [group, mark] of Object.entries(value)) {
    if (typeof mark === 'number' && Number.isFinite(mark)) {
      result[group] = mark;
    }
  }
  return result;
}

/** Per-group high-water marks. Marks only move forward. */
export class CheckpointTracker {
  private marks: SyncCheckpoint = {};

  constructor(private readonly store?: CheckpointStore) {}

  get(group: string): number {
    return this.marks[group] ?? 0;
  }

  advance(group: string, startTime: number): boolean {
    if (startTime <= this.get(group)) {
      return false;
    }
    this.marks[group] = startTime;
    return true;
  }

  snapshot(): SyncCheckpoint {
    return { ...this.marks };
  }

  reset(): void {
    this.marks = {};
  }

  async restore(): Promise<void> {
    if (!this.store) {
      return;
    }
    const loaded = await this.store.load();
    for (const [group, mark] of Object.entries(loaded)) {
      this.advance(group, mark);
    }
  }

  async persist(): Promise<void> {
    if (this.store) {
      await this.store.save(this.snapshot());
    }
  }
}
