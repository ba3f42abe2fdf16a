import type { RunRecord } from './types';

export interface StationStrategy {
  name: string;
  resolve(run: RunRecord): string | null;
}

const RUN_NAME_PREFIX = 'processed_data_';
const RUN_NAME_KEYWORDS = ['imputacao', 'imputation', 'estacao', 'station'] as const;
const NUMERIC_TOKEN = /^\d+$/;

function present(values: Record<string, string>, key: string): string | null {
  return Object.hasOwn(values, key) ? values[key] : null;
}

function fromProcessedRunName(runName: string): string | null {
  if (!runName.startsWith(RUN_NAME_PREFIX)) {
    return null;
  }
  const tokens = runName.split('_').slice(2);
  if (tokens.length > 0 && NUMERIC_TOKEN.test(tokens[tokens.length - 1])) {
    tokens.pop();
  }
  const station = tokens.filter((token) => token.length > 0).join('_');
  return station.length > 0 ? station : null;
}

function fromKeywordRunName(runName: string): string | null {
  const lowered = runName.toLowerCase();
  const tokens = runName.split('_');
  for (const keyword of RUN_NAME_KEYWORDS) {
    if (!lowered.includes(keyword)) {
      continue;
    }
    const index = tokens.findIndex((token) => token.toLowerCase().includes(keyword));
    if (index >= 0 && index + 1 < tokens.length) {
      const candidate = tokens[index + 1];
      if (candidate.length > 0) {
        return candidate;
      }
    }
  }
  return null;
}

/**
 * Ordered fallback chain. The first strategy that yields a value wins, so the
 * order here decides which metadata takes precedence. Metadata keys are taken
 * verbatim: a present but blank value ends the chain unresolved.
 */
export const STATION_STRATEGIES: readonly StationStrategy[] = [
  { name: 'tag:station', resolve: (run) => present(run.tags, 'station') },
  { name: 'tag:station_name', resolve: (run) => present(run.tags, 'station_name') },
  { name: 'param:station_name', resolve: (run) => present(run.params, 'station_name') },
  { name: 'run_name:processed_data', resolve: (run) => fromProcessedRunName(run.runName) },
  { name: 'run_name:keyword', resolve: (run) => fromKeywordRunName(run.runName) }
];

export interface StationResolution {
  station: string;
  strategy: string;
}

export function resolveStationWithStrategy(
  run: RunRecord,
  strategies: readonly StationStrategy[] = STATION_STRATEGIES
): StationResolution | null {
  for (const strategy of strategies) {
    const station = strategy.resolve(run);
    if (station !== null) {
      return station.trim().length > 0 ? { station, strategy: strategy.name } : null;
    }
  }
  return null;
}

export function resolveStation(run: RunRecord): string | null {
  return resolveStationWithStrategy(run)?.station ?? null;
}
