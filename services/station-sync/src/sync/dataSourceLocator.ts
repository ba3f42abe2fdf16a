import type { ObjectStore } from './types';

export const DEFAULT_DATA_PREFIX = 'dados_imputados/resultados/dados_para_update_neon_';
export const DEFAULT_DATA_EXTENSION = '.csv';

export interface DataSourceLocatorOptions {
  prefix?: string;
  extension?: string;
}

export class DataSourceLocator {
  private readonly prefix: string;
  private readonly extension: string;

  constructor(
    private readonly store: ObjectStore,
    options: DataSourceLocatorOptions = {}
  ) {
    this.prefix = options.prefix ?? DEFAULT_DATA_PREFIX;
    this.extension = (options.extension ?? DEFAULT_DATA_EXTENSION).toLowerCase();
  }

  async find(station: string, model?: string | null): Promise<string | null> {
    const candidates = uniqueForms(station);
    for (const form of candidates) {
      const keys = await this.listMatching(`${this.prefix}${form}`);
      if (keys.length === 0) {
        continue;
      }
      if (model) {
        const preferred = keys.find((key) => key.includes(model));
        if (preferred) {
          return preferred;
        }
      }
      return keys[0];
    }
    return null;
  }

  private async listMatching(prefix: string): Promise<string[]> {
    const keys = await this.store.listKeys(prefix);
    return keys
      .filter((key) => key.toLowerCase().endsWith(this.extension))
      .sort((left, right) => (left < right ? -1 : left > right ? 1 : 0));
  }
}

function uniqueForms(station: string): string[] {
  const underscored = station.replace(/ /g, '_');
  const spaced = station.replace(/_/g, ' ');
  return underscored === spaced ? [underscored] : [underscored, spaced];
}
