import type { ColumnMap, Dataset, TelemetryRecord, TelemetryValue, TimestampRule } from './types';

const TIMESTAMP_COLUMNS = ['timestamp', 'datetime', 'data_hora', 'date_time'];
const DATE_COLUMNS = ['data', 'date', 'DATA'];
const HOUR_COLUMNS = ['hora', 'hour', 'HORA UTC'];
const NULL_TOKENS = new Set(['-9999', '-9999.0', 'nan', 'null', 'none']);

const ISO_WITH_OFFSET = /(?:Z|[+-]\d{2}:?\d{2})$/i;
const YEAR_FIRST =
  /^(\d{4})[-/](\d{1,2})[-/](\d{1,2})(?:[ T](\d{1,2})(?::(\d{2}))?(?::(\d{2})(?:\.(\d{1,3})\d*)?)?)?$/;
const DAY_FIRST = /^(\d{1,2})\/(\d{1,2})\/(\d{4})(?: (\d{1,2})(?::(\d{2}))?(?::(\d{2}))?)?$/;

export function detectTimestampRule(columns: string[]): TimestampRule {
  const column = TIMESTAMP_COLUMNS.find((candidate) => columns.includes(candidate));
  if (column) {
    return { kind: 'column', column };
  }
  const dateColumn = DATE_COLUMNS.find((candidate) => columns.includes(candidate));
  const hourColumn = HOUR_COLUMNS.find((candidate) => columns.includes(candidate));
  if (dateColumn && hourColumn) {
    return { kind: 'date_hour', dateColumn, hourColumn };
  }
  return { kind: 'wall_clock' };
}

export function timestampColumns(rule: TimestampRule): string[] {
  switch (rule.kind) {
    case 'column':
      return [rule.column];
    case 'date_hour':
      return [rule.dateColumn, rule.hourColumn];
    case 'wall_clock':
      return [];
  }
}

function utcMillis(parts: Array<string | undefined>, order: 'ymd' | 'dmy'): number | null {
  const [first, middle, last, hour, minute, secs, millis] = parts;
  const year = Number(order === 'ymd' ? first : last);
  const month = Number(middle);
  const day = Number(order === 'ymd' ? last : first);
  const hours = Number(hour ?? 0);
  const minutes = Number(minute ?? 0);
  const seconds = Number(secs ?? 0);
  const ms = millis ? Number(millis.padEnd(3, '0')) : 0;
  if (month < 1 || month > 12 || hours > 23 || minutes > 59 || seconds > 59) {
    return null;
  }
  const value = Date.UTC(year, month - 1, day, hours, minutes, seconds, ms);
  const check = new Date(value);
  if (check.getUTCDate() !== day || check.getUTCMonth() !== month - 1) {
    return null;
  }
  return value;
}

/**
 * Parses a calendar date-time. Values without an explicit offset are read as
 * UTC.
 */
export function parseCalendarTimestamp(raw: string): number | null {
  const value = raw.trim();
  if (!value) {
    return null;
  }
  if (ISO_WITH_OFFSET.test(value) && value.length > 10) {
    const parsed = Date.parse(value);
    return Number.isNaN(parsed) ? null : parsed;
  }
  const yearFirst = YEAR_FIRST.exec(value);
  if (yearFirst) {
    return utcMillis(yearFirst.slice(1), 'ymd');
  }
  const dayFirst = DAY_FIRST.exec(value);
  if (dayFirst) {
    return utcMillis(dayFirst.slice(1), 'dmy');
  }
  return null;
}

/** Normalizes hour cells such as `1300 UTC`, `13` or `13:00`. */
export function normalizeHour(raw: string): string {
  const value = raw.trim().replace(/\s*utc$/i, '');
  if (/^\d{3,4}$/.test(value)) {
    const padded = value.padStart(4, '0');
    return `${padded.slice(0, 2)}:${padded.slice(2)}`;
  }
  if (/^\d{1,2}$/.test(value)) {
    return `${value}:00`;
  }
  return value;
}

function rowTimestamp(row: Record<string, string | null>, rule: TimestampRule, now: number): number | null {
  switch (rule.kind) {
    case 'column': {
      const raw = row[rule.column];
      return raw ? parseCalendarTimestamp(raw) : null;
    }
    case 'date_hour': {
      const date = row[rule.dateColumn];
      const hour = row[rule.hourColumn];
      if (!date || !hour) {
        return null;
      }
      return parseCalendarTimestamp(`${date.trim()} ${normalizeHour(hour)}`);
    }
    case 'wall_clock':
      return now;
  }
}

// Hex and binary literals stay text.
const DECIMAL = /^[+-]?(\d+(\.\d*)?|\.\d+)([eE][+-]?\d+)?$/;

/** Returns undefined for cells that carry no reading. */
export function coerceValue(raw: string | null | undefined): TelemetryValue | undefined {
  if (raw === null || raw === undefined) {
    return undefined;
  }
  const value = raw.trim();
  const normalized = value.replace(/,/g, '.');
  if (!value || NULL_TOKENS.has(value.toLowerCase()) || NULL_TOKENS.has(normalized.toLowerCase())) {
    return undefined;
  }
  if (DECIMAL.test(normalized)) {
    const parsed = Number(normalized);
    if (Number.isFinite(parsed)) {
      return parsed;
    }
  }
  return value;
}

export function transformDataset(
  dataset: Dataset,
  columnMap: ColumnMap | null,
  rule: TimestampRule,
  now: number = Date.now()
): TelemetryRecord[] {
  const consumed = new Set(timestampColumns(rule));
  const mapping: Array<[string, string]> = columnMap
    ? Object.entries(columnMap).filter(([source]) => !consumed.has(source))
    : dataset.columns.filter((column) => !consumed.has(column)).map((column) => [column, column]);

  const records: TelemetryRecord[] = [];
  for (const row of dataset.rows) {
    const ts = rowTimestamp(row, rule, now);
    if (ts === null) {
      continue;
    }
    const values: Record<string, TelemetryValue> = {};
    let count = 0;
    for (const [source, key] of mapping) {
      if (!(source in row)) {
        continue;
      }
      const value = coerceValue(row[source]);
      if (value === undefined) {
        continue;
      }
      values[key] = value;
      count += 1;
    }
    if (count > 0) {
      records.push({ ts, values });
    }
  }
  return records;
}

/** Builds a column map from `source:key` pairs; a bare name maps to itself. */
export function parseColumnMap(spec: string | null | undefined): ColumnMap | null {
  if (!spec) {
    return null;
  }
  const entries = spec
    .split(',')
    .map((entry) => entry.trim())
    .filter(Boolean)
    .map((entry): [string, string] => {
      const separator = entry.indexOf(':');
      if (separator < 0) {
        return [entry, entry];
      }
      const source = entry.slice(0, separator).trim();
      const key = entry.slice(separator + 1).trim();
      return [source, key || source];
    });
  return entries.length > 0 ? Object.fromEntries(entries) : null;
}
