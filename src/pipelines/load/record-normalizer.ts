import { toClickHouseDate, toClickHouseDateTime } from '../../common/utils/datetime.util';
import { DataRecord, RecordValue } from '../stages/stage.interface';
import { ColumnDefinition, DEFAULT_FLOAT_PRECISION, TableDefinition } from './table-definition';

export type InsertValue = string | number | string[] | null;
export type InsertRow = Record<string, InsertValue>;

export type NormalizeResult =
  | { ok: true; row: InsertRow; coerced: string[] }
  | { ok: false; reason: string };

const EPOCH = new Date(0);
const DATE_ONLY = /^\d{4}-\d{2}-\d{2}$/;

function toNumber(value: RecordValue): number | null {
  if (typeof value === 'number') return Number.isFinite(value) ? value : null;
  if (typeof value === 'string' && value.trim() !== '') {
    const parsed = Number(value.trim());
    return Number.isFinite(parsed) ? parsed : null;
  }
  return null;
}

function toDate(value: RecordValue): Date | null {
  let date: Date | null = null;
  if (value instanceof Date) {
    date = value;
  } else if (typeof value === 'number') {
    date = new Date(value);
  } else if (typeof value === 'string' && value.trim() !== '') {
    const text = value.trim();
    if (DATE_ONLY.test(text)) {
      date = new Date(`${text}T00:00:00Z`);
    } else if (text.includes('T')) {
      date = new Date(text);
    } else {
      // ClickHouse style, always UTC
      date = new Date(text.replace(' ', 'T') + 'Z');
    }
  }
  return date && !Number.isNaN(date.getTime()) ? date : null;
}

function isBlank(value: RecordValue): boolean {
  return value === null || value === undefined || value === '';
}

/** Zero value sent for a missing or unusable non-nullable column. */
function defaultFor(column: ColumnDefinition): InsertValue {
  if (column.nullable) return null;
  switch (column.type) {
    case 'string':
      return '';
    case 'float':
    case 'int':
    case 'uint':
      return 0;
    case 'datetime':
      return toClickHouseDateTime(EPOCH).slice(0, 19);
    case 'datetime64':
      return toClickHouseDateTime(EPOCH);
    case 'date':
      return toClickHouseDate(EPOCH);
    case 'string_array':
      return [];
  }
}

/** Converts a present value, or returns undefined when it cannot be represented. */
function convert(column: ColumnDefinition, value: RecordValue): InsertValue | undefined {
  switch (column.type) {
    case 'string':
      if (value instanceof Date) return toClickHouseDateTime(value);
      if (Array.isArray(value)) return value.join(',');
      return String(value);
    case 'float': {
      const n = toNumber(value);
      if (n === null) return undefined;
      return Number(n.toFixed(column.precision ?? DEFAULT_FLOAT_PRECISION));
    }
    case 'int':
    case 'uint': {
      const n = toNumber(value);
      if (n === null || (column.type === 'uint' && n < 0)) return undefined;
      return Math.round(n);
    }
    case 'datetime': {
      const date = toDate(value);
      return date ? toClickHouseDateTime(date).slice(0, 19) : undefined;
    }
    case 'datetime64': {
      const date = toDate(value);
      return date ? toClickHouseDateTime(date) : undefined;
    }
    case 'date': {
      const date = toDate(value);
      return date ? toClickHouseDate(date) : undefined;
    }
    case 'string_array':
      if (Array.isArray(value)) return value.map(String);
      return [String(value)];
  }
}

/**
 * Shapes a record into a row with every declared column, in declared order.
 * Rejects rows whose upsert key is blank or cannot be converted; other
 * unusable values fall back to the column default and are reported in
 * `coerced`.
 */
export function normalizeRecord(
  table: TableDefinition,
  record: DataRecord,
  loadedAt: Date,
): NormalizeResult {
  const blankKeys = table.upsertKey.filter((key) => isBlank(record[key]));
  if (blankKeys.length > 0) {
    return { ok: false, reason: `blank key ${blankKeys.join(', ')}` };
  }

  const row: InsertRow = {};
  const coerced: string[] = [];

  for (const column of table.columns) {
    let raw = record[column.name];
    if (column.name === table.versionColumn && isBlank(raw)) {
      raw = loadedAt.getTime();
    }

    if (isBlank(raw)) {
      row[column.name] = column.type === 'string' && raw === '' ? '' : defaultFor(column);
      continue;
    }

    const value = convert(column, raw);
    if (value === undefined && table.upsertKey.includes(column.name)) {
      return { ok: false, reason: `unusable key ${column.name}` };
    }
    if (value === undefined) {
      coerced.push(column.name);
      row[column.name] = defaultFor(column);
    } else {
      row[column.name] = value;
    }
  }

  return { ok: true, row, coerced };
}
