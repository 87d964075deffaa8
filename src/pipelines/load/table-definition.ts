export type ColumnType =
  | 'string'
  | 'float'
  | 'int'
  | 'uint'
  | 'datetime'
  | 'datetime64'
  | 'date'
  | 'string_array';

export interface ColumnDefinition {
  name: string;
  type: ColumnType;
  nullable?: boolean;
  /** Decimal places kept for `float` columns. Defaults to 8. */
  precision?: number;
}

/**
 * `replacing_merge`: append only, ReplacingMergeTree(version) collapses keys, readers use FINAL.
 * `delete_insert`: delete the batch's keys, then insert. Single writer per key set.
 */
export type LoadStrategy = 'replacing_merge' | 'delete_insert';

export interface TableDefinition {
  name: string;
  /** Canonical column order of every inserted row. */
  columns: ColumnDefinition[];
  upsertKey: string[];
  versionColumn: string;
  strategy: LoadStrategy;
  orderBy: string[];
  /** Column that windowed reads filter on. */
  timeColumn?: string;
}

export const DEFAULT_FLOAT_PRECISION = 8;

const PARAM_TYPES: Record<ColumnType, string> = {
  string: 'String',
  float: 'Float64',
  int: 'Int64',
  uint: 'UInt64',
  datetime: 'DateTime',
  datetime64: 'DateTime64(3)',
  date: 'Date',
  string_array: 'Array(String)',
};

export function paramTypeOf(column: ColumnDefinition): string {
  const base = PARAM_TYPES[column.type];
  return column.nullable ? `Nullable(${base})` : base;
}

export function getColumn(table: TableDefinition, name: string): ColumnDefinition {
  const column = table.columns.find((c) => c.name === name);
  if (!column) {
    throw new Error(`Column ${name} is not declared on ${table.name}`);
  }
  return column;
}
