import { TableDefinition } from '../pipelines/load/table-definition';

export const PRICE_QUOTES_HOURLY: TableDefinition = {
  name: 'price_quotes_hourly',
  columns: [
    { name: 'symbol', type: 'string' },
    { name: 'name', type: 'string' },
    { name: 'slug', type: 'string' },
    { name: 'rank', type: 'uint' },
    { name: 'quote_currency', type: 'string' },
    { name: 'bucket', type: 'datetime' },
    { name: 'date', type: 'date' },
    { name: 'price', type: 'float' },
    { name: 'market_cap', type: 'float', nullable: true, precision: 2 },
    { name: 'volume_24h', type: 'float', nullable: true, precision: 2 },
    { name: 'percent_change_1h', type: 'float', nullable: true, precision: 4 },
    { name: 'percent_change_24h', type: 'float', nullable: true, precision: 4 },
    { name: 'percent_change_7d', type: 'float', nullable: true, precision: 4 },
    { name: 'circulating_supply', type: 'float', nullable: true },
    { name: 'total_supply', type: 'float', nullable: true },
    { name: 'max_supply', type: 'float', nullable: true },
    { name: 'source_updated_at', type: 'datetime64' },
    { name: 'recorded_at', type: 'datetime64' },
    { name: 'version', type: 'uint' },
  ],
  upsertKey: ['symbol', 'bucket'],
  versionColumn: 'version',
  strategy: 'replacing_merge',
  orderBy: ['symbol', 'bucket'],
  timeColumn: 'bucket',
};

export const PRICE_QUOTES_DAILY: TableDefinition = {
  name: 'price_quotes_daily',
  columns: [
    { name: 'symbol', type: 'string' },
    { name: 'name', type: 'string' },
    { name: 'slug', type: 'string' },
    { name: 'rank', type: 'uint' },
    { name: 'quote_currency', type: 'string' },
    { name: 'date', type: 'date' },
    { name: 'open', type: 'float' },
    { name: 'high', type: 'float' },
    { name: 'low', type: 'float' },
    { name: 'close', type: 'float' },
    { name: 'market_cap', type: 'float', nullable: true, precision: 2 },
    { name: 'volume_24h', type: 'float', nullable: true, precision: 2 },
    { name: 'samples', type: 'uint' },
    { name: 'recorded_at', type: 'datetime64' },
    { name: 'version', type: 'uint' },
  ],
  upsertKey: ['symbol', 'date'],
  versionColumn: 'version',
  strategy: 'replacing_merge',
  orderBy: ['symbol', 'date'],
  timeColumn: 'date',
};

export const PRICE_QUOTES_LATEST: TableDefinition = {
  name: 'price_quotes_latest',
  columns: [
    { name: 'symbol', type: 'string' },
    { name: 'name', type: 'string' },
    { name: 'slug', type: 'string' },
    { name: 'rank', type: 'uint' },
    { name: 'quote_currency', type: 'string' },
    { name: 'price', type: 'float' },
    { name: 'market_cap', type: 'float', nullable: true, precision: 2 },
    { name: 'volume_24h', type: 'float', nullable: true, precision: 2 },
    { name: 'percent_change_24h', type: 'float', nullable: true, precision: 4 },
    { name: 'source_updated_at', type: 'datetime64' },
    { name: 'recorded_at', type: 'datetime64' },
    { name: 'version', type: 'uint' },
  ],
  upsertKey: ['symbol'],
  versionColumn: 'version',
  strategy: 'delete_insert',
  orderBy: ['symbol'],
};

function periodTable(name: string): TableDefinition {
  return {
    name,
    columns: [
      { name: 'symbol', type: 'string' },
      { name: 'name', type: 'string' },
      { name: 'slug', type: 'string' },
      { name: 'rank', type: 'uint' },
      { name: 'quote_currency', type: 'string' },
      { name: 'period_start', type: 'date' },
      { name: 'open', type: 'float' },
      { name: 'high', type: 'float' },
      { name: 'low', type: 'float' },
      { name: 'close', type: 'float' },
      { name: 'market_cap', type: 'float', nullable: true, precision: 2 },
      { name: 'volume_24h', type: 'float', nullable: true, precision: 2 },
      { name: 'samples', type: 'uint' },
      { name: 'recorded_at', type: 'datetime64' },
      { name: 'version', type: 'uint' },
    ],
    upsertKey: ['symbol', 'period_start'],
    versionColumn: 'version',
    strategy: 'replacing_merge',
    orderBy: ['symbol', 'period_start'],
    timeColumn: 'period_start',
  };
}

export const PRICE_QUOTES_WEEKLY = periodTable('price_quotes_weekly');
export const PRICE_QUOTES_MONTHLY = periodTable('price_quotes_monthly');
export const PRICE_QUOTES_YEARLY = periodTable('price_quotes_yearly');
