const periodRollup = (table: string) => `
    CREATE TABLE IF NOT EXISTS {database}.${table} (
      symbol LowCardinality(String),
      name String,
      slug String,
      rank UInt32 DEFAULT 0,
      quote_currency LowCardinality(String),
      period_start Date,
      open Float64,
      high Float64,
      low Float64,
      close Float64,
      market_cap Nullable(Float64),
      volume_24h Nullable(Float64),
      samples UInt32,
      recorded_at DateTime64(3),
      version UInt64
    ) ENGINE = ReplacingMergeTree(version)
    PARTITION BY toYear(period_start)
    ORDER BY (symbol, period_start)
  `;

// Tables created on startup in the configured database
export const SCHEMAS: Record<string, string> = {
  price_quotes_hourly: `
    CREATE TABLE IF NOT EXISTS {database}.price_quotes_hourly (
      symbol LowCardinality(String),
      name String,
      slug String,
      rank UInt32 DEFAULT 0,
      quote_currency LowCardinality(String),
      bucket DateTime,
      date Date,
      price Float64,
      market_cap Nullable(Float64),
      volume_24h Nullable(Float64),
      percent_change_1h Nullable(Float64),
      percent_change_24h Nullable(Float64),
      percent_change_7d Nullable(Float64),
      circulating_supply Nullable(Float64),
      total_supply Nullable(Float64),
      max_supply Nullable(Float64),
      source_updated_at DateTime64(3),
      recorded_at DateTime64(3),
      version UInt64
    ) ENGINE = ReplacingMergeTree(version)
    PARTITION BY toYYYYMM(date)
    ORDER BY (symbol, bucket)
  `,

  price_quotes_daily: `
    CREATE TABLE IF NOT EXISTS {database}.price_quotes_daily (
      symbol LowCardinality(String),
      name String,
      slug String,
      rank UInt32 DEFAULT 0,
      quote_currency LowCardinality(String),
      date Date,
      open Float64,
      high Float64,
      low Float64,
      close Float64,
      market_cap Nullable(Float64),
      volume_24h Nullable(Float64),
      samples UInt32,
      recorded_at DateTime64(3),
      version UInt64
    ) ENGINE = ReplacingMergeTree(version)
    PARTITION BY toYYYYMM(date)
    ORDER BY (symbol, date)
  `,

  price_quotes_weekly: periodRollup('price_quotes_weekly'),
  price_quotes_monthly: periodRollup('price_quotes_monthly'),
  price_quotes_yearly: periodRollup('price_quotes_yearly'),

  price_quotes_latest: `
    CREATE TABLE IF NOT EXISTS {database}.price_quotes_latest (
      symbol String,
      name String,
      slug String,
      rank UInt32 DEFAULT 0,
      quote_currency LowCardinality(String),
      price Float64,
      market_cap Nullable(Float64),
      volume_24h Nullable(Float64),
      percent_change_24h Nullable(Float64),
      source_updated_at DateTime64(3),
      recorded_at DateTime64(3),
      version UInt64
    ) ENGINE = MergeTree()
    ORDER BY symbol
  `,

  pipeline_watermarks: `
    CREATE TABLE IF NOT EXISTS {database}.pipeline_watermarks (
      job String,
      watermark DateTime64(3),
      updated_at DateTime64(3) DEFAULT now64(3)
    ) ENGINE = ReplacingMergeTree(updated_at)
    ORDER BY job
  `,

  job_runs: `
    CREATE TABLE IF NOT EXISTS {database}.job_runs (
      id String,
      job String,
      mode Enum8('incremental' = 1, 'backfill' = 2),
      window_start DateTime64(3),
      window_end DateTime64(3),
      status Enum8('completed' = 1, 'failed' = 2, 'timed_out' = 3),
      records UInt64 DEFAULT 0,
      error_kind String DEFAULT '',
      error_message String DEFAULT '',
      started_at DateTime64(3),
      finished_at DateTime64(3),
      duration_ms UInt64
    ) ENGINE = MergeTree()
    PARTITION BY toYYYYMM(started_at)
    ORDER BY (job, started_at)
  `,
};
