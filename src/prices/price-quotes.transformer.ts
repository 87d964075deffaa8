import { TransformationError } from '../common/errors';
import {
  CalendarUnit,
  parseClickHouseDate,
  startOfUtcPeriod,
  toClickHouseDate,
  toHourBucket,
} from '../common/utils/datetime.util';
import { isRecord } from '../common/utils/object.util';
import { createRecordTransformer } from '../pipelines/transform/record-transformers';
import { RunContext, Transformer } from '../pipelines/stages/stage.interface';
import {
  DailyQuoteRow,
  LatestQuoteRow,
  PeriodQuoteRow,
  PriceQuoteRow,
  RawListing,
  StoredDailyQuote,
  StoredHourlyQuote,
} from './price-quote.entity';

function text(value: unknown): string {
  return typeof value === 'string' ? value.trim() : '';
}

function numberOrNull(value: unknown): number | null {
  if (typeof value === 'number') return Number.isFinite(value) ? value : null;
  if (typeof value === 'string' && value.trim() !== '') {
    const parsed = Number(value);
    return Number.isFinite(parsed) ? parsed : null;
  }
  return null;
}

function dateOrNull(value: unknown): Date | null {
  if (typeof value !== 'string' || value.trim() === '') return null;
  const date = new Date(value.trim());
  return Number.isNaN(date.getTime()) ? null : date;
}

function quoteFor(raw: RawListing, convert: string): Record<string, unknown> {
  if (!isRecord(raw.quote)) return {};
  const quote = raw.quote[convert];
  return isRecord(quote) ? quote : {};
}

/**
 * Flattens one listing into an hourly snapshot row. The version comes from
 * `processedAt`; the bucket and date from `bucketAt`, which is `processedAt`
 * unless a backfill pins another hour. Re-runs for the same hour replace
 * each other.
 */
export function toPriceRecord(
  raw: RawListing,
  processedAt: Date,
  convert: string,
  bucketAt: Date = processedAt,
): PriceQuoteRow {
  const symbol = text(raw.symbol).toUpperCase();
  if (!symbol) {
    throw new TransformationError('Listing has no symbol', { id: numberOrNull(raw.id) });
  }
  const quote = quoteFor(raw, convert);
  const price = numberOrNull(quote.price);
  if (price === null) {
    throw new TransformationError(`${symbol} has no ${convert} price`, { symbol, convert });
  }

  return {
    symbol,
    name: text(raw.name),
    slug: text(raw.slug),
    rank: numberOrNull(raw.cmc_rank) ?? 0,
    quote_currency: convert,
    bucket: toHourBucket(bucketAt),
    date: toClickHouseDate(bucketAt),
    price,
    market_cap: numberOrNull(quote.market_cap),
    volume_24h: numberOrNull(quote.volume_24h),
    percent_change_1h: numberOrNull(quote.percent_change_1h),
    percent_change_24h: numberOrNull(quote.percent_change_24h),
    percent_change_7d: numberOrNull(quote.percent_change_7d),
    circulating_supply: numberOrNull(raw.circulating_supply),
    total_supply: numberOrNull(raw.total_supply),
    max_supply: numberOrNull(raw.max_supply),
    source_updated_at: dateOrNull(quote.last_updated) ?? dateOrNull(raw.last_updated),
    recorded_at: processedAt,
    version: processedAt.getTime(),
  };
}

export function toLatestRecord(raw: RawListing, processedAt: Date, convert: string): LatestQuoteRow {
  const row = toPriceRecord(raw, processedAt, convert);
  return {
    symbol: row.symbol,
    name: row.name,
    slug: row.slug,
    rank: row.rank,
    quote_currency: row.quote_currency,
    price: row.price,
    market_cap: row.market_cap,
    volume_24h: row.volume_24h,
    percent_change_24h: row.percent_change_24h,
    source_updated_at: row.source_updated_at,
    recorded_at: row.recorded_at,
    version: row.version,
  };
}

/**
 * Folds hourly snapshots into one row per symbol and day. Rows must arrive
 * ordered by symbol, then bucket; open and close are the first and last
 * samples of the day.
 */
export function rollupDaily(rows: StoredHourlyQuote[], processedAt: Date): DailyQuoteRow[] {
  const days = new Map<string, DailyQuoteRow>();

  for (const row of rows) {
    const key = `${row.symbol}|${row.date}`;
    const day = days.get(key);
    if (!day) {
      days.set(key, {
        symbol: row.symbol,
        name: row.name,
        slug: row.slug,
        rank: row.rank,
        quote_currency: row.quote_currency,
        date: row.date,
        open: row.price,
        high: row.price,
        low: row.price,
        close: row.price,
        market_cap: row.market_cap,
        volume_24h: row.volume_24h,
        samples: 1,
        recorded_at: processedAt,
        version: processedAt.getTime(),
      });
      continue;
    }

    day.high = Math.max(day.high, row.price);
    day.low = Math.min(day.low, row.price);
    day.close = row.price;
    day.name = row.name;
    day.slug = row.slug;
    day.rank = row.rank;
    day.market_cap = row.market_cap;
    day.volume_24h = row.volume_24h;
    day.samples += 1;
  }

  return [...days.values()];
}

/** Hour a run's snapshot belongs to: the pinned window's start in a backfill. */
export function snapshotTime(ctx: RunContext, processedAt: Date): Date {
  return ctx.window.mode === 'backfill' ? ctx.window.start : processedAt;
}

/** Maps listings with one `processedAt` per run, so a run never straddles two buckets. */
function createListingTransformer<O>(
  name: string,
  map: (raw: RawListing, processedAt: Date, convert: string, bucketAt: Date) => O,
  convert: string,
  now: () => Date,
): Transformer<RawListing, O> {
  return {
    kind: 'transformer',
    name,
    transform(records, ctx) {
      const processedAt = now();
      const bucketAt = snapshotTime(ctx, processedAt);
      return createRecordTransformer<RawListing, O>(
        (raw) => map(raw, processedAt, convert, bucketAt),
        name,
      ).transform(records, ctx);
    },
  };
}

export function createPriceQuotesTransformer(
  convert: string,
  now: () => Date = () => new Date(),
): Transformer<RawListing, PriceQuoteRow> {
  return createListingTransformer('price_quotes', toPriceRecord, convert, now);
}

export function createLatestQuotesTransformer(
  convert: string,
  now: () => Date = () => new Date(),
): Transformer<RawListing, LatestQuoteRow> {
  return createListingTransformer(
    'latest_quotes',
    (raw, processedAt, quoteCurrency) => toLatestRecord(raw, processedAt, quoteCurrency),
    convert,
    now,
  );
}

/**
 * Folds daily rows into one row per symbol and calendar period. Rows must
 * arrive ordered by symbol, then date.
 */
export function rollupPeriod(
  rows: StoredDailyQuote[],
  unit: Exclude<CalendarUnit, 'day'>,
  processedAt: Date,
): PeriodQuoteRow[] {
  const periods = new Map<string, PeriodQuoteRow>();

  for (const row of rows) {
    const periodStart = toClickHouseDate(startOfUtcPeriod(parseClickHouseDate(row.date), unit));
    const key = `${row.symbol}|${periodStart}`;
    const period = periods.get(key);
    if (!period) {
      periods.set(key, {
        symbol: row.symbol,
        name: row.name,
        slug: row.slug,
        rank: row.rank,
        quote_currency: row.quote_currency,
        period_start: periodStart,
        open: row.open,
        high: row.high,
        low: row.low,
        close: row.close,
        market_cap: row.market_cap,
        volume_24h: row.volume_24h,
        samples: row.samples,
        recorded_at: processedAt,
        version: processedAt.getTime(),
      });
      continue;
    }

    period.high = Math.max(period.high, row.high);
    period.low = Math.min(period.low, row.low);
    period.close = row.close;
    period.name = row.name;
    period.slug = row.slug;
    period.rank = row.rank;
    period.market_cap = row.market_cap;
    period.volume_24h = row.volume_24h;
    period.samples += row.samples;
  }

  return [...periods.values()];
}

export function createPeriodRollupTransformer(
  unit: Exclude<CalendarUnit, 'day'>,
  now: () => Date = () => new Date(),
): Transformer<StoredDailyQuote, PeriodQuoteRow> {
  return {
    kind: 'transformer',
    name: `${unit}ly_rollup`,
    async transform(rows) {
      return rollupPeriod(rows, unit, now());
    },
  };
}

export function createDailyRollupTransformer(
  now: () => Date = () => new Date(),
): Transformer<StoredHourlyQuote, DailyQuoteRow> {
  return {
    kind: 'transformer',
    name: 'daily_rollup',
    async transform(rows) {
      return rollupDaily(rows, now());
    },
  };
}
