/** One element of `data` in a listings response, before any checks. */
export type RawListing = Record<string, unknown>;

export type PriceQuoteRow = {
  symbol: string;
  name: string;
  slug: string;
  rank: number;
  quote_currency: string;
  bucket: string;
  date: string;
  price: number;
  market_cap: number | null;
  volume_24h: number | null;
  percent_change_1h: number | null;
  percent_change_24h: number | null;
  percent_change_7d: number | null;
  circulating_supply: number | null;
  total_supply: number | null;
  max_supply: number | null;
  source_updated_at: Date | null;
  recorded_at: Date;
  version: number;
};

export type LatestQuoteRow = Pick<
  PriceQuoteRow,
  | 'symbol'
  | 'name'
  | 'slug'
  | 'rank'
  | 'quote_currency'
  | 'price'
  | 'market_cap'
  | 'volume_24h'
  | 'percent_change_24h'
  | 'source_updated_at'
  | 'recorded_at'
  | 'version'
>;

/** An hourly row as ClickHouse returns it in JSONEachRow. */
export interface StoredHourlyQuote {
  symbol: string;
  name: string;
  slug: string;
  rank: number;
  quote_currency: string;
  bucket: string;
  date: string;
  price: number;
  market_cap: number | null;
  volume_24h: number | null;
}

export type DailyQuoteRow = {
  symbol: string;
  name: string;
  slug: string;
  rank: number;
  quote_currency: string;
  date: string;
  open: number;
  high: number;
  low: number;
  close: number;
  market_cap: number | null;
  volume_24h: number | null;
  samples: number;
  recorded_at: Date;
  version: number;
};

/** A daily row as ClickHouse returns it. */
export type StoredDailyQuote = Omit<DailyQuoteRow, 'recorded_at' | 'version'>;

/** One row per symbol and calendar week, month or year, rolled up from daily rows. */
export type PeriodQuoteRow = Omit<DailyQuoteRow, 'date'> & {
  period_start: string;
};
