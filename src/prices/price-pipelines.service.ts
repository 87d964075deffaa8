import { Injectable, Logger, OnModuleInit } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { CalendarUnit, startOfUtcPeriod } from '../common/utils/datetime.util';
import { ClickHouseService } from '../database/clickhouse.service';
import { JobRegistry } from '../jobs/job-registry.service';
import { PaginatedExtractor } from '../pipelines/extract/paginated-extractor';
import { createIdempotentLoader, LoaderOptions } from '../pipelines/load/idempotent-loader';
import { ReplacingMergeReader } from '../pipelines/load/replacing-merge.reader';
import { TableDefinition } from '../pipelines/load/table-definition';
import { createEtlPipeline } from '../pipelines/stages/combinators';
import { DataRecord, Pipeline } from '../pipelines/stages/stage.interface';
import { TimeWindow } from '../pipelines/time-window/time-window.entity';
import { RawListing, StoredDailyQuote, StoredHourlyQuote } from './price-quote.entity';
import {
  PRICE_QUOTES_DAILY,
  PRICE_QUOTES_HOURLY,
  PRICE_QUOTES_LATEST,
  PRICE_QUOTES_MONTHLY,
  PRICE_QUOTES_WEEKLY,
  PRICE_QUOTES_YEARLY,
} from './price-tables';
import {
  createDailyRollupTransformer,
  createLatestQuotesTransformer,
  createPeriodRollupTransformer,
  createPriceQuotesTransformer,
} from './price-quotes.transformer';
import { QuotesApiClient } from './quotes-api.client';

export const PRICE_JOBS = {
  hourly: 'prices_hourly',
  latest: 'prices_latest',
  daily: 'prices_daily',
  weekly: 'prices_weekly',
  monthly: 'prices_monthly',
  yearly: 'prices_yearly',
} as const;

type PeriodUnit = Exclude<CalendarUnit, 'day'>;

interface PeriodRollup {
  job: string;
  table: TableDefinition;
  schedule: string;
  description: string;
}

const PERIOD_UNITS: PeriodUnit[] = ['week', 'month', 'year'];

// Each runs after the rollup it reads from
const PERIOD_ROLLUPS: Record<PeriodUnit, PeriodRollup> = {
  week: {
    job: PRICE_JOBS.weekly,
    table: PRICE_QUOTES_WEEKLY,
    schedule: '20 0 * * 1',
    description: 'Weekly open/high/low/close rolled up from daily rows',
  },
  month: {
    job: PRICE_JOBS.monthly,
    table: PRICE_QUOTES_MONTHLY,
    schedule: '30 0 1 * *',
    description: 'Monthly open/high/low/close rolled up from daily rows',
  },
  year: {
    job: PRICE_JOBS.yearly,
    table: PRICE_QUOTES_YEARLY,
    schedule: '40 0 1 1 *',
    description: 'Yearly open/high/low/close rolled up from daily rows',
  },
};

/** Widens a window back to the start of its period, so a rollup never sees part of one. */
export function toWholePeriods(window: TimeWindow, unit: CalendarUnit): TimeWindow {
  return { ...window, start: startOfUtcPeriod(window.start, unit) };
}

@Injectable()
export class PricePipelinesService implements OnModuleInit {
  private readonly logger = new Logger(PricePipelinesService.name);

  constructor(
    private readonly configService: ConfigService,
    private readonly registry: JobRegistry,
    private readonly quotesApi: QuotesApiClient,
    private readonly reader: ReplacingMergeReader,
    private readonly clickhouse: ClickHouseService,
  ) {}

  onModuleInit(): void {
    this.registerJobs();
  }

  /** Registers the price jobs that can run with the current configuration. */
  registerJobs(): string[] {
    const registered: string[] = [];

    if (this.quotesApi.isConfigured()) {
      this.registry.register(
        PRICE_JOBS.hourly,
        this.buildHourlyPipeline(),
        '0 * * * *',
        'Hourly price snapshots of the ranked listings',
        { retryCount: 2, retryDelayMs: 30_000 },
      );
      this.registry.register(
        PRICE_JOBS.latest,
        this.buildLatestPipeline(),
        '*/15 * * * *',
        'Latest quote per symbol',
        { backfillable: false },
      );
      registered.push(PRICE_JOBS.hourly, PRICE_JOBS.latest);
    } else {
      this.logger.warn('QUOTES_API_KEY is not set, skipping quote jobs');
    }

    this.registry.register(
      PRICE_JOBS.daily,
      this.buildDailyPipeline(),
      '10 0 * * *',
      'Daily open/high/low/close rolled up from hourly snapshots',
    );
    registered.push(PRICE_JOBS.daily);

    for (const unit of PERIOD_UNITS) {
      const rollup = PERIOD_ROLLUPS[unit];
      this.registry.register(
        rollup.job,
        this.buildPeriodPipeline(unit),
        rollup.schedule,
        rollup.description,
      );
      registered.push(rollup.job);
    }

    return registered;
  }

  buildHourlyPipeline(): Pipeline {
    return createEtlPipeline<RawListing, DataRecord>(
      this.listingsExtractor(),
      createPriceQuotesTransformer(this.quotesApi.getConvert()),
      this.loaderFor(PRICE_QUOTES_HOURLY),
      PRICE_JOBS.hourly,
    );
  }

  buildLatestPipeline(): Pipeline {
    return createEtlPipeline<RawListing, DataRecord>(
      this.listingsExtractor(),
      createLatestQuotesTransformer(this.quotesApi.getConvert()),
      this.loaderFor(PRICE_QUOTES_LATEST),
      PRICE_JOBS.latest,
    );
  }

  buildDailyPipeline(): Pipeline {
    const hourlyRows = new PaginatedExtractor<StoredHourlyQuote>(
      `${PRICE_QUOTES_HOURLY.name}:final`,
      (ctx, limit, offset) =>
        this.reader.readPage<StoredHourlyQuote>(
          PRICE_QUOTES_HOURLY,
          toWholePeriods(ctx.window, 'day'),
          limit,
          offset,
        ),
      { batchSize: this.configService.get<number>('LOADER_BATCH_SIZE', 1000) },
    );

    return createEtlPipeline<StoredHourlyQuote, DataRecord>(
      hourlyRows,
      createDailyRollupTransformer(),
      this.loaderFor(PRICE_QUOTES_DAILY),
      PRICE_JOBS.daily,
    );
  }

  buildPeriodPipeline(unit: PeriodUnit): Pipeline {
    const { job, table } = PERIOD_ROLLUPS[unit];
    const dailyRows = new PaginatedExtractor<StoredDailyQuote>(
      `${PRICE_QUOTES_DAILY.name}:final`,
      (ctx, limit, offset) =>
        this.reader.readPage<StoredDailyQuote>(
          PRICE_QUOTES_DAILY,
          toWholePeriods(ctx.window, unit),
          limit,
          offset,
        ),
      { batchSize: this.configService.get<number>('LOADER_BATCH_SIZE', 1000) },
    );

    return createEtlPipeline<StoredDailyQuote, DataRecord>(
      dailyRows,
      createPeriodRollupTransformer(unit),
      this.loaderFor(table),
      job,
    );
  }

  private listingsExtractor(): PaginatedExtractor<RawListing> {
    return new PaginatedExtractor<RawListing>(
      'quotes_api:listings',
      (ctx, limit, offset) => this.quotesApi.fetchListings(limit, offset, ctx.signal),
      {
        batchSize: this.configService.get<number>('EXTRACT_PAGE_SIZE', 200),
        maxPages: this.configService.get<number>('EXTRACT_MAX_PAGES', 50),
        delayMs: this.configService.get<number>('EXTRACT_PAGE_DELAY_MS', 250),
      },
    );
  }

  private loaderFor(table: TableDefinition) {
    const options: LoaderOptions = {
      batchSize: this.configService.get<number>('LOADER_BATCH_SIZE', 1000),
      maxRetries: this.configService.get<number>('LOADER_MAX_RETRIES', 3),
      retryDelayMs: this.configService.get<number>('LOADER_RETRY_DELAY_MS', 500),
    };
    return createIdempotentLoader(table, this.clickhouse, options);
  }
}
