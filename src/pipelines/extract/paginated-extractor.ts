import { Logger } from '@nestjs/common';
import { ConfigurationError, ExtractionError, PipelineError, toErrorMessage } from '../../common/errors';
import { sleep } from '../../common/retry';
import { Extractor, RunContext } from '../stages/stage.interface';

export type PageFetcher<T> = (limit: number, offset: number) => Promise<T[]>;

export interface PaginationOptions {
  batchSize: number;
  /** Fail instead of looping forever when a source keeps returning full pages. */
  maxPages?: number;
  delayMs?: number;
  signal?: AbortSignal;
  /** Name used in log lines and error details. */
  label?: string;
}

const logger = new Logger('PaginatedExtractor');

/**
 * Calls `fetchPage(batchSize, offset)` with increasing offsets until an
 * empty or short page, and returns all pages concatenated in fetch order.
 */
export async function extractWithPagination<T>(
  fetchPage: PageFetcher<T>,
  options: PaginationOptions,
): Promise<T[]> {
  const { batchSize, maxPages, delayMs = 0, signal, label = 'source' } = options;

  if (!Number.isInteger(batchSize) || batchSize < 1) {
    throw new ConfigurationError(`Page size must be a positive integer, got ${batchSize}`, {
      source: label,
    });
  }
  if (maxPages !== undefined && (!Number.isInteger(maxPages) || maxPages < 1)) {
    throw new ConfigurationError(`Page ceiling must be a positive integer, got ${maxPages}`, {
      source: label,
    });
  }

  const records: T[] = [];
  let offset = 0;
  let pages = 0;

  for (;;) {
    if (signal?.aborted) {
      throw new ExtractionError(`Extraction from ${label} aborted`, { source: label, offset });
    }

    let page: T[];
    try {
      page = await fetchPage(batchSize, offset);
    } catch (err) {
      if (err instanceof PipelineError) throw err;
      throw new ExtractionError(
        `Page at offset ${offset} from ${label} failed: ${toErrorMessage(err)}`,
        { source: label, offset, page: pages + 1 },
        err,
      );
    }
    pages += 1;
    for (const record of page) {
      records.push(record);
    }
    logger.debug(`${label}: page ${pages} at offset ${offset} returned ${page.length} records`);

    if (page.length < batchSize) {
      return records;
    }
    if (maxPages !== undefined && pages >= maxPages) {
      throw new ExtractionError(
        `${label} still returned full pages after ${maxPages} pages (${records.length} records)`,
        { source: label, pages, records: records.length },
      );
    }

    offset += batchSize;
    if (delayMs > 0) {
      await sleep(delayMs);
    }
  }
}

export type ContextPageFetcher<T> = (
  ctx: RunContext,
  limit: number,
  offset: number,
) => Promise<T[]>;

export class PaginatedExtractor<T> implements Extractor<T> {
  readonly kind = 'extractor';

  constructor(
    readonly name: string,
    private readonly fetchPage: ContextPageFetcher<T>,
    private readonly options: Omit<PaginationOptions, 'signal' | 'label'>,
  ) {}

  extract(ctx: RunContext): Promise<T[]> {
    return extractWithPagination((limit, offset) => this.fetchPage(ctx, limit, offset), {
      ...this.options,
      signal: ctx.signal,
      label: this.name,
    });
  }
}
