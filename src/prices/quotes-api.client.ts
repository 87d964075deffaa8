import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import {
  ConfigurationError,
  ExtractionError,
  PipelineError,
  toErrorMessage,
} from '../common/errors';
import { retry, RetryDecision } from '../common/retry';
import { isRecord } from '../common/utils/object.util';
import { RawListing } from './price-quote.entity';

const SOURCE = 'quotes-api';
const API_KEY_HEADER = 'X-CMC_PRO_API_KEY';
const RETRY_MIN_DELAY_MS = 500;
const RETRY_MAX_DELAY_MS = 10_000;

/** Transport failure of a single request. */
export class QuotesApiRequestError extends Error {
  constructor(
    message: string,
    readonly status: number | null,
    readonly timedOut = false,
    readonly retryDelayMs?: number,
  ) {
    super(message);
    this.name = QuotesApiRequestError.name;
  }
}

function parseRetryAfter(header: string | null): number | undefined {
  return header && /^\d+$/.test(header) ? Number(header) * 1000 : undefined;
}

/** Timeouts, 429 and 5xx are retried; other 4xx and pipeline errors are not. */
export function shouldRetryRequest(err: unknown): RetryDecision {
  if (err instanceof PipelineError) return false;
  if (err instanceof QuotesApiRequestError) {
    if (err.timedOut) return true;
    if (err.status === 429) return { retry: true, delayMs: err.retryDelayMs };
    return err.status !== null && err.status >= 500;
  }
  // fetch rejects with a TypeError on network failures
  return true;
}

export function parseListings(body: unknown): RawListing[] {
  if (!isRecord(body) || !Array.isArray(body.data)) {
    const apiMessage =
      isRecord(body) && isRecord(body.status) && typeof body.status.error_message === 'string'
        ? `: ${body.status.error_message}`
        : '';
    throw new ExtractionError(`Listings response has no data array${apiMessage}`, {
      source: SOURCE,
    });
  }
  return body.data.filter(isRecord);
}

/** Client for the listings endpoint of the quotes API. */
@Injectable()
export class QuotesApiClient {
  private readonly logger = new Logger(QuotesApiClient.name);
  private readonly baseUrl: string;
  private readonly apiKey: string;
  private readonly convert: string;
  private readonly timeoutMs: number;
  private readonly maxRetries: number;

  constructor(configService: ConfigService) {
    this.baseUrl = configService
      .get<string>('QUOTES_API_BASE_URL', 'https://pro-api.coinmarketcap.com/v1')
      .replace(/\/+$/, '');
    this.apiKey = configService.get<string>('QUOTES_API_KEY') ?? '';
    this.convert = configService.get<string>('QUOTES_CONVERT', 'USD');
    this.timeoutMs = configService.get<number>('HTTP_TIMEOUT_MS', 10_000);
    this.maxRetries = configService.get<number>('HTTP_MAX_RETRIES', 3);
  }

  isConfigured(): boolean {
    return this.apiKey !== '';
  }

  getConvert(): string {
    return this.convert;
  }

  /** Listings ranked `offset + 1` through `offset + limit`. */
  async fetchListings(limit: number, offset: number, signal?: AbortSignal): Promise<RawListing[]> {
    if (!this.isConfigured()) {
      throw new ConfigurationError('QUOTES_API_KEY is not set', { source: SOURCE });
    }

    const url = new URL(`${this.baseUrl}/cryptocurrency/listings/latest`);
    url.searchParams.set('start', String(offset + 1));
    url.searchParams.set('limit', String(limit));
    url.searchParams.set('convert', this.convert);

    const body = await retry(() => this.request(url, signal), {
      retries: this.maxRetries,
      minDelayMs: RETRY_MIN_DELAY_MS,
      maxDelayMs: RETRY_MAX_DELAY_MS,
      shouldRetry: shouldRetryRequest,
      signal,
      onRetry: ({ attempt, maxAttempts, delayMs, error }) =>
        this.logger.warn(
          `Listings at offset ${offset}: attempt ${attempt}/${maxAttempts} failed (${toErrorMessage(error)}), retrying in ${delayMs}ms`,
        ),
      onGiveUp: ({ attempt, maxAttempts, error }) =>
        this.logger.error(
          `Listings at offset ${offset}: giving up after attempt ${attempt}/${maxAttempts}: ${toErrorMessage(error)}`,
        ),
    });

    return parseListings(body);
  }

  private async request(url: URL, signal?: AbortSignal): Promise<unknown> {
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.timeoutMs);
    const forwardAbort = () => controller.abort();
    signal?.addEventListener('abort', forwardAbort, { once: true });

    let res: Response;
    try {
      res = await fetch(url, {
        headers: { [API_KEY_HEADER]: this.apiKey, Accept: 'application/json' },
        signal: controller.signal,
      });
    } catch (err) {
      if (signal?.aborted) {
        throw new ExtractionError('Listings request aborted', { source: SOURCE }, err);
      }
      if (controller.signal.aborted) {
        throw new QuotesApiRequestError(
          `Listings request timed out after ${this.timeoutMs}ms`,
          null,
          true,
        );
      }
      throw err;
    } finally {
      clearTimeout(timeout);
      signal?.removeEventListener('abort', forwardAbort);
    }

    if (!res.ok) {
      const text = await res.text().catch(() => '');
      throw new QuotesApiRequestError(
        `Listings request failed: ${res.status}${text ? ` ${text.slice(0, 200)}` : ''}`,
        res.status,
        false,
        parseRetryAfter(res.headers.get('retry-after')),
      );
    }

    try {
      return await res.json();
    } catch (err) {
      throw new ExtractionError('Listings response is not valid JSON', { source: SOURCE }, err);
    }
  }
}
