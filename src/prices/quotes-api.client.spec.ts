import { ConfigService } from '@nestjs/config';
import { ConfigurationError, ExtractionError } from '../common/errors';
import {
  parseListings,
  QuotesApiClient,
  QuotesApiRequestError,
  shouldRetryRequest,
} from './quotes-api.client';

function createClient(overrides: Record<string, unknown> = {}): QuotesApiClient {
  return new QuotesApiClient(
    new ConfigService({
      QUOTES_API_BASE_URL: 'https://quotes.test/v1/',
      QUOTES_API_KEY: 'test-key',
      QUOTES_CONVERT: 'EUR',
      HTTP_TIMEOUT_MS: 1000,
      HTTP_MAX_RETRIES: 2,
      ...overrides,
    }),
  );
}

const json = (body: unknown, status = 200) =>
  new Response(JSON.stringify(body), {
    status,
    headers: { 'content-type': 'application/json' },
  });

/** A fetch that only settles when its request is aborted. */
function hangingFetch(_input: string | URL | Request, init?: RequestInit): Promise<Response> {
  return new Promise((_resolve, reject) => {
    init?.signal?.addEventListener('abort', () => reject(new Error('The operation was aborted')));
  });
}

describe('QuotesApiClient', () => {
  let fetchSpy: jest.SpyInstance<Promise<Response>, Parameters<typeof fetch>>;

  beforeEach(() => {
    fetchSpy = jest.spyOn(global, 'fetch');
    jest.spyOn(Math, 'random').mockReturnValue(0);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('requests one ranked page with the API key', async () => {
    fetchSpy.mockResolvedValueOnce(json({ data: [{ symbol: 'BTC' }, 'junk', { symbol: 'ETH' }] }));

    const listings = await createClient().fetchListings(100, 200);

    expect(listings).toEqual([{ symbol: 'BTC' }, { symbol: 'ETH' }]);
    expect(fetchSpy).toHaveBeenCalledTimes(1);
    const [url, init] = fetchSpy.mock.calls[0];
    expect(String(url)).toBe(
      'https://quotes.test/v1/cryptocurrency/listings/latest?start=201&limit=100&convert=EUR',
    );
    expect(init?.headers).toEqual({
      'X-CMC_PRO_API_KEY': 'test-key',
      Accept: 'application/json',
    });
  });

  it('refuses to call the API without a key', async () => {
    const client = createClient({ QUOTES_API_KEY: '' });

    expect(client.isConfigured()).toBe(false);
    await expect(client.fetchListings(10, 0)).rejects.toThrow(ConfigurationError);
    expect(fetchSpy).not.toHaveBeenCalled();
  });

  it('fails without retrying on a body with no data', async () => {
    fetchSpy.mockResolvedValue(json({ status: { error_message: 'Invalid value for "start"' } }));

    await expect(createClient().fetchListings(10, 0)).rejects.toThrow(
      'Listings response has no data array: Invalid value for "start"',
    );
    expect(fetchSpy).toHaveBeenCalledTimes(1);
  });

  it('honours retry-after on 429', async () => {
    fetchSpy
      .mockResolvedValueOnce(new Response('', { status: 429, headers: { 'retry-after': '0' } }))
      .mockResolvedValueOnce(json({ data: [{ symbol: 'BTC' }] }));

    await expect(createClient().fetchListings(10, 0)).resolves.toEqual([{ symbol: 'BTC' }]);
    expect(fetchSpy).toHaveBeenCalledTimes(2);
  });

  it('does not retry a client error', async () => {
    fetchSpy.mockResolvedValue(new Response('unauthorized', { status: 401 }));

    const attempt = createClient().fetchListings(10, 0);

    await expect(attempt).rejects.toThrow(QuotesApiRequestError);
    await expect(attempt).rejects.toThrow('Listings request failed: 401 unauthorized');
    expect(fetchSpy).toHaveBeenCalledTimes(1);
  });

  it('retries server errors until the budget is spent', async () => {
    fetchSpy.mockImplementation(async () => new Response('busy', { status: 503 }));

    await expect(createClient({ HTTP_MAX_RETRIES: 1 }).fetchListings(10, 0)).rejects.toThrow(
      'Listings request failed: 503 busy',
    );
    expect(fetchSpy).toHaveBeenCalledTimes(2);
  });

  it('times out a request that never answers', async () => {
    fetchSpy.mockImplementation(hangingFetch);

    await expect(
      createClient({ HTTP_TIMEOUT_MS: 20, HTTP_MAX_RETRIES: 0 }).fetchListings(10, 0),
    ).rejects.toThrow('Listings request timed out after 20ms');
  });

  it('stops when the run is aborted', async () => {
    fetchSpy.mockImplementation(hangingFetch);
    const controller = new AbortController();

    const attempt = createClient().fetchListings(10, 0, controller.signal);
    controller.abort();

    await expect(attempt).rejects.toThrow(ExtractionError);
    expect(fetchSpy).toHaveBeenCalledTimes(1);
  });
});

describe('shouldRetryRequest', () => {
  it('retries transient failures only', () => {
    expect(shouldRetryRequest(new TypeError('fetch failed'))).toBe(true);
    expect(shouldRetryRequest(new QuotesApiRequestError('timeout', null, true))).toBe(true);
    expect(shouldRetryRequest(new QuotesApiRequestError('busy', 502))).toBe(true);
    expect(shouldRetryRequest(new QuotesApiRequestError('missing', 404))).toBe(false);
    expect(shouldRetryRequest(new ExtractionError('bad body'))).toBe(false);
  });

  it('passes the server-requested delay on 429', () => {
    expect(shouldRetryRequest(new QuotesApiRequestError('slow down', 429, false, 2000))).toEqual({
      retry: true,
      delayMs: 2000,
    });
  });
});

describe('parseListings', () => {
  it('rejects a body that is not an object', () => {
    expect(() => parseListings(['BTC'])).toThrow('Listings response has no data array');
  });
});
