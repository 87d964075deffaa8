import { ConfigurationError, LoadingError } from '../../common/errors';
import { DataRecord } from '../stages/stage.interface';
import { createRunContext } from '../testing/run-context.fixture';
import { LATEST_TABLE, QUOTES_TABLE } from '../testing/quote-table.fixture';
import {
  buildDeleteStatement,
  createIdempotentLoader,
  DeleteInsertLoader,
  ReplacingMergeLoader,
  RowWriter,
} from './idempotent-loader';
import { InsertRow } from './record-normalizer';

/** Append-only store that can answer the deduplicated view a FINAL read gives. */
class FakeReplacingStore implements RowWriter {
  readonly rows: InsertRow[] = [];

  async insert(_table: string, rows: InsertRow[]): Promise<void> {
    this.rows.push(...rows);
  }

  async command(): Promise<void> {
    throw new Error('replacing tables never delete');
  }

  final(keys: string[]): InsertRow[] {
    const latest = new Map<string, InsertRow>();
    for (const row of this.rows) {
      const key = keys.map((k) => String(row[k])).join('|');
      const current = latest.get(key);
      if (!current || Number(row.version) >= Number(current.version)) {
        latest.set(key, row);
      }
    }
    return [...latest.values()];
  }
}

/** Store that applies `IN {keys:...}` deletes on the symbol column. */
class FakeDeletingStore implements RowWriter {
  rows: InsertRow[] = [];
  readonly statements: string[] = [];

  async insert(_table: string, rows: InsertRow[]): Promise<void> {
    this.rows.push(...rows);
  }

  async command(sql: string, params?: Record<string, unknown>): Promise<void> {
    this.statements.push(sql);
    const keys = params?.keys;
    if (Array.isArray(keys)) {
      this.rows = this.rows.filter((row) => !keys.includes(row.symbol));
    }
  }
}

const transientError = () =>
  Object.assign(new Error('Too many parts'), { code: '252', type: 'TOO_MANY_PARTS' });
const schemaError = () =>
  Object.assign(new Error('Unknown column'), { code: '16', type: 'NO_SUCH_COLUMN_IN_TABLE' });

const options = {
  batchSize: 1000,
  maxRetries: 2,
  retryDelayMs: 0,
  randomFn: () => 0,
  now: () => new Date('2024-05-10T12:00:00.000Z'),
};

const quote = (symbol: string, price: number, version: number): DataRecord => ({
  symbol,
  bucket: '2024-05-10 11:00:00',
  price,
  version,
});

describe('IdempotentLoader', () => {
  const ctx = createRunContext();

  describe('ReplacingMergeLoader', () => {
    it('converges to one row per key with the highest version however often a batch is applied', async () => {
      const store = new FakeReplacingStore();
      const loader = new ReplacingMergeLoader(QUOTES_TABLE, store, options);
      const batch = [quote('BTC', 1, 1), quote('BTC', 2, 2), quote('ETH', 3, 1)];

      for (let i = 0; i < 3; i++) {
        await loader.load(batch, ctx);
      }

      expect(
        store.final(QUOTES_TABLE.upsertKey).map((row) => [row.symbol, row.price, row.version]),
      ).toEqual([
        ['BTC', 2, 2],
        ['ETH', 3, 1],
      ]);
    });

    it('collapses in-batch duplicates before writing and reports counts', async () => {
      const store = new FakeReplacingStore();
      const loader = new ReplacingMergeLoader(QUOTES_TABLE, store, options);

      const report = await loader.load(
        [quote('BTC', 1, 1), quote('BTC', 2, 2), quote('ETH', 3, 1)],
        ctx,
      );

      expect(report).toEqual({ received: 3, written: 2, skipped: 0, collapsed: 1, batches: 1 });
      expect(store.rows.map((row) => row.price)).toEqual([2, 3]);
    });

    it('skips records with a blank key and writes the rest', async () => {
      const store = new FakeReplacingStore();
      const loader = new ReplacingMergeLoader(QUOTES_TABLE, store, options);

      const report = await loader.load(
        [quote('BTC', 1, 1), { symbol: null, bucket: '2024-05-10 11:00:00', price: 5 }],
        ctx,
      );

      expect(report).toMatchObject({ received: 2, written: 1, skipped: 1 });
      expect(store.rows).toHaveLength(1);
    });

    it('skips records whose key cannot be converted instead of writing a default', async () => {
      const store = new FakeReplacingStore();
      const loader = new ReplacingMergeLoader(QUOTES_TABLE, store, options);

      const report = await loader.load(
        [
          { symbol: 'BTC', bucket: 'not-a-date', version: 1 },
          { symbol: 'BTC', bucket: 'also-garbage', version: 2 },
        ],
        ctx,
      );

      expect(report).toMatchObject({ received: 2, written: 0, skipped: 2 });
      expect(store.rows).toEqual([]);
    });

    it('writes fixed-size batches', async () => {
      const writer = { insert: jest.fn().mockResolvedValue(undefined), command: jest.fn() };
      const loader = new ReplacingMergeLoader(QUOTES_TABLE, writer, { ...options, batchSize: 2 });

      const report = await loader.load(
        ['A', 'B', 'C', 'D', 'E'].map((symbol) => quote(symbol, 1, 1)),
        ctx,
      );

      expect(report.batches).toBe(3);
      expect(writer.insert.mock.calls.map(([, rows]) => rows.length)).toEqual([2, 2, 1]);
      expect(writer.insert).toHaveBeenCalledWith('quotes', expect.any(Array));
    });

    it('retries a batch on transient failures', async () => {
      const writer = {
        insert: jest.fn().mockRejectedValueOnce(transientError()).mockResolvedValue(undefined),
        command: jest.fn(),
      };
      const loader = new ReplacingMergeLoader(QUOTES_TABLE, writer, options);

      await expect(loader.load([quote('BTC', 1, 1)], ctx)).resolves.toMatchObject({ written: 1 });
      expect(writer.insert).toHaveBeenCalledTimes(2);
    });

    it('gives up after maxRetries + 1 attempts', async () => {
      const writer = { insert: jest.fn().mockRejectedValue(transientError()), command: jest.fn() };
      const loader = new ReplacingMergeLoader(QUOTES_TABLE, writer, options);

      const error = await loader.load([quote('BTC', 1, 1)], ctx).catch((err: unknown) => err);

      expect(error).toBeInstanceOf(LoadingError);
      expect(error).toMatchObject({
        message: 'Writing batch 1 (1 rows) into quotes failed: Too many parts',
        details: { table: 'quotes', batch: 1, rows: 1, transient: true },
      });
      expect(writer.insert).toHaveBeenCalledTimes(3);
    });

    it('fails fast on schema errors', async () => {
      const writer = { insert: jest.fn().mockRejectedValue(schemaError()), command: jest.fn() };
      const loader = new ReplacingMergeLoader(QUOTES_TABLE, writer, options);

      await expect(loader.load([quote('BTC', 1, 1)], ctx)).rejects.toMatchObject({
        kind: 'loading',
        details: { transient: false },
      });
      expect(writer.insert).toHaveBeenCalledTimes(1);
    });

    it('keeps earlier batches when a later one fails', async () => {
      const writer = {
        insert: jest.fn().mockResolvedValueOnce(undefined).mockRejectedValue(schemaError()),
        command: jest.fn(),
      };
      const loader = new ReplacingMergeLoader(QUOTES_TABLE, writer, { ...options, batchSize: 1 });

      await expect(
        loader.load([quote('BTC', 1, 1), quote('ETH', 1, 1)], ctx),
      ).rejects.toThrow('Writing batch 2 (1 rows) into quotes failed: Unknown column');
      expect(writer.insert).toHaveBeenCalledTimes(2);
    });

    it('stops between batches once the run is aborted', async () => {
      const controller = new AbortController();
      controller.abort();
      const store = new FakeReplacingStore();
      const loader = new ReplacingMergeLoader(QUOTES_TABLE, store, options);

      await expect(
        loader.load([quote('BTC', 1, 1)], createRunContext({ signal: controller.signal })),
      ).rejects.toThrow('Load into quotes aborted after 0 rows');
      expect(store.rows).toHaveLength(0);
    });

    it('names itself after its table', () => {
      const loader = new ReplacingMergeLoader(QUOTES_TABLE, new FakeReplacingStore(), options);

      expect(loader.name).toBe('load:quotes');
      expect(loader.kind).toBe('loader');
    });
  });

  describe('DeleteInsertLoader', () => {
    const latest = (symbol: string, price: number, version: number): DataRecord => ({
      symbol,
      price,
      version,
    });

    it('keeps exactly one row per key across repeated loads', async () => {
      const store = new FakeDeletingStore();
      const loader = new DeleteInsertLoader(LATEST_TABLE, store, options);
      const batch = [latest('BTC', 1, 1), latest('BTC', 2, 2), latest('ETH', 3, 1)];

      await loader.load(batch, ctx);
      await loader.load(batch, ctx);

      expect(store.rows).toEqual([
        { symbol: 'BTC', price: 2, version: 2 },
        { symbol: 'ETH', price: 3, version: 1 },
      ]);
    });

    it('replaces only the keys present in the batch', async () => {
      const store = new FakeDeletingStore();
      const loader = new DeleteInsertLoader(LATEST_TABLE, store, options);

      await loader.load([latest('BTC', 1, 1), latest('ETH', 3, 1)], ctx);
      await loader.load([latest('BTC', 9, 5)], ctx);

      expect(store.rows).toEqual([
        { symbol: 'ETH', price: 3, version: 1 },
        { symbol: 'BTC', price: 9, version: 5 },
      ]);
      expect(store.statements).toEqual([
        'ALTER TABLE latest DELETE WHERE symbol IN {keys:Array(String)}',
        'ALTER TABLE latest DELETE WHERE symbol IN {keys:Array(String)}',
      ]);
    });

    it('deletes synchronously before inserting', async () => {
      const writer = {
        insert: jest.fn().mockResolvedValue(undefined),
        command: jest.fn().mockResolvedValue(undefined),
      };
      const loader = new DeleteInsertLoader(LATEST_TABLE, writer, options);

      await loader.load([latest('BTC', 1, 1)], ctx);

      expect(writer.command).toHaveBeenCalledWith(
        'ALTER TABLE latest DELETE WHERE symbol IN {keys:Array(String)}',
        { keys: ['BTC'] },
        { mutations_sync: '2' },
      );
      expect(writer.command.mock.invocationCallOrder[0]).toBeLessThan(
        writer.insert.mock.invocationCallOrder[0],
      );
    });
  });

  describe('buildDeleteStatement', () => {
    it('matches composite keys pairwise with typed parameters', () => {
      const statement = buildDeleteStatement(QUOTES_TABLE, [
        { symbol: 'BTC', bucket: '2024-05-10 11:00:00' },
        { symbol: 'ETH', bucket: '2024-05-10 12:00:00' },
      ]);

      expect(statement).toEqual({
        sql:
          'ALTER TABLE quotes DELETE WHERE (symbol = {k0_0:String} AND bucket = {k0_1:DateTime})' +
          ' OR (symbol = {k1_0:String} AND bucket = {k1_1:DateTime})',
        params: {
          k0_0: 'BTC',
          k0_1: '2024-05-10 11:00:00',
          k1_0: 'ETH',
          k1_1: '2024-05-10 12:00:00',
        },
      });
    });
  });

  describe('construction', () => {
    it('picks the strategy declared on the table', () => {
      expect(createIdempotentLoader(LATEST_TABLE, new FakeDeletingStore(), options)).toBeInstanceOf(
        DeleteInsertLoader,
      );
      expect(
        createIdempotentLoader(QUOTES_TABLE, new FakeReplacingStore(), options),
      ).toBeInstanceOf(ReplacingMergeLoader);
    });

    it('rejects a batch size below one', () => {
      expect(
        () => new ReplacingMergeLoader(QUOTES_TABLE, new FakeReplacingStore(), { ...options, batchSize: 0 }),
      ).toThrow(ConfigurationError);
    });

    it('rejects an upsert key that is not a declared column', () => {
      expect(
        () =>
          new ReplacingMergeLoader(
            { ...QUOTES_TABLE, upsertKey: ['ticker'] },
            new FakeReplacingStore(),
            options,
          ),
      ).toThrow('Column ticker is not declared on quotes');
    });
  });
});
