import { Test, TestingModule } from '@nestjs/testing';
import { ConfigurationError } from '../../common/errors';
import { ClickHouseService } from '../../database/clickhouse.service';
import { LATEST_TABLE, QUOTES_TABLE } from '../testing/quote-table.fixture';
import { ReplacingMergeReader } from './replacing-merge.reader';

describe('ReplacingMergeReader', () => {
  let reader: ReplacingMergeReader;
  let clickhouse: jest.Mocked<ClickHouseService>;

  const window = {
    start: new Date('2024-05-09T00:00:00.000Z'),
    end: new Date('2024-05-10T00:00:00.000Z'),
    mode: 'backfill' as const,
  };

  beforeEach(async () => {
    const module: TestingModule = await Test.createTestingModule({
      providers: [
        ReplacingMergeReader,
        {
          provide: ClickHouseService,
          useValue: {
            query: jest.fn(),
          },
        },
      ],
    }).compile();

    reader = module.get(ReplacingMergeReader);
    clickhouse = module.get(ClickHouseService);
  });

  it('reads one deduplicated page of the window', async () => {
    clickhouse.query.mockResolvedValue([{ symbol: 'BTC' }]);

    const rows = await reader.readPage(QUOTES_TABLE, window, 100, 200);

    expect(rows).toEqual([{ symbol: 'BTC' }]);
    const [sql, params] = clickhouse.query.mock.calls[0];
    expect(sql).toContain('FROM quotes FINAL');
    expect(sql).toContain('WHERE bucket >= {start:DateTime64(3)}');
    expect(sql).toContain('AND bucket < {end:DateTime64(3)}');
    expect(sql).toContain('ORDER BY symbol, bucket');
    expect(sql).toContain('LIMIT {limit:UInt32} OFFSET {offset:UInt32}');
    expect(params).toEqual({
      start: '2024-05-09 00:00:00.000',
      end: '2024-05-10 00:00:00.000',
      limit: 100,
      offset: 200,
    });
  });

  it('selects the declared columns', async () => {
    clickhouse.query.mockResolvedValue([]);

    await reader.readPage(QUOTES_TABLE, window, 10, 0);

    expect(clickhouse.query.mock.calls[0][0]).toContain(
      'SELECT symbol, bucket, price, market_cap, rank, tags, recorded_at, version',
    );
  });

  it('refuses tables that are not replacing-merge tables with a time column', async () => {
    await expect(reader.readPage(LATEST_TABLE, window, 10, 0)).rejects.toThrow(
      ConfigurationError,
    );
    expect(clickhouse.query).not.toHaveBeenCalled();
  });
});
