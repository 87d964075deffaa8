import { Injectable } from '@nestjs/common';
import { ConfigurationError } from '../../common/errors';
import { toClickHouseDateTime } from '../../common/utils/datetime.util';
import { ClickHouseService } from '../../database/clickhouse.service';
import { TimeWindow } from '../time-window/time-window.entity';
import { TableDefinition } from './table-definition';

/**
 * Reads the deduplicated projection of replacing-merge tables. Rows not yet
 * merged are collapsed at query time with FINAL.
 */
@Injectable()
export class ReplacingMergeReader {
  constructor(private readonly clickhouse: ClickHouseService) {}

  /** One page of rows whose time column falls in `[window.start, window.end)`. */
  async readPage<T>(
    table: TableDefinition,
    window: TimeWindow,
    limit: number,
    offset: number,
  ): Promise<T[]> {
    if (table.strategy !== 'replacing_merge' || !table.timeColumn) {
      throw new ConfigurationError(`${table.name} does not support windowed FINAL reads`, {
        table: table.name,
      });
    }

    return this.clickhouse.query<T>(
      `SELECT ${table.columns.map((c) => c.name).join(', ')}
       FROM ${table.name} FINAL
       WHERE ${table.timeColumn} >= {start:DateTime64(3)}
         AND ${table.timeColumn} < {end:DateTime64(3)}
       ORDER BY ${table.orderBy.join(', ')}
       LIMIT {limit:UInt32} OFFSET {offset:UInt32}`,
      {
        start: toClickHouseDateTime(window.start),
        end: toClickHouseDateTime(window.end),
        limit,
        offset,
      },
    );
  }
}
