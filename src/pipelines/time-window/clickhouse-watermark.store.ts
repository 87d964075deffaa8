import { Injectable } from '@nestjs/common';
import { ClickHouseService } from '../../database/clickhouse.service';
import {
  parseClickHouseDateTime,
  toClickHouseDateTime,
} from '../../common/utils/datetime.util';
import { WatermarkStore } from './watermark.store';

interface WatermarkRow {
  watermark: string;
}

@Injectable()
export class ClickHouseWatermarkStore implements WatermarkStore {
  constructor(private readonly clickhouse: ClickHouseService) {}

  async load(job: string): Promise<Date | null> {
    const rows = await this.clickhouse.query<WatermarkRow>(
      `SELECT watermark FROM pipeline_watermarks FINAL
       WHERE job = {job:String}
       LIMIT 1`,
      { job },
    );
    return rows.length > 0 ? parseClickHouseDateTime(rows[0].watermark) : null;
  }

  async save(job: string, watermark: Date): Promise<void> {
    await this.clickhouse.insert('pipeline_watermarks', [
      {
        job,
        watermark: toClickHouseDateTime(watermark),
        updated_at: toClickHouseDateTime(),
      },
    ]);
  }
}
