import { Injectable } from '@nestjs/common';
import { randomUUID } from 'crypto';
import { toClickHouseDateTime } from '../common/utils/datetime.util';
import { ClickHouseService } from '../database/clickhouse.service';
import { JobRunRecord } from './job-descriptor.entity';

/** Appends one row per finished run to `job_runs`. */
@Injectable()
export class JobRunRecorder {
  constructor(private readonly clickhouse: ClickHouseService) {}

  async record(run: JobRunRecord): Promise<void> {
    await this.clickhouse.insert('job_runs', [
      {
        id: randomUUID(),
        job: run.job,
        mode: run.mode,
        window_start: toClickHouseDateTime(run.windowStart),
        window_end: toClickHouseDateTime(run.windowEnd),
        status: run.status,
        records: run.records,
        error_kind: run.errorKind,
        error_message: run.errorMessage,
        started_at: toClickHouseDateTime(run.startedAt),
        finished_at: toClickHouseDateTime(run.finishedAt),
        duration_ms: Math.max(0, run.finishedAt.getTime() - run.startedAt.getTime()),
      },
    ]);
  }
}
