import { Module } from '@nestjs/common';
import { ClickHouseWatermarkStore } from '../pipelines/time-window/clickhouse-watermark.store';
import { WATERMARK_STORE } from '../pipelines/time-window/watermark.store';
import { JobRegistry } from './job-registry.service';
import { JobRunRecorder } from './job-runs.recorder';
import { JobSchedulerService } from './job-scheduler.service';

@Module({
  providers: [
    JobRegistry,
    JobRunRecorder,
    JobSchedulerService,
    { provide: WATERMARK_STORE, useClass: ClickHouseWatermarkStore },
  ],
  exports: [JobRegistry, JobSchedulerService],
})
export class JobsModule {}
