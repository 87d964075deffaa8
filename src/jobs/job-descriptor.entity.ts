import { StageOutcome } from '../common/result';
import { WindowMode } from '../pipelines/time-window/time-window.entity';

export type JobStatus = 'registered' | 'running' | 'completed' | 'failed' | 'timed_out';

export interface JobDescriptor {
  name: string;
  /** Five-field cron expression, UTC. */
  schedule: string;
  description: string;
  timeoutMs: number;
  retryCount: number;
  lastRun: Date | null;
  status: JobStatus;
  lastError: string | null;
  lastOutcome: StageOutcome | null;
  watermark: Date | null;
}

export interface JobOptions {
  timeoutMs?: number;
  /** Wraps the pipeline in a retry combinator with this many extra attempts. */
  retryCount?: number;
  retryDelayMs?: number;
  /** Overrides BACKFILL_ADVANCES_WATERMARK for this job. */
  backfillAdvancesWatermark?: boolean;
  /** False for jobs whose output does not depend on the run window. Defaults to true. */
  backfillable?: boolean;
}

export type JobRunStatus = Extract<JobStatus, 'completed' | 'failed' | 'timed_out'>;

export interface JobRunRecord {
  job: string;
  mode: WindowMode;
  windowStart: Date;
  windowEnd: Date;
  status: JobRunStatus;
  records: number;
  errorKind: string;
  errorMessage: string;
  startedAt: Date;
  finishedAt: Date;
}
