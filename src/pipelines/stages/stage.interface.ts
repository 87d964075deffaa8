import { StageOutcome } from '../../common/result';
import { BackfillContext } from '../time-window/backfill-context';
import { TimeWindow } from '../time-window/time-window.entity';

export type RecordValue = number | string | boolean | Date | string[] | null | undefined;

/** One row as it moves between stages. Rows of one extraction share a column set. */
export type DataRecord = Record<string, RecordValue>;

/** Everything a stage may read about the run it belongs to. */
export interface RunContext {
  job: string;
  window: TimeWindow;
  backfill: BackfillContext;
  signal: AbortSignal;
}

export interface Extractor<T = DataRecord> {
  readonly kind: 'extractor';
  readonly name: string;
  extract(ctx: RunContext): Promise<T[]>;
}

export interface Transformer<I = DataRecord, O = DataRecord> {
  readonly kind: 'transformer';
  readonly name: string;
  transform(records: I[], ctx: RunContext): Promise<O[]>;
}

export interface LoadReport {
  received: number;
  written: number;
  skipped: number;
  batches: number;
}

export interface Loader<T = DataRecord> {
  readonly kind: 'loader';
  readonly name: string;
  load(records: T[], ctx: RunContext): Promise<LoadReport>;
}

/** A composed unit of work. `run` resolves to an outcome and never rejects. */
export interface Pipeline {
  readonly name: string;
  run(ctx: RunContext): Promise<StageOutcome>;
}
