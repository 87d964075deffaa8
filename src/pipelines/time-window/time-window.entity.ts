export type WindowMode = 'incremental' | 'backfill';

/** Half-open range of source time a run covers. Always `start <= end`. */
export interface TimeWindow {
  start: Date;
  end: Date;
  mode: WindowMode;
}
