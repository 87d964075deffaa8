import { Logger } from '@nestjs/common';
import { ConfigurationError } from '../../common/errors';
import { isValidDate, subtractHours } from '../../common/utils/datetime.util';
import { TimeWindow } from './time-window.entity';

export interface BackfillContextOptions {
  /** Job the context belongs to, used in messages only. */
  job: string;
  /** Incremental start when no watermark exists yet. */
  defaultLookbackHours: number;
  /** Let successful backfill runs move the incremental watermark forward. */
  advanceDuringBackfill?: boolean;
  now?: () => Date;
}

interface PinnedWindow {
  start: Date;
  end: Date;
  owner: string;
}

/**
 * Per-job window state. Incremental mode derives the window from the
 * watermark; backfill mode pins an explicit window until `clear()`.
 */
export class BackfillContext {
  private readonly logger = new Logger(BackfillContext.name);
  private readonly now: () => Date;
  private pinned: PinnedWindow | null = null;
  private watermark: Date | null = null;

  constructor(private readonly options: BackfillContextOptions) {
    this.now = options.now ?? (() => new Date());
  }

  setWindow(start: Date, end: Date, owner: string): void {
    if (!isValidDate(start) || !isValidDate(end)) {
      throw new ConfigurationError('Backfill window requires valid dates', {
        job: this.options.job,
        owner,
      });
    }
    if (start.getTime() > end.getTime()) {
      throw new ConfigurationError(
        `Backfill window start ${start.toISOString()} is after end ${end.toISOString()}`,
        { job: this.options.job, owner },
      );
    }
    if (this.pinned && this.pinned.owner !== owner) {
      throw new ConfigurationError(
        `Backfill window for ${this.options.job} is held by ${this.pinned.owner}`,
        { job: this.options.job, owner, holder: this.pinned.owner },
      );
    }

    this.pinned = { start: new Date(start.getTime()), end: new Date(end.getTime()), owner };
    this.logger.debug(
      `${this.options.job}: pinned ${start.toISOString()} .. ${end.toISOString()} for ${owner}`,
    );
  }

  getWindow(): TimeWindow {
    if (this.pinned) {
      return {
        start: new Date(this.pinned.start.getTime()),
        end: new Date(this.pinned.end.getTime()),
        mode: 'backfill',
      };
    }

    const end = this.now();
    const start = this.watermark ?? subtractHours(end, this.options.defaultLookbackHours);
    // A watermark ahead of the clock yields an empty window rather than an inverted one
    return {
      start: start.getTime() > end.getTime() ? end : new Date(start.getTime()),
      end,
      mode: 'incremental',
    };
  }

  clear(): void {
    if (this.pinned) {
      this.logger.debug(`${this.options.job}: released window held by ${this.pinned.owner}`);
    }
    this.pinned = null;
  }

  /**
   * Moves the watermark forward to `to`. Returns whether it moved.
   * Ignored while a window is pinned unless `advanceDuringBackfill` is set.
   */
  advanceWatermark(to: Date): boolean {
    if (!isValidDate(to)) return false;
    if (this.pinned && !this.options.advanceDuringBackfill) return false;
    if (this.watermark && to.getTime() <= this.watermark.getTime()) return false;

    this.watermark = new Date(to.getTime());
    return true;
  }

  /** Seeds the watermark from persisted state, without the forward-only rule. */
  restoreWatermark(value: Date | null): void {
    this.watermark = value && isValidDate(value) ? new Date(value.getTime()) : null;
  }

  getWatermark(): Date | null {
    return this.watermark ? new Date(this.watermark.getTime()) : null;
  }

  isBackfill(): boolean {
    return this.pinned !== null;
  }

  getOwner(): string | null {
    return this.pinned?.owner ?? null;
  }
}
