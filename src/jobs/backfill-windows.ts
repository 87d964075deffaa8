import { ConfigurationError } from '../common/errors';
import { addUtcDays, startOfUtcDay } from '../common/utils/datetime.util';

export interface DailyWindow {
  start: Date;
  end: Date;
}

export const MAX_BACKFILL_DAYS = 366;

/**
 * One window per UTC day from `days` days ago through today, oldest first.
 * Each window is `[midnight, next midnight)`, and today's ends at `now`.
 */
export function dailyWindows(days: number, now: Date): DailyWindow[] {
  if (!Number.isInteger(days) || days < 0 || days > MAX_BACKFILL_DAYS) {
    throw new ConfigurationError(
      `Backfill length must be a whole number of days between 0 and ${MAX_BACKFILL_DAYS}, got ${days}`,
      { days },
    );
  }

  const today = startOfUtcDay(now);
  const windows: DailyWindow[] = [];
  for (let offset = days; offset >= 0; offset--) {
    const start = addUtcDays(today, -offset);
    const nextDay = addUtcDays(start, 1);
    windows.push({ start, end: nextDay.getTime() < now.getTime() ? nextDay : new Date(now.getTime()) });
  }
  return windows;
}
