import dayjs from 'dayjs';
import isoWeek from 'dayjs/plugin/isoWeek';
import utc from 'dayjs/plugin/utc';

dayjs.extend(utc);
dayjs.extend(isoWeek);

/** Calendar periods that rollups are aligned to. Weeks start on Monday. */
export type CalendarUnit = 'day' | 'week' | 'month' | 'year';

/**
 * Converts a Date to ClickHouse DateTime64(3) format.
 * Format: YYYY-MM-DD HH:MM:SS.SSS
 */
export function toClickHouseDateTime(date: Date = new Date()): string {
  return date.toISOString().replace('T', ' ').slice(0, -1);
}

/**
 * Parses a ClickHouse DateTime / DateTime64(3) string back to a Date object.
 */
export function parseClickHouseDateTime(datetime: string): Date {
  return new Date(datetime.replace(' ', 'T') + 'Z');
}

/** Start of the UTC hour, as `YYYY-MM-DD HH:00:00`. */
export function toHourBucket(date: Date): string {
  return dayjs.utc(date).startOf('hour').format('YYYY-MM-DD HH:mm:ss');
}

/** UTC calendar day, as `YYYY-MM-DD`. */
export function toClickHouseDate(date: Date): string {
  return dayjs.utc(date).format('YYYY-MM-DD');
}

export function startOfUtcDay(date: Date): Date {
  return dayjs.utc(date).startOf('day').toDate();
}

export function startOfUtcPeriod(date: Date, unit: CalendarUnit): Date {
  const day = dayjs.utc(date);
  return (unit === 'week' ? day.startOf('isoWeek') : day.startOf(unit)).toDate();
}

/** Parses `YYYY-MM-DD` as midnight UTC. */
export function parseClickHouseDate(date: string): Date {
  return dayjs.utc(date).toDate();
}

export function addUtcDays(date: Date, days: number): Date {
  return dayjs.utc(date).add(days, 'day').toDate();
}

export function subtractHours(date: Date, hours: number): Date {
  return dayjs.utc(date).subtract(hours, 'hour').toDate();
}

export function isValidDate(value: Date): boolean {
  return !Number.isNaN(value.getTime());
}
