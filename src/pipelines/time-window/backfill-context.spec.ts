import { ConfigurationError } from '../../common/errors';
import { BackfillContext } from './backfill-context';

describe('BackfillContext', () => {
  const now = new Date('2024-05-10T12:30:00.000Z');
  let context: BackfillContext;

  beforeEach(() => {
    context = new BackfillContext({
      job: 'prices_hourly',
      defaultLookbackHours: 1,
      now: () => now,
    });
  });

  describe('incremental mode', () => {
    it('starts one lookback period before now without a watermark', () => {
      expect(context.getWindow()).toEqual({
        start: new Date('2024-05-10T11:30:00.000Z'),
        end: now,
        mode: 'incremental',
      });
    });

    it('starts at the watermark once it has been advanced', () => {
      expect(context.advanceWatermark(new Date('2024-05-10T09:00:00.000Z'))).toBe(true);

      expect(context.getWindow().start).toEqual(new Date('2024-05-10T09:00:00.000Z'));
      expect(context.getWindow().end).toEqual(now);
    });

    it('only moves the watermark forward', () => {
      context.advanceWatermark(new Date('2024-05-10T10:00:00.000Z'));

      expect(context.advanceWatermark(new Date('2024-05-10T09:00:00.000Z'))).toBe(false);
      expect(context.getWatermark()).toEqual(new Date('2024-05-10T10:00:00.000Z'));
    });

    it('collapses to an empty window when the watermark is ahead of the clock', () => {
      context.restoreWatermark(new Date('2024-05-10T13:00:00.000Z'));

      expect(context.getWindow()).toEqual({ start: now, end: now, mode: 'incremental' });
    });
  });

  describe('backfill mode', () => {
    const start = new Date('2024-05-01T00:00:00.000Z');
    const end = new Date('2024-05-02T00:00:00.000Z');

    it('returns exactly the pinned window', () => {
      context.setWindow(start, end, 'backfill:prices_hourly');

      expect(context.getWindow()).toEqual({ start, end, mode: 'backfill' });
      expect(context.isBackfill()).toBe(true);
      expect(context.getOwner()).toBe('backfill:prices_hourly');
    });

    it('accepts a zero-length window', () => {
      context.setWindow(start, start, 'owner');

      expect(context.getWindow()).toEqual({ start, end: start, mode: 'backfill' });
    });

    it('rejects an inverted window', () => {
      expect(() => context.setWindow(end, start, 'owner')).toThrow(ConfigurationError);
      expect(context.isBackfill()).toBe(false);
    });

    it('rejects invalid dates', () => {
      expect(() => context.setWindow(new Date('nope'), end, 'owner')).toThrow(
        'Backfill window requires valid dates',
      );
    });

    it('rejects a second owner while a window is held', () => {
      context.setWindow(start, end, 'first');

      expect(() => context.setWindow(start, end, 'second')).toThrow(
        'Backfill window for prices_hourly is held by first',
      );
    });

    it('lets the same owner move its window', () => {
      const nextEnd = new Date('2024-05-03T00:00:00.000Z');
      context.setWindow(start, end, 'first');
      context.setWindow(end, nextEnd, 'first');

      expect(context.getWindow()).toEqual({ start: end, end: nextEnd, mode: 'backfill' });
    });

    it('does not expose its pinned dates for mutation', () => {
      context.setWindow(start, end, 'owner');
      context.getWindow().start.setUTCFullYear(1999);

      expect(context.getWindow().start).toEqual(start);
    });

    it('returns to incremental mode after clear, and clear is idempotent', () => {
      context.setWindow(start, end, 'owner');
      context.clear();
      context.clear();

      expect(context.getWindow().mode).toBe('incremental');
      expect(context.getOwner()).toBeNull();
    });

    it('does not advance the watermark by default', () => {
      context.setWindow(start, end, 'owner');

      expect(context.advanceWatermark(end)).toBe(false);
      expect(context.getWatermark()).toBeNull();
    });

    it('advances the watermark when configured to', () => {
      const advancing = new BackfillContext({
        job: 'prices_hourly',
        defaultLookbackHours: 1,
        advanceDuringBackfill: true,
        now: () => now,
      });
      advancing.setWindow(start, end, 'owner');

      expect(advancing.advanceWatermark(end)).toBe(true);
      expect(advancing.getWatermark()).toEqual(end);
    });
  });
});
