import { Test, TestingModule } from '@nestjs/testing';
import { executeCommand, logLevelsFor, parseCommand } from './cli';
import { ConfigurationError } from './common/errors';
import { JobDescriptor } from './jobs/job-descriptor.entity';
import { JobRegistry } from './jobs/job-registry.service';
import { JobSchedulerService } from './jobs/job-scheduler.service';

describe('parseCommand', () => {
  it('parses each command', () => {
    expect(parseCommand(['run', 'prices_hourly'])).toEqual({ name: 'run', job: 'prices_hourly' });
    expect(parseCommand(['backfill', 'prices_daily', '7'])).toEqual({
      name: 'backfill',
      job: 'prices_daily',
      days: 7,
    });
    expect(parseCommand(['list'])).toEqual({ name: 'list' });
    expect(parseCommand(['schedule'])).toEqual({ name: 'schedule' });
  });

  it('rejects bad input', () => {
    expect(() => parseCommand([])).toThrow('No command given');
    expect(() => parseCommand(['explode'])).toThrow('Unknown command "explode"');
    expect(() => parseCommand(['run'])).toThrow('Wrong arguments for "run"');
    expect(() => parseCommand(['list', 'extra'])).toThrow(ConfigurationError);
    expect(() => parseCommand(['backfill', 'prices_daily', '-1'])).toThrow(
      'Backfill days must be a whole number, got "-1"',
    );
  });
});

describe('logLevelsFor', () => {
  it('enables the given level and everything more severe', () => {
    expect(logLevelsFor('warn')).toEqual(['fatal', 'error', 'warn']);
    expect(logLevelsFor('verbose')).toEqual(['fatal', 'error', 'warn', 'log', 'debug', 'verbose']);
  });

  it('falls back to log for unknown or missing levels', () => {
    expect(logLevelsFor(undefined)).toEqual(['fatal', 'error', 'warn', 'log']);
    expect(logLevelsFor('loud')).toEqual(['fatal', 'error', 'warn', 'log']);
  });
});

describe('executeCommand', () => {
  let app: TestingModule;
  let registry: jest.Mocked<JobRegistry>;
  let scheduler: jest.Mocked<JobSchedulerService>;

  const hourly: JobDescriptor = {
    name: 'prices_hourly',
    schedule: '0 * * * *',
    description: 'Hourly',
    timeoutMs: 300_000,
    retryCount: 2,
    lastRun: null,
    status: 'completed',
    lastError: null,
    lastOutcome: null,
    watermark: new Date('2024-05-10T12:00:00.000Z'),
  };

  beforeEach(async () => {
    app = await Test.createTestingModule({
      providers: [
        {
          provide: JobRegistry,
          useValue: {
            runJob: jest.fn().mockResolvedValue(0),
            backfill: jest.fn().mockResolvedValue(1),
            list: jest.fn().mockReturnValue({ prices_hourly: hourly }),
          },
        },
        {
          provide: JobSchedulerService,
          useValue: {
            start: jest.fn().mockReturnValue([
              { name: 'prices_hourly', schedule: '0 * * * *', nextRun: new Date() },
            ]),
            stop: jest.fn(),
          },
        },
      ],
    }).compile();

    registry = app.get(JobRegistry);
    scheduler = app.get(JobSchedulerService);
  });

  it('runs a job and returns its exit code', async () => {
    await expect(executeCommand(app, { name: 'run', job: 'prices_hourly' })).resolves.toBe(0);
    expect(registry.runJob).toHaveBeenCalledWith('prices_hourly');
  });

  it('backfills a job', async () => {
    await expect(
      executeCommand(app, { name: 'backfill', job: 'prices_daily', days: 3 }),
    ).resolves.toBe(1);
    expect(registry.backfill).toHaveBeenCalledWith('prices_daily', 3);
  });

  it('lists jobs one per line', async () => {
    const lines: string[] = [];

    const code = await executeCommand(
      app,
      { name: 'list' },
      () => Promise.resolve<NodeJS.Signals>('SIGTERM'),
      (line) => lines.push(line),
    );

    expect(code).toBe(0);
    expect(lines).toEqual([
      'prices_hourly\t0 * * * *\tcompleted\tlast run -\twatermark 2024-05-10T12:00:00.000Z\tHourly',
    ]);
  });

  it('schedules until a stop signal arrives', async () => {
    const code = await executeCommand(app, { name: 'schedule' }, () =>
      Promise.resolve<NodeJS.Signals>('SIGTERM'),
    );

    expect(code).toBe(0);
    expect(scheduler.start).toHaveBeenCalledTimes(1);
    expect(scheduler.stop).toHaveBeenCalledTimes(1);
  });

  it('fails to schedule when no job is registered', async () => {
    scheduler.start.mockReturnValue([]);
    const waitForStop = jest.fn(() => Promise.resolve<NodeJS.Signals>('SIGINT'));

    await expect(executeCommand(app, { name: 'schedule' }, waitForStop)).resolves.toBe(1);
    expect(waitForStop).not.toHaveBeenCalled();
  });
});
