import { INestApplicationContext, Logger, LogLevel } from '@nestjs/common';
import { ConfigurationError } from './common/errors';
import { LOG_LEVELS, LogLevelName } from './config/env.validation';
import { JobRegistry } from './jobs/job-registry.service';
import { JobSchedulerService } from './jobs/job-scheduler.service';

export type Command =
  | { name: 'run'; job: string }
  | { name: 'backfill'; job: string; days: number }
  | { name: 'list' }
  | { name: 'schedule' };

export const USAGE = [
  'Usage: snapshot-pipelines <command>',
  '  run <job>               run a job once over its incremental window',
  '  backfill <job> <days>   run a job once per day, from <days> days ago through today',
  '  list                    show registered jobs',
  '  schedule                run every job on its cron schedule until SIGINT/SIGTERM',
].join('\n');

const logger = new Logger('Cli');

export function parseCommand(argv: string[]): Command {
  if (argv.length === 0) {
    throw new ConfigurationError('No command given');
  }
  const [name, ...args] = argv;

  switch (name) {
    case 'run':
      if (args.length === 1) return { name: 'run', job: args[0] };
      break;
    case 'backfill': {
      if (args.length !== 2) break;
      if (!/^\d+$/.test(args[1])) {
        throw new ConfigurationError(`Backfill days must be a whole number, got "${args[1]}"`);
      }
      return { name: 'backfill', job: args[0], days: Number(args[1]) };
    }
    case 'list':
      if (args.length === 0) return { name: 'list' };
      break;
    case 'schedule':
      if (args.length === 0) return { name: 'schedule' };
      break;
    default:
      throw new ConfigurationError(`Unknown command "${name}"`);
  }
  throw new ConfigurationError(`Wrong arguments for "${name}"`);
}

function isLogLevelName(value: string | undefined): value is LogLevelName {
  return LOG_LEVELS.some((level) => level === value);
}

/** Nest log levels enabled at `level` and above. */
export function logLevelsFor(level: string | undefined): LogLevel[] {
  const threshold = isLogLevelName(level) ? level : 'log';
  return ['fatal', ...LOG_LEVELS.slice(0, LOG_LEVELS.indexOf(threshold) + 1)];
}

export function waitForShutdownSignal(): Promise<NodeJS.Signals> {
  return new Promise((resolve) => {
    const stop = (signal: NodeJS.Signals) => {
      process.off('SIGINT', stop);
      process.off('SIGTERM', stop);
      resolve(signal);
    };
    process.on('SIGINT', stop);
    process.on('SIGTERM', stop);
  });
}

function formatDate(date: Date | null): string {
  return date ? date.toISOString() : '-';
}

export async function executeCommand(
  app: INestApplicationContext,
  command: Command,
  waitForStop: () => Promise<NodeJS.Signals> = waitForShutdownSignal,
  write: (line: string) => void = (line) => process.stdout.write(`${line}\n`),
): Promise<number> {
  const registry = app.get(JobRegistry);

  switch (command.name) {
    case 'run':
      return registry.runJob(command.job);
    case 'backfill':
      return registry.backfill(command.job, command.days);
    case 'list': {
      const jobs = Object.values(registry.list());
      if (jobs.length === 0) {
        write('No jobs registered');
        return 0;
      }
      for (const job of jobs) {
        write(
          [
            job.name,
            job.schedule,
            job.status,
            `last run ${formatDate(job.lastRun)}`,
            `watermark ${formatDate(job.watermark)}`,
            job.description,
          ].join('\t'),
        );
      }
      return 0;
    }
    case 'schedule': {
      const scheduler = app.get(JobSchedulerService);
      const scheduled = scheduler.start();
      if (scheduled.length === 0) {
        logger.warn('No jobs registered, nothing to schedule');
        return 1;
      }
      const signal = await waitForStop();
      logger.log(`Received ${signal}, stopping scheduler`);
      scheduler.stop();
      return 0;
    }
  }
}
