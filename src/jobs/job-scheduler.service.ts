import { Injectable, Logger, OnModuleDestroy } from '@nestjs/common';
import { CronJob } from 'cron';
import { toErrorMessage } from '../common/errors';
import { JobRegistry } from './job-registry.service';

export interface ScheduledJob {
  name: string;
  schedule: string;
  nextRun: Date;
}

/** Fires registered jobs on their cron schedules, in UTC. */
@Injectable()
export class JobSchedulerService implements OnModuleDestroy {
  private readonly logger = new Logger(JobSchedulerService.name);
  private readonly timers = new Map<string, CronJob>();

  constructor(private readonly registry: JobRegistry) {}

  start(): ScheduledJob[] {
    const scheduled: ScheduledJob[] = [];

    for (const descriptor of Object.values(this.registry.list())) {
      const { name, schedule } = descriptor;
      if (this.timers.has(name)) continue;

      const timer = CronJob.from({
        cronTime: schedule,
        onTick: () => {
          this.registry.run(name).catch((err: unknown) => {
            this.logger.error(`Scheduled run of ${name} failed: ${toErrorMessage(err)}`);
          });
        },
        start: true,
        timeZone: 'UTC',
      });
      this.timers.set(name, timer);

      const nextRun = timer.nextDate().toJSDate();
      scheduled.push({ name, schedule, nextRun });
      this.logger.log(`Scheduled ${name} (${schedule}), next run ${nextRun.toISOString()}`);
    }

    return scheduled;
  }

  stop(): void {
    for (const [name, timer] of this.timers) {
      timer.stop();
      this.logger.log(`Stopped schedule for ${name}`);
    }
    this.timers.clear();
  }

  isRunning(): boolean {
    return this.timers.size > 0;
  }

  onModuleDestroy(): void {
    this.stop();
  }
}
