import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { plainToInstance } from 'class-transformer';
import { validateSync } from 'class-validator';
import { ConfigurationError, toErrorMessage } from '../common/errors';
import { failed, StageOutcome } from '../common/result';
import { createRetryPipeline } from '../pipelines/stages/combinators';
import { Pipeline, RunContext } from '../pipelines/stages/stage.interface';
import { BackfillContext } from '../pipelines/time-window/backfill-context';
import { TimeWindow } from '../pipelines/time-window/time-window.entity';
import { WATERMARK_STORE, WatermarkStore } from '../pipelines/time-window/watermark.store';
import { dailyWindows } from './backfill-windows';
import { assertCronExpression } from './cron-expression';
import { RegisterJobDto } from './dto/register-job.dto';
import { JobDescriptor, JobOptions, JobRunStatus } from './job-descriptor.entity';
import { JobRunRecorder } from './job-runs.recorder';

interface RegisteredJob {
  descriptor: JobDescriptor;
  pipeline: Pipeline;
  context: BackfillContext;
  running: boolean;
  watermarkLoaded: boolean;
  backfillable: boolean;
}

type ExitCode = 0 | 1;

@Injectable()
export class JobRegistry {
  private readonly logger = new Logger(JobRegistry.name);
  private readonly jobs = new Map<string, RegisteredJob>();
  private readonly defaultTimeoutMs: number;
  private readonly lookbackHours: number;
  private readonly backfillAdvancesWatermark: boolean;

  constructor(
    configService: ConfigService,
    @Inject(WATERMARK_STORE) private readonly watermarks: WatermarkStore,
    private readonly runRecorder: JobRunRecorder,
  ) {
    this.defaultTimeoutMs = configService.get<number>('JOB_TIMEOUT_SECONDS', 300) * 1000;
    this.lookbackHours = configService.get<number>('DEFAULT_LOOKBACK_HOURS', 1);
    this.backfillAdvancesWatermark = configService.get<boolean>(
      'BACKFILL_ADVANCES_WATERMARK',
      false,
    );
  }

  /**
   * Registers a pipeline under `name`. Throws ConfigurationError for an empty
   * or duplicate name, an invalid cron schedule or invalid options.
   */
  register(
    name: string,
    pipeline: Pipeline,
    schedule: string,
    description = '',
    options: JobOptions = {},
  ): JobDescriptor {
    const dto = plainToInstance(RegisterJobDto, { name, schedule, description, ...options });
    const errors = validateSync(dto);
    if (errors.length > 0) {
      const problems = errors.flatMap((error) => Object.values(error.constraints ?? {}));
      throw new ConfigurationError(`Invalid job "${name}": ${problems.join('; ')}`, { job: name });
    }
    assertCronExpression(schedule);
    if (this.jobs.has(name)) {
      throw new ConfigurationError(`Job ${name} is already registered`, { job: name });
    }

    const retryCount = options.retryCount ?? 0;
    const runnable =
      retryCount > 0
        ? createRetryPipeline(pipeline, {
            maxRetries: retryCount,
            delayMs: options.retryDelayMs ?? 0,
            backoff: 'exponential',
          })
        : pipeline;

    const descriptor: JobDescriptor = {
      name,
      schedule: schedule.trim(),
      description,
      timeoutMs: options.timeoutMs ?? this.defaultTimeoutMs,
      retryCount,
      lastRun: null,
      status: 'registered',
      lastError: null,
      lastOutcome: null,
      watermark: null,
    };

    this.jobs.set(name, {
      descriptor,
      pipeline: runnable,
      context: new BackfillContext({
        job: name,
        defaultLookbackHours: this.lookbackHours,
        advanceDuringBackfill: options.backfillAdvancesWatermark ?? this.backfillAdvancesWatermark,
      }),
      running: false,
      watermarkLoaded: false,
      backfillable: options.backfillable ?? true,
    });
    this.logger.log(`Registered job ${name} (${descriptor.schedule})`);

    return { ...descriptor };
  }

  unregister(name: string): boolean {
    const job = this.jobs.get(name);
    if (job?.running) {
      this.logger.warn(`Unregistering ${name} while a run is in progress`);
    }
    return this.jobs.delete(name);
  }

  list(): Record<string, JobDescriptor> {
    const snapshot: Record<string, JobDescriptor> = {};
    for (const [name, job] of this.jobs) {
      snapshot[name] = {
        ...job.descriptor,
        lastRun: job.descriptor.lastRun ? new Date(job.descriptor.lastRun.getTime()) : null,
        watermark: job.context.getWatermark(),
      };
    }
    return snapshot;
  }

  has(name: string): boolean {
    return this.jobs.has(name);
  }

  /** The job's window state, for callers that pin windows themselves. */
  getContext(name: string): BackfillContext | undefined {
    return this.jobs.get(name)?.context;
  }

  async run(name: string): Promise<boolean> {
    const outcome = await this.execute(name);
    return outcome.ok;
  }

  async runJob(name: string): Promise<ExitCode> {
    return (await this.run(name)) ? 0 : 1;
  }

  /**
   * Runs the job once per day from `days` days ago through today, each with a
   * pinned window. The window is always released afterwards.
   */
  async backfill(name: string, days: number): Promise<ExitCode> {
    const job = this.jobs.get(name);
    if (!job) {
      this.logger.error(`Cannot backfill unknown job ${name}`);
      return 1;
    }
    if (!job.backfillable) {
      this.logger.error(`Job ${name} does not depend on its window and cannot be backfilled`);
      return 1;
    }

    const windows = dailyWindows(days, new Date());
    const owner = `backfill:${name}`;
    const holder = job.context.getOwner();
    if (holder !== null && holder !== owner) {
      this.logger.error(`Cannot backfill ${name}: window is held by ${holder}`);
      return 1;
    }

    this.logger.log(`Backfilling ${name} over ${windows.length} daily windows`);
    const failures: string[] = [];
    try {
      for (const window of windows) {
        job.context.setWindow(window.start, window.end, owner);
        if (!(await this.run(name))) {
          failures.push(window.start.toISOString().slice(0, 10));
        }
      }
    } finally {
      job.context.clear();
    }

    if (failures.length > 0) {
      this.logger.error(
        `Backfill of ${name} failed for ${failures.length} of ${windows.length} days: ${failures.join(', ')}`,
      );
      return 1;
    }
    this.logger.log(`Backfill of ${name} completed`);
    return 0;
  }

  private async execute(name: string): Promise<StageOutcome> {
    const startedAt = Date.now();
    const job = this.jobs.get(name);
    if (!job) {
      this.logger.error(`Unknown job ${name}`);
      return failed(name, new ConfigurationError(`Unknown job ${name}`), startedAt);
    }
    if (job.running) {
      this.logger.warn(`Job ${name} is already running, skipping`);
      return failed(name, new ConfigurationError(`Job ${name} is already running`), startedAt);
    }

    const { descriptor, context } = job;
    job.running = true;
    descriptor.status = 'running';
    descriptor.lastRun = new Date(startedAt);

    let window: TimeWindow | null = null;
    let status: JobRunStatus = 'failed';
    let outcome: StageOutcome;
    let abandoned = false;
    try {
      await this.loadWatermark(job);
      window = context.getWindow();
      ({ outcome, status } = await this.runWithTimeout(job, window));
      abandoned = status === 'timed_out';

      if (outcome.ok && outcome.records > 0 && context.advanceWatermark(window.end)) {
        await this.persistWatermark(name, window.end);
      }
    } catch (err) {
      outcome = failed(name, err, startedAt);
      status = 'failed';
    } finally {
      // A timed-out run keeps the job busy until its pipeline settles
      if (!abandoned) {
        job.running = false;
      }
    }

    descriptor.status = status;
    descriptor.lastOutcome = outcome;
    descriptor.lastError = outcome.ok ? null : outcome.message;

    if (outcome.ok) {
      this.logger.log(`Job ${name} completed: ${outcome.records} records in ${outcome.elapsedMs}ms`);
    } else {
      this.logger.error(`Job ${name} ${status}: ${outcome.message}`);
    }

    if (window) {
      await this.recordRun(name, window, status, outcome, startedAt);
    }
    return outcome;
  }

  private async runWithTimeout(
    job: RegisteredJob,
    window: TimeWindow,
  ): Promise<{ outcome: StageOutcome; status: JobRunStatus }> {
    const { descriptor, context, pipeline } = job;
    const controller = new AbortController();
    const ctx: RunContext = {
      job: descriptor.name,
      window,
      backfill: context,
      signal: controller.signal,
    };
    const startedAt = Date.now();

    let timer: NodeJS.Timeout | undefined;
    const timedOut = new Promise<'timeout'>((resolve) => {
      timer = setTimeout(() => resolve('timeout'), descriptor.timeoutMs);
    });
    const running = pipeline
      .run(ctx)
      .catch((err: unknown) => failed(pipeline.name, err, startedAt));

    try {
      const result = await Promise.race([running, timedOut]);
      if (result !== 'timeout') {
        return { outcome: result, status: result.ok ? 'completed' : 'failed' };
      }
    } finally {
      clearTimeout(timer);
    }

    controller.abort();
    context.clear();
    running
      .then((late) => {
        this.logger.warn(
          `Abandoned run of ${descriptor.name} settled ${late.ok ? 'ok' : 'failed'} after timeout`,
        );
      })
      .catch((err: unknown) => {
        this.logger.error(`Abandoned run of ${descriptor.name} failed: ${toErrorMessage(err)}`);
      })
      .finally(() => {
        job.running = false;
      });
    return {
      outcome: {
        ok: false,
        stage: pipeline.name,
        kind: 'timeout',
        message: `Timed out after ${descriptor.timeoutMs}ms`,
        elapsedMs: Date.now() - startedAt,
      },
      status: 'timed_out',
    };
  }

  private async loadWatermark(job: RegisteredJob): Promise<void> {
    if (job.watermarkLoaded) return;
    const stored = await this.watermarks.load(job.descriptor.name);
    if (stored) {
      job.context.restoreWatermark(stored);
      this.logger.log(`Resuming ${job.descriptor.name} from ${stored.toISOString()}`);
    }
    job.watermarkLoaded = true;
  }

  private async persistWatermark(name: string, watermark: Date): Promise<void> {
    try {
      await this.watermarks.save(name, watermark);
    } catch (err) {
      // The next run re-reads the same window, which the loaders absorb
      this.logger.error(`Could not persist watermark for ${name}: ${toErrorMessage(err)}`);
    }
  }

  private async recordRun(
    name: string,
    window: TimeWindow,
    status: JobRunStatus,
    outcome: StageOutcome,
    startedAt: number,
  ): Promise<void> {
    try {
      await this.runRecorder.record({
        job: name,
        mode: window.mode,
        windowStart: window.start,
        windowEnd: window.end,
        status,
        records: outcome.ok ? outcome.records : 0,
        errorKind: outcome.ok ? '' : outcome.kind,
        errorMessage: outcome.ok ? '' : outcome.message,
        startedAt: new Date(startedAt),
        finishedAt: new Date(),
      });
    } catch (err) {
      this.logger.error(`Could not record run of ${name}: ${toErrorMessage(err)}`);
    }
  }
}
