import { Logger } from '@nestjs/common';
import { ConfigurationError } from '../../common/errors';
import { failed, FailedOutcome, StageOutcome, succeeded } from '../../common/result';
import { sleep } from '../../common/retry';
import { TimeWindow } from '../time-window/time-window.entity';
import { Extractor, Loader, Pipeline, RunContext, Transformer } from './stage.interface';

const logger = new Logger('StageCombinators');

function describeWindow(window: TimeWindow): string {
  return `${window.mode} window ${window.start.toISOString()} .. ${window.end.toISOString()}`;
}

function fail(stage: string, reason: unknown, startedAt: number): FailedOutcome {
  const outcome = failed(stage, reason, startedAt);
  logger.error(
    `${stage} failed after ${outcome.elapsedMs}ms (${outcome.kind}): ${outcome.message}`,
  );
  return outcome;
}

/** Runs a pipeline and converts a rejection into a failed outcome. */
async function settle(pipeline: Pipeline, ctx: RunContext): Promise<StageOutcome> {
  const startedAt = Date.now();
  try {
    return await pipeline.run(ctx);
  } catch (err) {
    return fail(pipeline.name, err, startedAt);
  }
}

function summarizeFailures(
  stage: string,
  failures: FailedOutcome[],
  total: number,
  startedAt: number,
): FailedOutcome {
  const [first] = failures;
  const outcome: FailedOutcome = {
    ok: false,
    stage,
    kind: first.kind,
    message: `${failures.length} of ${total} stages failed; first: ${first.stage}: ${first.message}`,
    elapsedMs: Date.now() - startedAt,
  };
  logger.error(`${stage} failed after ${outcome.elapsedMs}ms: ${outcome.message}`);
  return outcome;
}

function requireStages(name: string, pipelines: Pipeline[]): void {
  if (pipelines.length === 0) {
    throw new ConfigurationError(`${name} needs at least one stage`, { pipeline: name });
  }
}

/** Extract then load. An empty extraction is a successful no-op. */
export function createElPipeline<T>(
  extractor: Extractor<T>,
  loader: Loader<T>,
  name = `${extractor.name}->${loader.name}`,
): Pipeline {
  return {
    name,
    async run(ctx) {
      const startedAt = Date.now();
      try {
        const records = await extractor.extract(ctx);
        if (records.length === 0) {
          logger.log(`${name}: nothing extracted for ${describeWindow(ctx.window)}`);
          return succeeded(name, 0, startedAt);
        }

        const report = await loader.load(records, ctx);
        logger.log(
          `${name}: wrote ${report.written} of ${report.received} records in ${report.batches} batches (${report.skipped} skipped)`,
        );
        return succeeded(name, report.written, startedAt);
      } catch (err) {
        return fail(name, err, startedAt);
      }
    },
  };
}

/** Extract, transform, load. Empty extraction or empty transform output short-circuit to success. */
export function createEtlPipeline<I, O>(
  extractor: Extractor<I>,
  transformer: Transformer<I, O>,
  loader: Loader<O>,
  name = `${extractor.name}->${transformer.name}->${loader.name}`,
): Pipeline {
  return {
    name,
    async run(ctx) {
      const startedAt = Date.now();
      try {
        const extracted = await extractor.extract(ctx);
        if (extracted.length === 0) {
          logger.log(`${name}: nothing extracted for ${describeWindow(ctx.window)}`);
          return succeeded(name, 0, startedAt);
        }

        const transformed = await transformer.transform(extracted, ctx);
        if (transformed.length === 0) {
          logger.warn(`${name}: all ${extracted.length} extracted records were dropped by ${transformer.name}`);
          return succeeded(name, 0, startedAt);
        }

        const report = await loader.load(transformed, ctx);
        logger.log(
          `${name}: wrote ${report.written} of ${report.received} records in ${report.batches} batches (${report.skipped} skipped)`,
        );
        return succeeded(name, report.written, startedAt);
      } catch (err) {
        return fail(name, err, startedAt);
      }
    },
  };
}

/** Starts every stage together. Succeeds when at least one of them does. */
export function createParallelPipeline(pipelines: Pipeline[], name = 'parallel'): Pipeline {
  requireStages(name, pipelines);

  return {
    name,
    async run(ctx) {
      const startedAt = Date.now();
      const outcomes = await Promise.all(pipelines.map((pipeline) => settle(pipeline, ctx)));
      const failures = outcomes.filter((outcome): outcome is FailedOutcome => !outcome.ok);

      if (failures.length === outcomes.length) {
        return summarizeFailures(name, failures, outcomes.length, startedAt);
      }
      if (failures.length > 0) {
        logger.warn(`${name}: ${failures.length} of ${outcomes.length} stages failed`);
      }

      const records = outcomes.reduce((sum, outcome) => sum + (outcome.ok ? outcome.records : 0), 0);
      return succeeded(name, records, startedAt);
    },
  };
}

/** Runs stages one after another without stopping early. Succeeds only when all of them do. */
export function createSequentialPipeline(pipelines: Pipeline[], name = 'sequential'): Pipeline {
  requireStages(name, pipelines);

  return {
    name,
    async run(ctx) {
      const startedAt = Date.now();
      const failures: FailedOutcome[] = [];
      let records = 0;

      for (const pipeline of pipelines) {
        const outcome = await settle(pipeline, ctx);
        if (outcome.ok) {
          records += outcome.records;
        } else {
          failures.push(outcome);
        }
      }

      if (failures.length > 0) {
        return summarizeFailures(name, failures, pipelines.length, startedAt);
      }
      return succeeded(name, records, startedAt);
    },
  };
}

export type Predicate = (ctx: RunContext) => boolean | Promise<boolean>;

/** Runs one branch depending on the predicate. A missing false branch is a no-op success. */
export function createConditionalPipeline(
  predicate: Predicate,
  whenTrue: Pipeline,
  whenFalse?: Pipeline,
  name = `if(${whenTrue.name})`,
): Pipeline {
  return {
    name,
    async run(ctx) {
      const startedAt = Date.now();
      let branch: Pipeline | undefined;
      try {
        branch = (await predicate(ctx)) ? whenTrue : whenFalse;
      } catch (err) {
        return fail(name, err, startedAt);
      }

      if (!branch) {
        logger.debug(`${name}: predicate false and no alternative branch`);
        return succeeded(name, 0, startedAt);
      }
      return settle(branch, ctx);
    },
  };
}

export interface RetryPipelineOptions {
  /** Additional attempts after the first one. */
  maxRetries: number;
  delayMs?: number;
  /** `fixed` waits `delayMs` every time, `exponential` waits `delayMs * 2^attempt`. */
  backoff?: 'fixed' | 'exponential';
}

/** Re-runs a failing stage up to `maxRetries` more times. */
export function createRetryPipeline(
  pipeline: Pipeline,
  options: RetryPipelineOptions,
  name = `retry(${pipeline.name})`,
): Pipeline {
  const { maxRetries, delayMs = 0, backoff = 'fixed' } = options;
  if (!Number.isInteger(maxRetries) || maxRetries < 0) {
    throw new ConfigurationError(`${name}: maxRetries must be a non-negative integer`, {
      pipeline: name,
    });
  }
  const maxAttempts = maxRetries + 1;

  return {
    name,
    async run(ctx) {
      const startedAt = Date.now();
      let last: FailedOutcome | undefined;

      for (let attempt = 0; attempt < maxAttempts; attempt++) {
        const outcome = await settle(pipeline, ctx);
        if (outcome.ok) {
          if (attempt > 0) {
            logger.log(`${name}: succeeded on attempt ${attempt + 1}/${maxAttempts}`);
          }
          return { ...outcome, stage: name, elapsedMs: Date.now() - startedAt };
        }
        last = outcome;

        if (attempt + 1 >= maxAttempts) break;
        if (ctx.signal.aborted) {
          logger.warn(`${name}: run aborted, not retrying`);
          break;
        }

        const waitMs = backoff === 'exponential' ? delayMs * Math.pow(2, attempt) : delayMs;
        logger.warn(
          `${name}: attempt ${attempt + 1}/${maxAttempts} failed (${outcome.message}), retrying in ${waitMs}ms`,
        );
        if (waitMs > 0) {
          await sleep(waitMs);
        }
      }

      const outcome: FailedOutcome = {
        ok: false,
        stage: name,
        kind: last ? last.kind : 'unexpected',
        message: last ? last.message : 'no attempt was made',
        elapsedMs: Date.now() - startedAt,
      };
      logger.error(`${name} gave up after ${outcome.elapsedMs}ms: ${outcome.message}`);
      return outcome;
    },
  };
}
