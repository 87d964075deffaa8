import { StageError, toStageError } from './errors';

export type StageOutcome =
  | {
      ok: true;
      stage: string;
      /** Records written (or passed through) by the stage. */
      records: number;
      elapsedMs: number;
    }
  | {
      ok: false;
      stage: string;
      kind: StageError['kind'];
      message: string;
      elapsedMs: number;
    };

export type FailedOutcome = Extract<StageOutcome, { ok: false }>;

export function succeeded(
  stage: string,
  records: number,
  startedAt: number,
): StageOutcome {
  return { ok: true, stage, records, elapsedMs: Date.now() - startedAt };
}

export function failed(
  stage: string,
  reason: unknown,
  startedAt: number,
): FailedOutcome {
  const { kind, message } = toStageError(reason);
  return { ok: false, stage, kind, message, elapsedMs: Date.now() - startedAt };
}
