export type PipelineErrorKind =
  | 'configuration'
  | 'extraction'
  | 'transformation'
  | 'loading';

export type ErrorDetails = Record<string, string | number | boolean | null>;

/**
 * Base class for every error raised by pipeline stages.
 * Combinators turn these into failed stage outcomes instead of letting them escape.
 */
export abstract class PipelineError extends Error {
  abstract readonly kind: PipelineErrorKind;
  readonly details: ErrorDetails;

  constructor(message: string, details: ErrorDetails = {}, cause?: unknown) {
    super(message, { cause });
    this.name = new.target.name;
    this.details = details;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/** Invalid job definition, window or environment. */
export class ConfigurationError extends PipelineError {
  readonly kind = 'configuration';
}

export class ExtractionError extends PipelineError {
  readonly kind = 'extraction';
}

export class TransformationError extends PipelineError {
  readonly kind = 'transformation';
}

export class LoadingError extends PipelineError {
  readonly kind = 'loading';
}

export interface StageError {
  kind: PipelineErrorKind | 'timeout' | 'unexpected';
  message: string;
}

export function toErrorMessage(reason: unknown): string {
  if (reason instanceof Error) return reason.message;
  return String(reason);
}

export function toStageError(reason: unknown): StageError {
  if (reason instanceof PipelineError) {
    return { kind: reason.kind, message: reason.message };
  }
  return { kind: 'unexpected', message: toErrorMessage(reason) };
}
