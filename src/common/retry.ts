export type RetryDecision =
  | boolean
  | {
      retry: boolean;
      delayMs?: number;
    };

export interface RetryOptions {
  /** Extra attempts after the first one: 3 means up to 4 tries. */
  retries: number;
  minDelayMs: number;
  maxDelayMs: number;
  shouldRetry: (err: unknown) => RetryDecision;
  onRetry?: (ctx: {
    attempt: number;
    maxAttempts: number;
    delayMs: number;
    error: unknown;
  }) => void;
  onGiveUp?: (ctx: { attempt: number; maxAttempts: number; error: unknown }) => void;
  randomFn?: () => number;
  jitterRatio?: number;
  signal?: AbortSignal;
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Runs `fn` until it resolves or the retry budget is spent.
 * Delay doubles from `minDelayMs` up to `maxDelayMs`, plus jitter.
 */
export async function retry<T>(
  fn: () => Promise<T>,
  opts: RetryOptions,
): Promise<T> {
  const {
    retries,
    minDelayMs,
    maxDelayMs,
    shouldRetry,
    onRetry,
    onGiveUp,
    randomFn = Math.random,
    jitterRatio = 0.2,
    signal,
  } = opts;

  const maxAttempts = retries + 1;
  let attempt = 0;

  for (;;) {
    try {
      return await fn();
    } catch (err) {
      const decision = shouldRetry(err);
      const normalized =
        typeof decision === 'boolean' ? { retry: decision, delayMs: undefined } : decision;

      if (attempt >= retries || !normalized.retry || signal?.aborted) {
        onGiveUp?.({ attempt: attempt + 1, maxAttempts, error: err });
        throw err;
      }

      const customDelayMs =
        typeof normalized.delayMs === 'number' &&
        Number.isFinite(normalized.delayMs) &&
        normalized.delayMs >= 0
          ? normalized.delayMs
          : undefined;
      const backoff =
        customDelayMs !== undefined
          ? Math.min(maxDelayMs, customDelayMs)
          : Math.min(maxDelayMs, minDelayMs * Math.pow(2, attempt));
      const ratio = Math.min(1, Math.max(0, jitterRatio));
      const random = Math.min(1, Math.max(0, randomFn()));
      const waitMs = backoff + Math.floor(backoff * ratio * random);

      onRetry?.({ attempt: attempt + 1, maxAttempts, delayMs: waitMs, error: err });
      await sleep(waitMs);
      attempt += 1;
    }
  }
}
