export class AbortError extends Error {
  constructor(message = 'aborted') {
    super(message);
    this.name = 'AbortError';
  }
}

export type BackoffPolicy = {
  maxAttempts: number;
  baseDelayMs: number;
  factor: number;
  maxDelayMs: number;
  /** Fraction of the capped delay added on top as random jitter. */
  jitterRatio: number;
};

export const DEFAULT_BACKOFF: BackoffPolicy = {
  maxAttempts: 3,
  baseDelayMs: 200,
  factor: 2,
  maxDelayMs: 5_000,
  jitterRatio: 0.2,
};

export function backoffDelay(
  policy: BackoffPolicy,
  attempt: number,
  random: () => number = Math.random,
): number {
  const exponential = policy.baseDelayMs * policy.factor ** (attempt - 1);
  const capped = Math.min(policy.maxDelayMs, exponential);
  return Math.round(capped + capped * policy.jitterRatio * random());
}

export const delayWithAbort = (ms: number, signal?: AbortSignal) =>
  new Promise<void>((resolve, reject) => {
    if (signal?.aborted) return reject(new AbortError());
    const timer = setTimeout(resolve, ms);
    signal?.addEventListener(
      'abort',
      () => {
        clearTimeout(timer);
        reject(new AbortError());
      },
      { once: true },
    );
  });

export type RunWithRetryParams<T> = {
  runStep: (attempt: number) => Promise<T>;
  isRetryableError: (err: unknown) => boolean;
  policy?: BackoffPolicy;
  signal?: AbortSignal;
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
  random?: () => number;
  onRetry?: (params: {
    attempt: number;
    maxAttempts: number;
    error: unknown;
    delayMs: number;
  }) => void;
  onExhausted?: (params: {
    attempt: number;
    maxAttempts: number;
    error: unknown;
  }) => void;
};

export async function runWithRetry<T>(params: RunWithRetryParams<T>) {
  const policy = params.policy ?? DEFAULT_BACKOFF;
  const maxAttempts = Math.max(1, policy.maxAttempts);
  const sleep = params.sleep ?? delayWithAbort;

  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    if (params.signal?.aborted) {
      throw new AbortError();
    }

    try {
      return await params.runStep(attempt);
    } catch (err) {
      if (err instanceof AbortError) throw err;
      if (!params.isRetryableError(err) || attempt >= maxAttempts) {
        params.onExhausted?.({ attempt, maxAttempts, error: err });
        throw err;
      }

      const delayMs = backoffDelay(policy, attempt, params.random);
      params.onRetry?.({ attempt, maxAttempts, error: err, delayMs });
      await sleep(delayMs, params.signal);
    }
  }

  throw new Error('unreachable');
}
