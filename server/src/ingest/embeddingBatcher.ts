import PQueue from 'p-queue';
import { baseLogger } from '../logger.js';
import { runWithRetry, type BackoffPolicy } from '../utils/retry.js';
import { withTimeout } from '../utils/timeout.js';
import {
  CancelledError,
  EmbeddingFatalError,
  EmbeddingTransientError,
  errorMessage,
  type EmbeddingError,
} from './errors.js';
import type { EmbeddingProvider } from './types.js';

export type EmbedOutcome =
  | { ok: true; vector: number[] }
  | { ok: false; error: EmbeddingError };

export type EmbedOptions = {
  batchSize: number;
  maxConcurrency: number;
  signal?: AbortSignal;
  /**
   * Called inside the worker slot once a batch settles; the slot is held
   * until the returned promise resolves.
   */
  onBatch?: (startIndex: number, outcomes: EmbedOutcome[]) => Promise<void>;
};

export type EmbeddingBatcherOptions = {
  timeoutMs: number;
  policy?: BackoffPolicy;
  sleep?: (ms: number) => Promise<void>;
  random?: () => number;
};

const TRANSIENT_MESSAGE =
  /(timed? ?out|rate.?limit|too many requests|\b429\b|\b5\d\d\b|ECONNRESET|ECONNREFUSED|ETIMEDOUT|EAI_AGAIN|socket hang up)/i;

export function isTransientEmbeddingError(err: unknown): boolean {
  if (err instanceof EmbeddingTransientError) return true;
  if (err instanceof EmbeddingFatalError || err instanceof CancelledError) {
    return false;
  }
  return TRANSIENT_MESSAGE.test(errorMessage(err));
}

function toEmbeddingError(err: unknown): EmbeddingError {
  if (
    err instanceof EmbeddingTransientError ||
    err instanceof EmbeddingFatalError ||
    err instanceof CancelledError
  ) {
    return err;
  }
  return isTransientEmbeddingError(err)
    ? new EmbeddingTransientError(errorMessage(err), err)
    : new EmbeddingFatalError(errorMessage(err), err);
}

export class EmbeddingBatcher {
  constructor(
    private readonly provider: EmbeddingProvider,
    private readonly options: EmbeddingBatcherOptions,
  ) {}

  /**
   * Embeds `items` in batches over a bounded worker pool. The result is
   * aligned with `items`; a failed or cancelled item carries its error.
   * Once `signal` aborts, batches already calling the provider finish and
   * every other batch resolves as cancelled without a provider call.
   */
  async embed(items: string[], options: EmbedOptions): Promise<EmbedOutcome[]> {
    const batchSize = Math.max(1, Math.floor(options.batchSize));
    const concurrency = Math.max(1, Math.floor(options.maxConcurrency));
    const queueBound = concurrency * 2;
    const queue = new PQueue({ concurrency });
    const results = new Array<EmbedOutcome>(items.length);
    const tasks: Promise<void>[] = [];
    const callbackErrors: unknown[] = [];
    const cancelled = new CancelledError();
    let cancelledItems = 0;

    const cancelRange = (from: number, to: number) => {
      for (let i = from; i < to; i += 1) {
        results[i] = { ok: false, error: cancelled };
      }
      cancelledItems += to - from;
    };

    for (let start = 0; start < items.length; start += batchSize) {
      if (queue.size >= queueBound) {
        await queue.onSizeLessThan(queueBound);
      }
      if (options.signal?.aborted) {
        cancelRange(start, items.length);
        break;
      }

      const texts = items.slice(start, start + batchSize);
      tasks.push(
        queue.add(async () => {
          if (options.signal?.aborted) {
            cancelRange(start, start + texts.length);
            return;
          }
          const outcomes = await this.embedBatch(texts);
          outcomes.forEach((outcome, offset) => {
            results[start + offset] = outcome;
          });
          if (!options.onBatch) return;
          try {
            await options.onBatch(start, outcomes);
          } catch (error) {
            callbackErrors.push(error);
          }
        }),
      );
    }

    await Promise.all(tasks);
    if (cancelledItems > 0) {
      baseLogger.info(
        { embedded: items.length - cancelledItems, cancelled: cancelledItems },
        'embedding stopped by cancellation',
      );
    }
    if (callbackErrors.length > 0) throw callbackErrors[0];
    return results;
  }

  async embedOne(text: string): Promise<EmbedOutcome> {
    const [outcome] = await this.embedBatch([text]);
    return outcome;
  }

  private async callProvider(texts: string[]): Promise<number[][]> {
    const { timeoutMs } = this.options;
    const vectors = await withTimeout(
      this.provider.embedBatch(texts),
      timeoutMs,
      () =>
        new EmbeddingTransientError(`Embedding call timed out after ${timeoutMs}ms`),
    );
    if (vectors.length !== texts.length) {
      throw new EmbeddingFatalError(
        `Provider returned ${vectors.length} vectors for ${texts.length} inputs`,
      );
    }
    for (const vector of vectors) {
      if (vector.length === 0 || vector.some((v) => !Number.isFinite(v))) {
        throw new EmbeddingFatalError('Provider returned an invalid vector');
      }
    }
    return vectors;
  }

  private async embedBatch(texts: string[]): Promise<EmbedOutcome[]> {
    try {
      const vectors = await runWithRetry({
        runStep: () => this.callProvider(texts),
        isRetryableError: isTransientEmbeddingError,
        policy: this.options.policy,
        sleep: this.options.sleep,
        random: this.options.random,
        onRetry: ({ attempt, maxAttempts, error, delayMs }) => {
          baseLogger.warn(
            {
              provider: this.provider.id,
              size: texts.length,
              attempt,
              maxAttempts,
              delayMs,
              error: errorMessage(error),
            },
            'embedding batch retry',
          );
        },
        onExhausted: ({ attempt, error }) => {
          baseLogger.error(
            {
              provider: this.provider.id,
              size: texts.length,
              attempt,
              error: errorMessage(error),
            },
            'embedding batch failed',
          );
        },
      });
      return vectors.map((vector) => ({ ok: true, vector }));
    } catch (err) {
      const error = toEmbeddingError(err);
      return texts.map(() => ({ ok: false, error }));
    }
  }
}
