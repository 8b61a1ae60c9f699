import type { IndexFailure, IndexStats } from '@docsearch/common';
import { runWithRetry, type BackoffPolicy } from '../utils/retry.js';
import { withTimeout } from '../utils/timeout.js';
import { chunkDocument } from './chunker.js';
import { buildDeltaPlan } from './deltaPlan.js';
import type { EmbedOutcome, EmbeddingBatcher } from './embeddingBatcher.js';
import {
  VectorStoreError,
  VectorStoreTimeoutError,
  errorCode,
  errorMessage,
} from './errors.js';
import { logLifecycle } from './lifecycle.js';
import type { IndexManifest } from './manifest.js';
import type {
  Chunk,
  Document,
  EmbeddingRecord,
  IndexConfig,
  VectorStore,
} from './types.js';

export const MAX_REPORTED_FAILURES = 50;

export type IndexStage = 'chunking' | 'embedding';

export type IndexOptions = {
  forceReindex?: boolean;
  fileTypesFilter?: Iterable<string>;
  signal?: AbortSignal;
  runId?: string;
  onStage?: (stage: IndexStage) => void;
};

export type OrchestratorConfig = Pick<
  IndexConfig,
  | 'maxChunkSize'
  | 'chunkOverlap'
  | 'chunkLookback'
  | 'embeddingBatchSize'
  | 'maxWorkers'
  | 'vectorStoreTimeoutMs'
>;

export type OrchestratorDeps = {
  manifest: IndexManifest;
  vectorStore: VectorStore;
  batcher: EmbeddingBatcher;
  config: OrchestratorConfig;
  storePolicy?: BackoffPolicy;
  sleep?: (ms: number) => Promise<void>;
  now?: () => Date;
};

export function normalizeFileType(value: string) {
  return value.trim().replace(/^\./, '').toLowerCase();
}

function emptyStats(): IndexStats {
  return {
    documentsProcessed: 0,
    chunksProcessed: 0,
    chunksIndexed: 0,
    chunksSkipped: 0,
    chunksFailed: 0,
    chunksEvicted: 0,
    cancelled: false,
    totalTimeSeconds: 0,
    failures: [],
  };
}

export class IndexingOrchestrator {
  constructor(private readonly deps: OrchestratorDeps) {}

  async index(documents: Document[], options: IndexOptions = {}): Promise<IndexStats> {
    const startedAt = Date.now();
    const { manifest, config } = this.deps;
    const stats = emptyStats();
    const runId = options.runId;
    const filter = options.fileTypesFilter
      ? new Set([...options.fileTypesFilter].map(normalizeFileType))
      : null;
    const selected = filter?.size
      ? documents.filter((doc) => filter.has(normalizeFileType(doc.fileType)))
      : documents;

    logLifecycle('info', 'index run start', {
      runId,
      documents: selected.length,
      force: Boolean(options.forceReindex),
    });
    options.onStage?.('chunking');

    const byId = new Map(selected.map((doc) => [doc.id, doc]));
    const chunked = selected.map((doc) => ({
      doc,
      chunks: chunkDocument(doc, {
        maxSize: config.maxChunkSize,
        overlap: config.chunkOverlap,
        lookback: config.chunkLookback,
      }),
    }));
    const currentFingerprints = new Set(
      chunked.flatMap(({ chunks }) => chunks.map((c) => c.fingerprint)),
    );

    const recordFailure = (chunk: Chunk, err: unknown) => {
      stats.chunksFailed += 1;
      if (stats.failures.length < MAX_REPORTED_FAILURES) {
        const failure: IndexFailure = {
          documentId: chunk.documentId,
          sequenceIndex: chunk.sequenceIndex,
          code: errorCode(err),
          message: errorMessage(err),
        };
        stats.failures.push(failure);
      }
    };

    const pending: Chunk[] = [];
    const stale = new Set<string>();
    for (const { doc, chunks } of chunked) {
      const previous = manifest.allFingerprintsFor(doc.id);
      if (options.forceReindex) {
        try {
          await manifest.deleteByDocument(doc.id);
        } catch (err) {
          stats.documentsProcessed += 1;
          chunks.forEach((chunk) => recordFailure(chunk, err));
          logLifecycle('error', 'forced manifest reset failed', {
            runId,
            documentId: doc.id,
            code: errorCode(err),
            error: errorMessage(err),
          });
          continue;
        }
      }
      const plan = buildDeltaPlan({
        previous,
        chunks,
        isIndexed: (fp) => manifest.lookup(fp) !== undefined,
        force: options.forceReindex,
        retained: currentFingerprints,
      });
      stats.documentsProcessed += 1;
      stats.chunksSkipped += plan.unchanged.length;
      pending.push(...plan.pending);
      plan.stale.forEach((fp) => stale.add(fp));
    }

    // One embedding per distinct fingerprint; duplicates reuse it.
    const groups = new Map<string, Chunk[]>();
    for (const chunk of pending) {
      const group = groups.get(chunk.fingerprint);
      if (group) group.push(chunk);
      else groups.set(chunk.fingerprint, [chunk]);
    }
    const leaders = [...groups.values()].map((group) => group[0]);
    const cache = new Map<string, EmbeddingRecord>();

    options.onStage?.('embedding');
    const outcomes = await this.deps.batcher.embed(
      leaders.map((chunk) => chunk.text),
      {
        batchSize: config.embeddingBatchSize,
        maxConcurrency: config.maxWorkers,
        signal: options.signal,
        onBatch: (startIndex, batch) =>
          this.storeBatch(startIndex, batch, {
            leaders,
            groups,
            cache,
            byId,
            stats,
            recordFailure,
          }),
      },
    );
    cache.clear();

    const cancelled = outcomes.some(
      (outcome) => !outcome.ok && outcome.error.code === 'CANCELLED',
    );
    stats.cancelled = cancelled || Boolean(options.signal?.aborted);

    if (!stats.cancelled && stale.size > 0) {
      stats.chunksEvicted = await this.evict([...stale], runId);
    }

    stats.chunksProcessed =
      stats.chunksIndexed + stats.chunksSkipped + stats.chunksFailed;
    stats.totalTimeSeconds =
      Math.round((Date.now() - startedAt) / 10) / 100;

    logLifecycle(stats.chunksFailed > 0 ? 'warn' : 'info', 'index run end', {
      runId,
      documentsProcessed: stats.documentsProcessed,
      chunksIndexed: stats.chunksIndexed,
      chunksSkipped: stats.chunksSkipped,
      chunksFailed: stats.chunksFailed,
      chunksEvicted: stats.chunksEvicted,
      cancelled: stats.cancelled,
      totalTimeSeconds: stats.totalTimeSeconds,
    });
    return stats;
  }

  private async storeBatch(
    startIndex: number,
    batch: EmbedOutcome[],
    run: {
      leaders: Chunk[];
      groups: Map<string, Chunk[]>;
      cache: Map<string, EmbeddingRecord>;
      byId: Map<string, Document>;
      stats: IndexStats;
      recordFailure: (chunk: Chunk, err: unknown) => void;
    },
  ) {
    await Promise.all(
      batch.map(async (outcome, offset) => {
        const leader = run.leaders[startIndex + offset];
        const group = run.groups.get(leader.fingerprint) ?? [leader];
        if (!outcome.ok) {
          group.forEach((chunk) => run.recordFailure(chunk, outcome.error));
          return;
        }
        run.cache.set(leader.fingerprint, {
          fingerprint: leader.fingerprint,
          vector: outcome.vector,
          dimension: outcome.vector.length,
        });
        for (const chunk of group) {
          const record = run.cache.get(chunk.fingerprint);
          const doc = run.byId.get(chunk.documentId);
          if (!record || !doc) continue;
          try {
            await this.storeChunk(chunk, doc, record);
            run.stats.chunksIndexed += 1;
          } catch (err) {
            run.recordFailure(chunk, err);
          }
        }
      }),
    );
  }

  /** Vector write then manifest write, both under the fingerprint lock. */
  private storeChunk(chunk: Chunk, doc: Document, record: EmbeddingRecord) {
    const { manifest, vectorStore, config } = this.deps;
    const indexedAt = this.deps.now?.() ?? new Date();
    const timeoutMs = config.vectorStoreTimeoutMs;

    return manifest.withFingerprintLock(chunk.fingerprint, async (writer) => {
      try {
        await runWithRetry({
          runStep: () =>
            withTimeout(
              vectorStore.upsert(chunk.fingerprint, record.vector, chunk.text, {
                documentId: chunk.documentId,
                sourceFile: doc.sourcePath,
                fileType: normalizeFileType(doc.fileType),
                sequenceIndex: chunk.sequenceIndex,
                startOffset: chunk.startOffset,
                endOffset: chunk.endOffset,
                fingerprint: chunk.fingerprint,
                indexedAtMs: indexedAt.getTime(),
              }),
              timeoutMs,
              () => new VectorStoreTimeoutError('upsert', timeoutMs),
            ),
          isRetryableError: (err) => err instanceof VectorStoreTimeoutError,
          policy: this.deps.storePolicy,
          sleep: this.deps.sleep,
        });
      } catch (err) {
        if (err instanceof VectorStoreTimeoutError) throw err;
        throw new VectorStoreError('upsert', err);
      }

      await writer.upsert({
        documentId: chunk.documentId,
        fingerprint: chunk.fingerprint,
        indexedAt,
        vectorStoreId: chunk.fingerprint,
      });
    });
  }

  /** Removes stale vectors and their manifest entries. Failures only log. */
  private async evict(fingerprints: string[], runId?: string): Promise<number> {
    const timeoutMs = this.deps.config.vectorStoreTimeoutMs;
    try {
      await withTimeout(
        this.deps.vectorStore.delete(fingerprints),
        timeoutMs,
        () => new VectorStoreTimeoutError('delete', timeoutMs),
      );
      await this.deps.manifest.deleteFingerprints(fingerprints);
      return fingerprints.length;
    } catch (err) {
      logLifecycle('error', 'stale chunk eviction failed', {
        runId,
        count: fingerprints.length,
        code: errorCode(err),
        error: errorMessage(err),
      });
      return 0;
    }
  }
}
