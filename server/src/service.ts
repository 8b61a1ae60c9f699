import type {
  DocumentDetails,
  DocumentListResponse,
  DocumentRemoval,
  IndexStats,
  ManifestStats,
  QueryAnalysis,
  SearchResult,
} from '@docsearch/common';
import {
  EmbeddingBatcher,
  type EmbeddingBatcherOptions,
} from './ingest/embeddingBatcher.js';
import { VectorStoreError, VectorStoreTimeoutError } from './ingest/errors.js';
import { logLifecycle } from './ingest/lifecycle.js';
import type { IndexManifest } from './ingest/manifest.js';
import {
  IndexingOrchestrator,
  type IndexOptions,
} from './ingest/orchestrator.js';
import type {
  Document,
  EmbeddingProvider,
  IndexConfig,
  VectorStore,
} from './ingest/types.js';
import { analyzeQuery } from './search/queryAnalyzer.js';
import { SearchError } from './search/errors.js';
import { SearchEngine, type SearchOptions } from './search/searchEngine.js';
import { withTimeout } from './utils/timeout.js';

export type ListDocumentsOptions = {
  page: number;
  size: number;
  /** Case-insensitive substring of the document id. */
  query?: string;
};

export type DocumentIndexServiceDeps = {
  config: IndexConfig;
  manifest: IndexManifest;
  vectorStore: VectorStore;
  provider: EmbeddingProvider;
  batcher?: Partial<Omit<EmbeddingBatcherOptions, 'timeoutMs'>>;
  now?: () => Date;
};

/** The surface the HTTP layer and the job runner talk to. */
export class DocumentIndexService {
  private readonly orchestrator: IndexingOrchestrator;
  private readonly engine: SearchEngine;

  constructor(private readonly deps: DocumentIndexServiceDeps) {
    const { config } = deps;
    const batcher = new EmbeddingBatcher(deps.provider, {
      timeoutMs: config.embeddingTimeoutMs,
      ...deps.batcher,
    });
    this.orchestrator = new IndexingOrchestrator({
      manifest: deps.manifest,
      vectorStore: deps.vectorStore,
      batcher,
      config,
      sleep: deps.batcher?.sleep,
      now: deps.now,
    });
    this.engine = new SearchEngine({
      batcher,
      vectorStore: deps.vectorStore,
      defaults: {
        limit: config.defaultLimit,
        scoreThreshold: config.similarityThreshold,
      },
      vectorStoreTimeoutMs: config.vectorStoreTimeoutMs,
      now: deps.now ? () => this.nowMs() : undefined,
    });
  }

  async index(documents: Document[], options: IndexOptions = {}): Promise<IndexStats> {
    const stats = await this.orchestrator.index(documents, options);
    if (stats.chunksIndexed > 0 || stats.chunksEvicted > 0 || options.forceReindex) {
      this.engine.clearCache();
    }
    return stats;
  }

  search(query: string, options?: SearchOptions): Promise<SearchResult[]> {
    return this.engine.search(query, options);
  }

  analyze(query: string): QueryAnalysis {
    return analyzeQuery(query);
  }

  stats(): ManifestStats {
    return this.deps.manifest.stats();
  }

  listDocuments({ page, size, query }: ListDocumentsOptions): DocumentListResponse {
    const { manifest } = this.deps;
    const needle = query?.trim().toLowerCase();
    const ids = manifest
      .documentIds()
      .filter((id) => !needle || id.toLowerCase().includes(needle));
    const offset = (page - 1) * size;
    const items = ids.slice(offset, offset + size).flatMap((id) => {
      const summary = manifest.documentSummary(id);
      return summary ? [summary] : [];
    });
    return {
      items,
      total: ids.length,
      page,
      size,
      pages: Math.ceil(ids.length / size),
    };
  }

  /** Null when the document has no indexed chunks. */
  async documentDetails(
    documentId: string,
    includeChunks = false,
  ): Promise<DocumentDetails | null> {
    const { manifest, vectorStore } = this.deps;
    const summary = manifest.documentSummary(documentId);
    if (!summary) return null;

    const fingerprints = manifest.allFingerprintsFor(documentId);
    const records = (
      await this.callStore('get', () => vectorStore.get(fingerprints))
    ).sort((a, b) => a.metadata.sequenceIndex - b.metadata.sequenceIndex);
    const [first] = records;
    const details: DocumentDetails = {
      ...summary,
      sourceFile: first ? first.metadata.sourceFile : null,
      fileType: first ? first.metadata.fileType : null,
    };
    if (includeChunks) {
      details.chunks = records.map((record) => ({
        vectorStoreId: record.id,
        sequenceIndex: record.metadata.sequenceIndex,
        startOffset: record.metadata.startOffset,
        endOffset: record.metadata.endOffset,
        text: record.text,
      }));
    }
    return details;
  }

  /** Null when the document has no indexed chunks. */
  async similarDocuments(
    documentId: string,
    limit?: number,
  ): Promise<SearchResult[] | null> {
    const { manifest, vectorStore } = this.deps;
    const fingerprints = manifest.allFingerprintsFor(documentId);
    if (fingerprints.length === 0) return null;

    let vectors: number[][];
    try {
      const records = await this.callStore('get', () => vectorStore.get(fingerprints));
      vectors = records.map((record) => record.vector);
    } catch (err) {
      throw new SearchError('VECTOR_STORE', err);
    }
    return this.engine.similarTo(documentId, vectors, { limit });
  }

  /** Returns how many chunks were removed; 0 when the document is unknown. */
  async removeDocument(documentId: string): Promise<number> {
    const { removed } = await this.removeDocuments([documentId]);
    return removed[documentId] ?? 0;
  }

  /** Vector points go first, then manifest entries, in one call each. */
  async removeDocuments(documentIds: string[]): Promise<DocumentRemoval> {
    const { manifest, vectorStore } = this.deps;
    const unique = [...new Set(documentIds)];
    const notFound = unique.filter((id) => !manifest.documentSummary(id));
    const fingerprints = unique.flatMap((id) => manifest.allFingerprintsFor(id));
    if (fingerprints.length === 0) return { removed: {}, notFound };

    await this.callStore('delete', () => vectorStore.delete(fingerprints));
    const entries = await manifest.deleteFingerprints(fingerprints);
    this.engine.clearCache();

    const counts = new Map<string, number>();
    for (const entry of entries) {
      counts.set(entry.documentId, (counts.get(entry.documentId) ?? 0) + 1);
    }
    for (const [documentId, chunks] of counts) {
      logLifecycle('info', 'document removed', { documentId, chunks });
    }
    return { removed: Object.fromEntries(counts), notFound };
  }

  /** Drops every indexed document. */
  async clearIndex(): Promise<{ documentsRemoved: number; chunksRemoved: number }> {
    const { removed } = await this.removeDocuments(this.deps.manifest.documentIds());
    const counts = Object.values(removed);
    const result = {
      documentsRemoved: counts.length,
      chunksRemoved: counts.reduce((sum, n) => sum + n, 0),
    };
    logLifecycle('warn', 'index cleared', result);
    return result;
  }

  clearCache() {
    this.engine.clearCache();
  }

  async close() {
    await this.deps.manifest.close();
  }

  private async callStore<T>(
    operation: 'get' | 'delete',
    run: () => Promise<T>,
  ): Promise<T> {
    const timeoutMs = this.deps.config.vectorStoreTimeoutMs;
    try {
      return await withTimeout(
        run(),
        timeoutMs,
        () => new VectorStoreTimeoutError(operation, timeoutMs),
      );
    } catch (err) {
      if (err instanceof VectorStoreError || err instanceof VectorStoreTimeoutError) {
        throw err;
      }
      throw new VectorStoreError(operation, err);
    }
  }

  private nowMs() {
    return (this.deps.now?.() ?? new Date()).getTime();
  }
}
