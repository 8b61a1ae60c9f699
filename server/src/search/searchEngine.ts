import type { SearchResult } from '@docsearch/common';
import type { EmbeddingBatcher } from '../ingest/embeddingBatcher.js';
import { ValidationError, VectorStoreTimeoutError } from '../ingest/errors.js';
import { normalizeFileType } from '../ingest/orchestrator.js';
import type {
  VectorCandidate,
  VectorFilter,
  VectorStore,
} from '../ingest/types.js';
import { baseLogger } from '../logger.js';
import { withTimeout } from '../utils/timeout.js';
import { SearchError } from './errors.js';
import { compareResults, postProcessResults } from './postProcess.js';

export const MAX_LIMIT = 100;
export const MAX_CANDIDATES = 100;
export const MAX_SIMILAR = 50;
export const DEFAULT_SIMILAR_LIMIT = 10;
const CACHE_TTL_MS = 300_000;
const CACHE_MAX_ENTRIES = 100;

export type SearchOptions = {
  limit?: number;
  scoreThreshold?: number;
  fileTypes?: string[];
  rerank?: boolean;
};

export type SearchEngineDeps = {
  batcher: EmbeddingBatcher;
  vectorStore: VectorStore;
  defaults: { limit: number; scoreThreshold: number };
  vectorStoreTimeoutMs: number;
  cacheTtlMs?: number;
  cacheMaxEntries?: number;
  now?: () => number;
};

type CacheEntry = { storedAt: number; results: SearchResult[] };

/** Component-wise mean of the vectors sharing the first one's dimension. */
export function centroid(vectors: number[][]): number[] | null {
  const [first] = vectors;
  if (!first || first.length === 0) return null;
  const sum = new Array<number>(first.length).fill(0);
  let used = 0;
  for (const vector of vectors) {
    if (vector.length !== first.length) continue;
    vector.forEach((value, idx) => {
      sum[idx] += value;
    });
    used += 1;
  }
  return sum.map((value) => value / used);
}

function toResult(candidate: VectorCandidate): SearchResult {
  const { metadata } = candidate;
  return {
    vectorStoreId: candidate.id,
    sourceFile: metadata.sourceFile,
    text: candidate.text,
    score: candidate.score,
    metadata: {
      documentId: metadata.documentId,
      sequenceIndex: metadata.sequenceIndex,
      fileType: metadata.fileType,
      startOffset: metadata.startOffset,
      endOffset: metadata.endOffset,
    },
  };
}

export class SearchEngine {
  private readonly cache = new Map<string, CacheEntry>();

  constructor(private readonly deps: SearchEngineDeps) {}

  async search(query: string, options: SearchOptions = {}): Promise<SearchResult[]> {
    const trimmed = query.trim();
    const limit = options.limit ?? this.deps.defaults.limit;
    const threshold = options.scoreThreshold ?? this.deps.defaults.scoreThreshold;
    const rerank = options.rerank ?? true;
    const fileTypes = [...new Set((options.fileTypes ?? []).map(normalizeFileType))]
      .filter(Boolean)
      .sort();

    const problems: string[] = [];
    if (!trimmed) problems.push('query: must not be empty');
    if (!Number.isInteger(limit) || limit < 1 || limit > MAX_LIMIT) {
      problems.push(`limit: must be an integer between 1 and ${MAX_LIMIT}`);
    }
    if (!Number.isFinite(threshold) || threshold < 0 || threshold > 1) {
      problems.push('scoreThreshold: must be between 0 and 1');
    }
    if (problems.length > 0) throw new ValidationError(problems);

    const cacheKey =
      fileTypes.length === 0
        ? JSON.stringify([trimmed, limit, threshold, rerank])
        : null;
    if (cacheKey) {
      const hit = this.readCache(cacheKey);
      if (hit) return hit;
    }

    const embedded = await this.deps.batcher.embedOne(trimmed);
    if (!embedded.ok) {
      throw new SearchError('EMBEDDING', embedded.error);
    }

    const topK = Math.max(limit, Math.min(limit * 3, MAX_CANDIDATES));
    const candidates = await this.queryStore(
      embedded.vector,
      topK,
      fileTypes.length ? { fileTypes } : undefined,
    );

    const allowed = fileTypes.length ? new Set(fileTypes) : null;
    let results = candidates
      .map(toResult)
      .filter((result) => result.score >= threshold)
      .filter(
        (result) =>
          !allowed || allowed.has(normalizeFileType(result.metadata.fileType)),
      );

    if (rerank) {
      results = postProcessResults(results, trimmed).filter(
        (result) => result.score >= threshold,
      );
    }
    results = results.sort(compareResults).slice(0, limit);

    baseLogger.debug(
      { candidates: candidates.length, returned: results.length, topK },
      'search complete',
    );
    if (cacheKey) this.writeCache(cacheKey, results);
    return results;
  }

  /**
   * Documents closest to the centroid of `vectors`, best chunk per document,
   * with `documentId` itself left out. Results are never cached.
   */
  async similarTo(
    documentId: string,
    vectors: number[][],
    options: { limit?: number } = {},
  ): Promise<SearchResult[]> {
    const limit = options.limit ?? DEFAULT_SIMILAR_LIMIT;
    if (!Number.isInteger(limit) || limit < 1 || limit > MAX_SIMILAR) {
      throw new ValidationError([
        `limit: must be an integer between 1 and ${MAX_SIMILAR}`,
      ]);
    }
    const target = centroid(vectors);
    if (!target) return [];

    const threshold = this.deps.defaults.scoreThreshold;
    const topK = Math.min(MAX_CANDIDATES, (limit + vectors.length) * 3);
    const candidates = await this.queryStore(target, topK);

    const best = new Map<string, SearchResult>();
    for (const result of candidates.map(toResult)) {
      const owner = result.metadata.documentId;
      if (owner === documentId || result.score < threshold) continue;
      const current = best.get(owner);
      if (!current || compareResults(result, current) < 0) best.set(owner, result);
    }
    const results = [...best.values()].sort(compareResults).slice(0, limit);
    baseLogger.debug(
      { documentId, candidates: candidates.length, returned: results.length },
      'similar documents complete',
    );
    return results;
  }

  clearCache() {
    this.cache.clear();
  }

  get cacheSize() {
    return this.cache.size;
  }

  private async queryStore(
    vector: number[],
    topK: number,
    filter?: VectorFilter,
  ): Promise<VectorCandidate[]> {
    const timeoutMs = this.deps.vectorStoreTimeoutMs;
    try {
      return await withTimeout(
        this.deps.vectorStore.search(vector, topK, filter),
        timeoutMs,
        () => new VectorStoreTimeoutError('search', timeoutMs),
      );
    } catch (err) {
      throw new SearchError('VECTOR_STORE', err);
    }
  }

  private now() {
    return this.deps.now?.() ?? Date.now();
  }

  private readCache(key: string): SearchResult[] | null {
    const entry = this.cache.get(key);
    if (!entry) return null;
    if (this.now() - entry.storedAt >= (this.deps.cacheTtlMs ?? CACHE_TTL_MS)) {
      this.cache.delete(key);
      return null;
    }
    return entry.results.map((result) => ({ ...result, metadata: { ...result.metadata } }));
  }

  private writeCache(key: string, results: SearchResult[]) {
    const max = this.deps.cacheMaxEntries ?? CACHE_MAX_ENTRIES;
    this.cache.delete(key);
    while (this.cache.size >= max) {
      const oldest = this.cache.keys().next();
      if (oldest.done) break;
      this.cache.delete(oldest.value);
    }
    this.cache.set(key, { storedAt: this.now(), results });
  }
}
