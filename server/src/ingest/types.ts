export type Document = {
  id: string;
  sourcePath: string;
  fileType: string;
  rawText: string;
  lastModified: Date;
};

export type Chunk = {
  documentId: string;
  sequenceIndex: number;
  text: string;
  startOffset: number;
  endOffset: number;
  fingerprint: string;
};

export type EmbeddingRecord = {
  fingerprint: string;
  vector: number[];
  dimension: number;
};

export type ManifestEntry = {
  documentId: string;
  fingerprint: string;
  indexedAt: Date;
  vectorStoreId: string;
};

export type ChunkingOptions = {
  maxSize: number;
  overlap: number;
  lookback?: number;
};

export type DiscoveredFile = { absPath: string; relPath: string; ext: string };

export type IndexConfig = {
  maxChunkSize: number;
  chunkOverlap: number;
  chunkLookback: number;
  embeddingBatchSize: number;
  maxWorkers: number;
  similarityThreshold: number;
  defaultLimit: number;
  embeddingTimeoutMs: number;
  vectorStoreTimeoutMs: number;
  embeddingModel: string;
  lmStudioBaseUrl: string;
  chromaUrl: string;
  chromaCollection: string;
  mongoUri?: string;
  includes: string[];
  excludes: string[];
  port: number;
};

/** Turns texts into vectors, one per input, in input order. */
export interface EmbeddingProvider {
  readonly id: string;
  embedBatch(texts: string[]): Promise<number[][]>;
}

export type VectorMetadata = {
  documentId: string;
  sourceFile: string;
  fileType: string;
  sequenceIndex: number;
  startOffset: number;
  endOffset: number;
  fingerprint: string;
  indexedAtMs: number;
};

export type VectorFilter = {
  fileTypes?: string[];
};

export type VectorCandidate = {
  id: string;
  score: number;
  text: string;
  metadata: VectorMetadata;
};

export type StoredVector = {
  id: string;
  vector: number[];
  text: string;
  metadata: VectorMetadata;
};

export interface VectorStore {
  upsert(
    id: string,
    vector: number[],
    text: string,
    metadata: VectorMetadata,
  ): Promise<void>;
  search(
    vector: number[],
    topK: number,
    filter?: VectorFilter,
  ): Promise<VectorCandidate[]>;
  delete(ids: string[]): Promise<void>;
  /** Stored points for `ids`; unknown ids are left out. */
  get(ids: string[]): Promise<StoredVector[]>;
}
