export type IndexRunState =
  | 'queued'
  | 'chunking'
  | 'embedding'
  | 'completed'
  | 'cancelled'
  | 'error';

export type IndexFailure = {
  documentId: string;
  sequenceIndex: number;
  code: string;
  message: string;
};

export type IndexStats = {
  documentsProcessed: number;
  chunksProcessed: number;
  chunksIndexed: number;
  chunksSkipped: number;
  chunksFailed: number;
  chunksEvicted: number;
  cancelled: boolean;
  totalTimeSeconds: number;
  failures: IndexFailure[];
};

export type IndexRunStatus = {
  runId: string;
  state: IndexRunState;
  root?: string;
  stats?: IndexStats;
  extractionFailures?: number;
  message?: string;
  lastError?: string | null;
};

export type ManifestStats = {
  documentsIndexed: number;
  chunksIndexed: number;
  lastIndexedAt: string | null;
};

export type DocumentSummary = {
  documentId: string;
  chunkCount: number;
  lastIndexedAt: string | null;
};

export type DocumentListResponse = {
  items: DocumentSummary[];
  total: number;
  page: number;
  size: number;
  pages: number;
};

export type DocumentChunk = {
  vectorStoreId: string;
  sequenceIndex: number;
  startOffset: number;
  endOffset: number;
  text: string;
};

export type DocumentDetails = DocumentSummary & {
  sourceFile: string | null;
  fileType: string | null;
  chunks?: DocumentChunk[];
};

export type DocumentRemoval = {
  /** Chunks removed per document id. */
  removed: Record<string, number>;
  notFound: string[];
};

export type SearchResultMetadata = {
  documentId: string;
  sequenceIndex: number;
  fileType: string;
  startOffset: number;
  endOffset: number;
  originalScore?: number;
  keywordMatches?: string[];
  keywordBoost?: number;
  textLengthWords?: number;
  diversityPenalty?: boolean;
};

export type SearchResult = {
  vectorStoreId: string;
  sourceFile: string;
  text: string;
  score: number;
  metadata: SearchResultMetadata;
};

export type SearchResponse = {
  query: string;
  results: SearchResult[];
};

export type SimilarDocumentsResponse = {
  documentId: string;
  results: SearchResult[];
};

export type QueryComplexity = 'low' | 'medium' | 'high';

export type RecommendationCode =
  | 'WIDEN_QUERY'
  | 'RAISE_THRESHOLD'
  | 'SPLIT_QUERY'
  | 'LOWER_THRESHOLD';

export type Recommendation = {
  code: RecommendationCode;
  message: string;
};

export type QueryAnalysis = {
  estimatedComplexity: QueryComplexity;
  recommendations: Recommendation[];
  tokenCount: number;
  queryLength: number;
  keywords: string[];
  phrases: string[];
  rareTermRatio: number;
  language: 'uk' | 'unknown';
};
