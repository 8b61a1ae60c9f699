import type {
  DocumentListResponse,
  IndexRunStatus,
  ManifestStats,
  QueryAnalysis,
  SearchResponse,
  SimilarDocumentsResponse,
} from './indexing.js';

export type VersionInfo = {
  app: string;
  version: string;
};

export function getAppInfo(app: string, version: string): VersionInfo {
  return { app, version };
}

type HttpError = Error & { status?: number; body?: unknown };

export type SearchRequest = {
  query: string;
  limit?: number;
  scoreThreshold?: number;
  fileTypes?: string[];
  /** Keyword boost and diversity pass; the server defaults it on. */
  rerank?: boolean;
};

export type DocumentListRequest = {
  page?: number;
  size?: number;
  q?: string;
};

async function requestJson<T>(
  url: URL,
  init: RequestInit | undefined,
  label: string,
  fetchImpl: typeof fetch,
): Promise<T> {
  const res = await fetchImpl(url.toString(), init);
  if (!res.ok) {
    let parsed: unknown = null;
    try {
      parsed = await res.json();
    } catch {
      parsed = null;
    }
    const error: HttpError = new Error(`${label} failed: ${res.status}`);
    error.status = res.status;
    if (parsed) {
      error.body = parsed;
    }
    throw error;
  }
  return (await res.json()) as T;
}

function postJson(body: unknown): RequestInit {
  return {
    method: 'POST',
    headers: { 'content-type': 'application/json' },
    body: JSON.stringify(body),
  };
}

export function fetchServerVersion(
  serverBaseUrl: string,
  fetchImpl: typeof fetch = globalThis.fetch,
): Promise<VersionInfo> {
  return requestJson(
    new URL('/version', serverBaseUrl),
    undefined,
    'version',
    fetchImpl,
  );
}

export function searchDocuments(
  serverBaseUrl: string,
  request: SearchRequest,
  fetchImpl: typeof fetch = globalThis.fetch,
): Promise<SearchResponse> {
  return requestJson(
    new URL('/search', serverBaseUrl),
    postJson(request),
    'search',
    fetchImpl,
  );
}

export function analyzeQuery(
  serverBaseUrl: string,
  query: string,
  fetchImpl: typeof fetch = globalThis.fetch,
): Promise<QueryAnalysis> {
  return requestJson(
    new URL('/search/analyze', serverBaseUrl),
    postJson({ query }),
    'analyze',
    fetchImpl,
  );
}

export function fetchIndexStats(
  serverBaseUrl: string,
  fetchImpl: typeof fetch = globalThis.fetch,
): Promise<ManifestStats> {
  return requestJson(
    new URL('/stats', serverBaseUrl),
    undefined,
    'stats',
    fetchImpl,
  );
}

export function fetchIndexRunStatus(
  serverBaseUrl: string,
  runId: string,
  fetchImpl: typeof fetch = globalThis.fetch,
): Promise<IndexRunStatus> {
  return requestJson(
    new URL(`/index/status/${encodeURIComponent(runId)}`, serverBaseUrl),
    undefined,
    'index status',
    fetchImpl,
  );
}

export function listDocuments(
  serverBaseUrl: string,
  request: DocumentListRequest = {},
  fetchImpl: typeof fetch = globalThis.fetch,
): Promise<DocumentListResponse> {
  const url = new URL('/documents', serverBaseUrl);
  if (request.page !== undefined) url.searchParams.set('page', String(request.page));
  if (request.size !== undefined) url.searchParams.set('size', String(request.size));
  if (request.q) url.searchParams.set('q', request.q);
  return requestJson(url, undefined, 'documents', fetchImpl);
}

export function fetchSimilarDocuments(
  serverBaseUrl: string,
  documentId: string,
  limit?: number,
  fetchImpl: typeof fetch = globalThis.fetch,
): Promise<SimilarDocumentsResponse> {
  const url = new URL(
    `/search/similar/${encodeURIComponent(documentId)}`,
    serverBaseUrl,
  );
  if (limit !== undefined) url.searchParams.set('limit', String(limit));
  return requestJson(url, undefined, 'similar documents', fetchImpl);
}
