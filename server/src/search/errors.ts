export type SearchErrorKind = 'EMBEDDING' | 'VECTOR_STORE';

export class SearchError extends Error {
  code = 'SEARCH_FAILED' as const;
  constructor(
    public kind: SearchErrorKind,
    cause?: unknown,
  ) {
    super(
      kind === 'EMBEDDING'
        ? 'Query embedding failed'
        : 'Vector store search failed',
      { cause },
    );
    this.name = 'SearchError';
  }
}
