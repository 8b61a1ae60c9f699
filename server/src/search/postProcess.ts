import type { SearchResult } from '@docsearch/common';

const MAX_KEYWORD_BOOST = 0.1;
const SHORT_TEXT_WORDS = 10;
const LONG_TEXT_WORDS = 500;
const DIVERSITY_FACTOR = 0.8;

function words(text: string): string[] {
  return text.split(/\s+/).filter(Boolean);
}

/** Descending score, then a stable tie-break on position in the corpus. */
export function compareResults(a: SearchResult, b: SearchResult): number {
  if (a.score !== b.score) return b.score - a.score;
  const docA = a.metadata.documentId;
  const docB = b.metadata.documentId;
  if (docA !== docB) return docA < docB ? -1 : 1;
  if (a.metadata.sequenceIndex !== b.metadata.sequenceIndex) {
    return a.metadata.sequenceIndex - b.metadata.sequenceIndex;
  }
  if (a.vectorStoreId === b.vectorStoreId) return 0;
  return a.vectorStoreId < b.vectorStoreId ? -1 : 1;
}

function boostKeywords(result: SearchResult, queryWords: Set<string>): SearchResult {
  const textWords = new Set(words(result.text.toLowerCase()));
  const matches = [...queryWords].filter((word) => textWords.has(word));
  const wordCount = words(result.text).length;
  const metadata = {
    ...result.metadata,
    originalScore: result.score,
    textLengthWords: wordCount,
  };

  let score = result.score;
  if (matches.length > 0) {
    const boost = Math.min(
      MAX_KEYWORD_BOOST,
      (matches.length / queryWords.size) * MAX_KEYWORD_BOOST,
    );
    score = Math.min(1, score + boost);
    metadata.keywordMatches = matches;
    metadata.keywordBoost = boost;
  }

  if (wordCount < SHORT_TEXT_WORDS) score *= 0.9;
  else if (wordCount > LONG_TEXT_WORDS) score *= 0.95;

  return { ...result, score, metadata };
}

/**
 * Reranks candidates: keyword overlap boost, length normalization, then a
 * penalty on sources that already fill their share of the list. The result
 * is not sorted.
 */
export function postProcessResults(
  results: SearchResult[],
  query: string,
): SearchResult[] {
  if (results.length === 0) return results;
  const queryWords = new Set(words(query.toLowerCase()));
  if (queryWords.size === 0) return results;

  const enhanced = results
    .map((result) => boostKeywords(result, queryWords))
    .sort(compareResults);

  const maxPerSource = Math.max(1, Math.floor(results.length / 3));
  const perSource = new Map<string, number>();
  return enhanced.map((result) => {
    const seen = perSource.get(result.sourceFile) ?? 0;
    if (seen < maxPerSource) {
      perSource.set(result.sourceFile, seen + 1);
      return result;
    }
    return {
      ...result,
      score: result.score * DIVERSITY_FACTOR,
      metadata: { ...result.metadata, diversityPenalty: true },
    };
  });
}
