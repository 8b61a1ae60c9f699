import fs from 'fs';
import type {
  QueryAnalysis,
  QueryComplexity,
  Recommendation,
} from '@docsearch/common';
import { z } from 'zod';

const RARE_TERM_MIN_LENGTH = 8;
const MIN_TOKENS = 3;
const MAX_TOKENS = 10;
const MIN_QUERY_CHARS = 10;

const commonWords = new Set(
  z
    .array(z.string())
    .parse(
      JSON.parse(
        fs.readFileSync(new URL('./commonWords.json', import.meta.url), 'utf8'),
      ),
    )
    .map((word) => word.toLowerCase()),
);

export function tokenize(query: string): string[] {
  return query.toLowerCase().match(/[\p{L}\p{N}]+/gu) ?? [];
}

function quotedPhrases(query: string): string[] {
  const phrases: string[] = [];
  for (const match of query.matchAll(/["“]([^"“”]+)["”]/g)) {
    const phrase = match[1].trim();
    if (tokenize(phrase).length >= 2) phrases.push(phrase);
  }
  return phrases;
}

function isRare(token: string) {
  return token.length >= RARE_TERM_MIN_LENGTH && !commonWords.has(token);
}

function lengthPoints(tokenCount: number) {
  if (tokenCount <= 2) return 0;
  if (tokenCount <= 6) return 1;
  return 2;
}

function complexityOf(points: number): QueryComplexity {
  if (points === 0) return 'low';
  if (points <= 2) return 'medium';
  return 'high';
}

export function analyzeQuery(query: string): QueryAnalysis {
  const tokens = tokenize(query);
  const phrases = quotedPhrases(query);
  const rareCount = tokens.filter(isRare).length;
  const rareTermRatio = tokens.length
    ? Math.round((rareCount / tokens.length) * 1000) / 1000
    : 0;

  let points = lengthPoints(tokens.length);
  if (phrases.length > 0) points += 1;
  if (rareTermRatio >= 0.5) points += 1;

  const recommendations: Recommendation[] = [];
  if (tokens.length < MIN_TOKENS || query.trim().length < MIN_QUERY_CHARS) {
    recommendations.push({
      code: 'WIDEN_QUERY',
      message: 'Add more context or detail to the query',
    });
  }
  if (tokens.length < MIN_TOKENS) {
    recommendations.push({
      code: 'RAISE_THRESHOLD',
      message: 'Raise scoreThreshold for more precise results',
    });
  }
  if (tokens.length > MAX_TOKENS) {
    recommendations.push({
      code: 'SPLIT_QUERY',
      message: 'Split the query into several focused queries',
    });
  }
  if (rareTermRatio >= 0.5) {
    recommendations.push({
      code: 'LOWER_THRESHOLD',
      message: 'Lower scoreThreshold; rare terms produce weaker matches',
    });
  }

  return {
    estimatedComplexity: complexityOf(points),
    recommendations,
    tokenCount: tokens.length,
    queryLength: query.length,
    keywords: tokens,
    phrases,
    rareTermRatio,
    language: /[іїєґ]/i.test(query) ? 'uk' : 'unknown',
  };
}
