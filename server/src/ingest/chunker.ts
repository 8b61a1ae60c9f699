import { ChunkingConfigError } from './errors.js';
import { fingerprint } from './hashing.js';
import type { Chunk, ChunkingOptions, Document } from './types.js';

export const DEFAULT_LOOKBACK = 200;

export type ChunkSpan = { start: number; end: number };

function validate(options: ChunkingOptions) {
  const { maxSize, overlap, lookback } = options;
  if (!Number.isInteger(maxSize) || maxSize <= 0) {
    throw new ChunkingConfigError(`maxSize must be a positive integer`);
  }
  if (!Number.isInteger(overlap) || overlap <= 0) {
    throw new ChunkingConfigError(`overlap must be a positive integer`);
  }
  if (overlap >= maxSize) {
    throw new ChunkingConfigError(
      `overlap (${overlap}) must be smaller than maxSize (${maxSize})`,
    );
  }
  if (lookback !== undefined && (!Number.isInteger(lookback) || lookback < 0)) {
    throw new ChunkingConfigError(`lookback must be a non-negative integer`);
  }
}

function lastMatchEnd(window: string, pattern: RegExp): number {
  let end = -1;
  for (const match of window.matchAll(pattern)) {
    end = (match.index ?? 0) + match[0].length;
  }
  return end;
}

/**
 * Returns the exclusive end of the best split point inside [from, to), or
 * `to` when the window holds no boundary at all.
 */
function findBoundary(text: string, from: number, to: number): number {
  if (to <= from) return to;
  const window = text.slice(from, to);

  const paragraph = window.lastIndexOf('\n\n');
  if (paragraph !== -1) return from + paragraph + 2;

  const sentence = lastMatchEnd(window, /[.!?]\s/g);
  if (sentence !== -1) return from + sentence;

  const space = lastMatchEnd(window, /\s/g);
  if (space !== -1) return from + space;

  return to;
}

/** True when a cut at `index` would separate a surrogate pair. */
function splitsPair(text: string, index: number): boolean {
  if (index <= 0 || index >= text.length) return false;
  const before = text.charCodeAt(index - 1);
  const after = text.charCodeAt(index);
  return before >= 0xd800 && before <= 0xdbff && after >= 0xdc00 && after <= 0xdfff;
}

export function splitIntoSpans(
  text: string,
  options: ChunkingOptions,
): ChunkSpan[] {
  validate(options);
  if (!text.trim()) return [];

  const { maxSize, overlap } = options;
  // every chunk must end past the next chunk's start
  const lookback = Math.min(
    options.lookback ?? DEFAULT_LOOKBACK,
    maxSize - overlap - 1,
  );

  const spans: ChunkSpan[] = [];
  let start = 0;
  while (start < text.length) {
    const hardEnd = start + maxSize;
    if (hardEnd >= text.length) {
      spans.push({ start, end: text.length });
      break;
    }
    let end = findBoundary(text, hardEnd - lookback, hardEnd);
    if (splitsPair(text, end) && end - 1 > start) end -= 1;
    spans.push({ start, end });
    let next = Math.max(end - overlap, start + 1);
    if (splitsPair(text, next)) next += 1;
    start = next;
  }
  return spans;
}

export function chunkDocument(
  document: Document,
  options: ChunkingOptions,
): Chunk[] {
  return splitIntoSpans(document.rawText, options).map((span, idx) => {
    const text = document.rawText.slice(span.start, span.end);
    return {
      documentId: document.id,
      sequenceIndex: idx,
      text,
      startOffset: span.start,
      endOffset: span.end,
      fingerprint: fingerprint(text),
    };
  });
}
