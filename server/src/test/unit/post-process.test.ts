import assert from 'node:assert/strict';
import { test } from 'node:test';
import type { SearchResult } from '@docsearch/common';
import { compareResults, postProcessResults } from '../../search/postProcess.js';

const filler = (count: number) =>
  Array.from({ length: count }, (_, i) => `w${i}`).join(' ');

function result(
  id: string,
  score: number,
  text: string,
  sourceFile = `${id}.txt`,
  sequenceIndex = 0,
): SearchResult {
  return {
    vectorStoreId: id,
    sourceFile,
    text,
    score,
    metadata: {
      documentId: sourceFile,
      sequenceIndex,
      fileType: 'txt',
      startOffset: 0,
      endOffset: text.length,
    },
  };
}

const close = (actual: number, expected: number) =>
  assert.ok(Math.abs(actual - expected) < 1e-9, `${actual} != ${expected}`);

test('keyword matches boost the score in proportion to the query', () => {
  const [boosted] = postProcessResults(
    [result('a', 0.5, `the budget for next year ${filler(10)}`)],
    'Budget report',
  );
  close(boosted.score, 0.55);
  assert.equal(boosted.metadata.originalScore, 0.5);
  assert.deepEqual(boosted.metadata.keywordMatches, ['budget']);
  close(boosted.metadata.keywordBoost ?? 0, 0.05);
  assert.equal(boosted.metadata.textLengthWords, 15);
});

test('boosted scores never exceed 1', () => {
  const [top] = postProcessResults(
    [result('a', 0.98, `budget report ${filler(20)}`)],
    'budget report',
  );
  assert.equal(top.score, 1);
  assert.equal(top.metadata.keywordBoost, 0.1);
});

test('short texts and very long texts are scaled down', () => {
  const processed = postProcessResults(
    [
      result('short', 0.5, 'just four words here'),
      result('long', 0.8, filler(600)),
      result('normal', 0.6, filler(50)),
    ],
    'unrelated',
  );
  const byId = new Map(processed.map((r) => [r.vectorStoreId, r.score]));
  close(byId.get('short') ?? 0, 0.45);
  close(byId.get('long') ?? 0, 0.76);
  assert.equal(byId.get('normal'), 0.6);
});

test('a source past its share of the list is penalized', () => {
  const text = filler(20);
  const processed = postProcessResults(
    [
      result('a1', 0.9, text, 'a.txt', 0),
      result('a2', 0.8, text, 'a.txt', 1),
      result('a3', 0.7, text, 'a.txt', 2),
      result('a4', 0.6, text, 'a.txt', 3),
      result('b1', 0.5, text, 'b.txt', 0),
      result('b2', 0.4, text, 'b.txt', 1),
    ],
    'nothing matches',
  );
  assert.deepEqual(
    processed.map((r) => [r.vectorStoreId, r.metadata.diversityPenalty ?? false]),
    [
      ['a1', false],
      ['a2', false],
      ['a3', true],
      ['a4', true],
      ['b1', false],
      ['b2', false],
    ],
  );
  close(processed[2].score, 0.56);
  close(processed[3].score, 0.48);
  const reordered = [...processed].sort(compareResults);
  assert.deepEqual(
    reordered.map((r) => r.vectorStoreId),
    ['a1', 'a2', 'a3', 'b1', 'a4', 'b2'],
  );
});

test('empty candidate lists pass through', () => {
  assert.deepEqual(postProcessResults([], 'anything'), []);
});
