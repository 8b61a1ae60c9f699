import assert from 'node:assert/strict';
import { test } from 'node:test';
import { EmbeddingBatcher } from '../../ingest/embeddingBatcher.js';
import { ValidationError } from '../../ingest/errors.js';
import type { VectorMetadata } from '../../ingest/types.js';
import { SearchError } from '../../search/errors.js';
import { SearchEngine, centroid } from '../../search/searchEngine.js';
import {
  FakeEmbeddingProvider,
  noSleep,
} from '../support/fakeEmbeddingProvider.js';
import { InMemoryVectorStore } from '../support/inMemoryVectorStore.js';

const QUERY_VECTOR = [1, 0];

const metadata = (
  documentId: string,
  sequenceIndex = 0,
  fileType = 'txt',
): VectorMetadata => ({
  documentId,
  sourceFile: documentId,
  fileType,
  sequenceIndex,
  startOffset: sequenceIndex * 100,
  endOffset: sequenceIndex * 100 + 120,
  fingerprint: `${documentId}#${sequenceIndex}`,
  indexedAtMs: 0,
});

function setup(options: { embedTimeoutMs?: number; vectorTimeoutMs?: number } = {}) {
  let clock = 1_000;
  const provider = new FakeEmbeddingProvider().setVector('budget report', QUERY_VECTOR);
  const vectorStore = new InMemoryVectorStore();
  const engine = new SearchEngine({
    batcher: new EmbeddingBatcher(provider, {
      timeoutMs: options.embedTimeoutMs ?? 1000,
      sleep: noSleep,
      random: () => 0,
    }),
    vectorStore,
    defaults: { limit: 10, scoreThreshold: 0.3 },
    vectorStoreTimeoutMs: options.vectorTimeoutMs ?? 1000,
    now: () => clock,
  });
  const advance = (ms: number) => {
    clock += ms;
  };
  return { provider, vectorStore, engine, advance };
}

test('drops results below the threshold and orders by score', async () => {
  const { vectorStore, engine } = setup();
  await vectorStore.upsert('far', [0, 1], 'unrelated', metadata('far.txt'));
  await vectorStore.upsert('mid', [3, 4], 'somewhat', metadata('mid.txt'));
  await vectorStore.upsert('near', [2, 0], 'exact', metadata('near.txt'));

  const results = await engine.search('budget report', { rerank: false });
  assert.deepEqual(
    results.map((r) => r.vectorStoreId),
    ['near', 'mid'],
  );
  assert.equal(results[0].score, 1);
  assert.equal(results[1].sourceFile, 'mid.txt');
  assert.deepEqual(results[1].metadata, {
    documentId: 'mid.txt',
    sequenceIndex: 0,
    fileType: 'txt',
    startOffset: 0,
    endOffset: 120,
  });
});

test('never returns more than limit and asks the store for up to three times as many', async () => {
  const { vectorStore, engine } = setup();
  for (let i = 0; i < 8; i += 1) {
    await vectorStore.upsert(`v${i}`, [1, i / 10], `chunk ${i}`, metadata(`d${i}.txt`));
  }

  const results = await engine.search('budget report', { limit: 2, rerank: false });
  assert.deepEqual(
    results.map((r) => r.vectorStoreId),
    ['v0', 'v1'],
  );
  assert.ok(results[0].score >= results[1].score);

  await engine.search('budget report', { limit: 50, rerank: false });
  await engine.search('budget report', { limit: 100, rerank: false });
  assert.deepEqual(
    vectorStore.searchCalls.map((call) => call.topK),
    [6, 100, 100],
  );
});

test('equal scores fall back to document and sequence order', async () => {
  const { vectorStore, engine } = setup();
  await vectorStore.upsert('z1', [1, 0], 'x', metadata('b.txt', 1));
  await vectorStore.upsert('z0', [1, 0], 'x', metadata('b.txt', 0));
  await vectorStore.upsert('z2', [1, 0], 'x', metadata('a.txt', 4));

  const results = await engine.search('budget report', { rerank: false });
  assert.deepEqual(
    results.map((r) => r.vectorStoreId),
    ['z2', 'z0', 'z1'],
  );
});

test('file type filters reach the store and the results', async () => {
  const { vectorStore, engine } = setup();
  await vectorStore.upsert('md', [1, 0], 'x', metadata('a.md', 0, 'md'));
  await vectorStore.upsert('txt', [1, 0], 'x', metadata('b.txt', 0, 'txt'));

  const results = await engine.search('budget report', {
    fileTypes: ['.MD'],
    rerank: false,
  });
  assert.deepEqual(
    results.map((r) => r.vectorStoreId),
    ['md'],
  );
  assert.deepEqual(vectorStore.searchCalls[0]?.filter, { fileTypes: ['md'] });
});

test('an empty query is rejected before any embedding call', async () => {
  const { provider, engine } = setup();
  await assert.rejects(engine.search('   '), (err) => {
    assert.ok(err instanceof ValidationError);
    assert.deepEqual(err.details, ['query: must not be empty']);
    return true;
  });
  assert.equal(provider.calls.length, 0);
});

test('an embedding timeout on every attempt raises SearchError, not []', async () => {
  const { provider, engine } = setup({ embedTimeoutMs: 10 });
  provider.script(() => new Promise<number[][]>(() => undefined));

  await assert.rejects(engine.search('budget report'), (err) => {
    assert.ok(err instanceof SearchError);
    assert.equal(err.kind, 'EMBEDDING');
    return true;
  });
  assert.equal(provider.calls.length, 3);
});

test('vector store failures raise SearchError with the store kind', async () => {
  const { vectorStore, engine } = setup({ vectorTimeoutMs: 10 });
  vectorStore.searchError = new Error('connection reset');
  await assert.rejects(
    engine.search('budget report'),
    (err) => err instanceof SearchError && err.kind === 'VECTOR_STORE',
  );

  vectorStore.searchError = null;
  vectorStore.hangSearch = true;
  await assert.rejects(
    engine.search('budget report'),
    (err) => err instanceof SearchError && err.kind === 'VECTOR_STORE',
  );
});

test('repeated unfiltered queries are served from the cache until it expires', async () => {
  const { provider, vectorStore, engine, advance } = setup();
  await vectorStore.upsert('near', [1, 0], 'exact', metadata('near.txt'));

  const first = await engine.search('budget report');
  const second = await engine.search('budget report');
  assert.deepEqual(second, first);
  assert.equal(provider.calls.length, 1);
  assert.equal(engine.cacheSize, 1);

  advance(300_000);
  await engine.search('budget report');
  assert.equal(provider.calls.length, 2);

  engine.clearCache();
  assert.equal(engine.cacheSize, 0);
  await engine.search('budget report');
  assert.equal(provider.calls.length, 3);
});

test('filtered queries bypass the cache', async () => {
  const { provider, engine } = setup();
  await engine.search('budget report', { fileTypes: ['txt'] });
  await engine.search('budget report', { fileTypes: ['txt'] });
  assert.equal(provider.calls.length, 2);
  assert.equal(engine.cacheSize, 0);
});

test('reranking re-applies the threshold to the final score', async () => {
  const { vectorStore, engine } = setup();
  // cosine 0.32; fewer than ten words, so the score drops to 0.288
  await vectorStore.upsert('weak', [0.32, Math.sqrt(1 - 0.32 ** 2)], 'tiny text', metadata('w.txt'));

  assert.equal((await engine.search('budget report', { rerank: false })).length, 1);
  assert.deepEqual(await engine.search('budget report', { rerank: true }), []);
});

test('similarTo keeps the best chunk per other document around the centroid', async () => {
  const { vectorStore, engine } = setup();
  await vectorStore.upsert('x#0', [1, 1], 'x first', metadata('x.txt', 0));
  await vectorStore.upsert('x#1', [1, 0], 'x second', metadata('x.txt', 1));
  await vectorStore.upsert('y#0', [1, 0.2], 'y first', metadata('y.txt', 0));
  await vectorStore.upsert('z#0', [-1, 0], 'z first', metadata('z.txt', 0));
  await vectorStore.upsert('self#0', [1, 0], 'own', metadata('self.txt', 0));

  const results = await engine.similarTo('self.txt', [
    [1, 0],
    [0, 1],
  ]);
  assert.deepEqual(
    results.map((r) => r.vectorStoreId),
    ['x#0', 'y#0'],
  );
  assert.equal(vectorStore.searchCalls[0]?.topK, 36);

  await assert.rejects(
    engine.similarTo('self.txt', [[1, 0]], { limit: 0 }),
    ValidationError,
  );
});

test('centroid averages vectors of the leading dimension', () => {
  assert.equal(centroid([]), null);
  assert.deepEqual(centroid([[1, 2], [3, 4], [9]]), [2, 3]);
});
