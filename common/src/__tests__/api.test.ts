import assert from 'node:assert/strict';
import { test } from 'node:test';
import {
  analyzeQuery,
  fetchIndexStats,
  fetchSimilarDocuments,
  listDocuments,
  searchDocuments,
} from '../api.js';

type Call = { url: string; init?: RequestInit };

function fakeFetch(status: number, body: unknown, calls: Call[]) {
  const impl: typeof fetch = async (input, init) => {
    calls.push({ url: String(input), init });
    return new Response(JSON.stringify(body), {
      status,
      headers: { 'content-type': 'application/json' },
    });
  };
  return impl;
}

test('searchDocuments posts the request body to /search', async () => {
  const calls: Call[] = [];
  const payload = { query: 'budget', results: [] };
  const res = await searchDocuments(
    'http://localhost:5010',
    { query: 'budget', limit: 3 },
    fakeFetch(200, payload, calls),
  );

  assert.deepEqual(res, payload);
  assert.equal(calls.length, 1);
  assert.equal(calls[0]?.url, 'http://localhost:5010/search');
  assert.equal(calls[0]?.init?.method, 'POST');
  assert.equal(calls[0]?.init?.body, '{"query":"budget","limit":3}');
});

test('searchDocuments forwards the rerank flag', async () => {
  const calls: Call[] = [];
  await searchDocuments(
    'http://localhost:5010',
    { query: 'budget', rerank: false },
    fakeFetch(200, { query: 'budget', results: [] }, calls),
  );
  assert.equal(calls[0]?.init?.body, '{"query":"budget","rerank":false}');
});

test('listDocuments and fetchSimilarDocuments build their query strings', async () => {
  const calls: Call[] = [];
  const fetchImpl = fakeFetch(200, { items: [], results: [] }, calls);
  await listDocuments('http://localhost:5010', { page: 2, size: 5, q: 'notes' }, fetchImpl);
  await fetchSimilarDocuments('http://localhost:5010', 'notes/a.md', 3, fetchImpl);

  assert.deepEqual(
    calls.map((call) => call.url),
    [
      'http://localhost:5010/documents?page=2&size=5&q=notes',
      'http://localhost:5010/search/similar/notes%2Fa.md?limit=3',
    ],
  );
});

test('fetchIndexStats uses GET on /stats', async () => {
  const calls: Call[] = [];
  const stats = { documentsIndexed: 2, chunksIndexed: 7, lastIndexedAt: null };
  const res = await fetchIndexStats(
    'http://localhost:5010',
    fakeFetch(200, stats, calls),
  );

  assert.deepEqual(res, stats);
  assert.equal(calls[0]?.url, 'http://localhost:5010/stats');
  assert.equal(calls[0]?.init, undefined);
});

test('non-2xx responses reject with status and parsed body', async () => {
  const calls: Call[] = [];
  await assert.rejects(
    analyzeQuery(
      'http://localhost:5010',
      '',
      fakeFetch(400, { error: 'VALIDATION_FAILED' }, calls),
    ),
    (err: Error & { status?: number; body?: unknown }) => {
      assert.equal(err.message, 'analyze failed: 400');
      assert.equal(err.status, 400);
      assert.deepEqual(err.body, { error: 'VALIDATION_FAILED' });
      return true;
    },
  );
});
