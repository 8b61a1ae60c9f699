import assert from 'node:assert/strict';
import { test } from 'node:test';
import { buildDeltaPlan } from '../../ingest/deltaPlan.js';
import type { Chunk } from '../../ingest/types.js';

const chunk = (sequenceIndex: number, fingerprint: string): Chunk => ({
  documentId: 'doc-a',
  sequenceIndex,
  text: `text ${fingerprint}`,
  startOffset: sequenceIndex * 10,
  endOffset: sequenceIndex * 10 + 12,
  fingerprint,
});

const indexed = new Set(['f1', 'f2', 'old']);

test('splits chunks into unchanged and pending and finds stale ones', () => {
  const plan = buildDeltaPlan({
    previous: ['old', 'f2', 'f1'],
    chunks: [chunk(0, 'f1'), chunk(1, 'f2'), chunk(2, 'new')],
    isIndexed: (fp) => indexed.has(fp),
  });
  assert.deepEqual(
    plan.unchanged.map((c) => c.fingerprint),
    ['f1', 'f2'],
  );
  assert.deepEqual(
    plan.pending.map((c) => c.fingerprint),
    ['new'],
  );
  assert.deepEqual(plan.stale, ['old']);
});

test('force sends every chunk to pending', () => {
  const plan = buildDeltaPlan({
    previous: ['f1', 'f2'],
    chunks: [chunk(0, 'f1'), chunk(1, 'f2')],
    isIndexed: (fp) => indexed.has(fp),
    force: true,
  });
  assert.deepEqual(plan.unchanged, []);
  assert.equal(plan.pending.length, 2);
  assert.deepEqual(plan.stale, []);
});

test('fingerprints still used elsewhere in the run are not stale', () => {
  const plan = buildDeltaPlan({
    previous: ['moved', 'gone'],
    chunks: [],
    isIndexed: () => false,
    retained: new Set(['moved']),
  });
  assert.deepEqual(plan.stale, ['gone']);
});

test('a first run has nothing unchanged or stale', () => {
  const plan = buildDeltaPlan({
    previous: [],
    chunks: [chunk(0, 'a'), chunk(1, 'b')],
    isIndexed: () => false,
  });
  assert.deepEqual(plan.unchanged, []);
  assert.deepEqual(
    plan.pending.map((c) => c.sequenceIndex),
    [0, 1],
  );
  assert.deepEqual(plan.stale, []);
});
