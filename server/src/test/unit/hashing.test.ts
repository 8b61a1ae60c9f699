import assert from 'node:assert/strict';
import { test } from 'node:test';
import { fingerprint } from '../../ingest/hashing.js';

test('fingerprint is the sha256 hex digest of the text', () => {
  assert.equal(
    fingerprint('hello'),
    '2cf24dba5fb0a30e26e83b2ac5b9e29e1b161e5c1fa7425e73043362938b9824',
  );
});

test('identical text shares a fingerprint, different text does not', () => {
  assert.equal(fingerprint('same chunk'), fingerprint('same chunk'));
  assert.notEqual(fingerprint('same chunk'), fingerprint('same chunk '));
});
