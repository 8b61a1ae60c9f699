import crypto from 'node:crypto';

/** Content identity of a chunk: identical text always yields the same id. */
export function fingerprint(text: string): string {
  const hash = crypto.createHash('sha256');
  hash.update(text, 'utf8');
  return hash.digest('hex');
}
