import type { Chunk } from './types.js';

export type ChunkDeltaPlan = {
  /** Already in the manifest; nothing to embed. */
  unchanged: Chunk[];
  /** Missing from the manifest (or forced); must be embedded. */
  pending: Chunk[];
  /** Fingerprints the manifest holds for the document that are gone now. */
  stale: string[];
};

export function buildDeltaPlan(params: {
  previous: string[];
  chunks: Chunk[];
  isIndexed: (fingerprint: string) => boolean;
  force?: boolean;
  retained?: ReadonlySet<string>;
}): ChunkDeltaPlan {
  const current = new Set(params.chunks.map((chunk) => chunk.fingerprint));

  const unchanged: Chunk[] = [];
  const pending: Chunk[] = [];
  for (const chunk of params.chunks) {
    if (!params.force && params.isIndexed(chunk.fingerprint)) {
      unchanged.push(chunk);
    } else {
      pending.push(chunk);
    }
  }

  const stale = [...new Set(params.previous)]
    .filter((fp) => !current.has(fp) && !params.retained?.has(fp))
    .sort();

  return { unchanged, pending, stale };
}
