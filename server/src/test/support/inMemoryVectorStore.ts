import type {
  VectorCandidate,
  VectorFilter,
  VectorMetadata,
  VectorStore,
} from '../../ingest/types.js';

type StoredVector = { vector: number[]; text: string; metadata: VectorMetadata };

export function cosineSimilarity(a: number[], b: number[]): number {
  let dot = 0;
  let normA = 0;
  let normB = 0;
  for (let i = 0; i < Math.min(a.length, b.length); i += 1) {
    dot += a[i] * b[i];
    normA += a[i] * a[i];
    normB += b[i] * b[i];
  }
  if (normA === 0 || normB === 0) return 0;
  return dot / Math.sqrt(normA * normB);
}

/** Cosine-scored store kept in insertion order. */
export class InMemoryVectorStore implements VectorStore {
  readonly records = new Map<string, StoredVector>();
  readonly upsertCalls: string[] = [];
  readonly deleteCalls: string[][] = [];
  searchCalls: Array<{ topK: number; filter?: VectorFilter }> = [];
  failUpsertFor = new Set<string>();
  /** Upserts of these ids never settle. */
  hangUpsertFor = new Set<string>();
  searchError: Error | null = null;
  getError: Error | null = null;
  hangSearch = false;

  async upsert(id: string, vector: number[], text: string, metadata: VectorMetadata) {
    this.upsertCalls.push(id);
    if (this.hangUpsertFor.has(id)) return new Promise<void>(() => undefined);
    if (this.failUpsertFor.has(id)) throw new Error(`upsert rejected for ${id}`);
    this.records.set(id, { vector: [...vector], text, metadata: { ...metadata } });
  }

  async search(vector: number[], topK: number, filter?: VectorFilter) {
    this.searchCalls.push({ topK, filter });
    if (this.hangSearch) return new Promise<VectorCandidate[]>(() => undefined);
    if (this.searchError) throw this.searchError;
    const allowed = filter?.fileTypes?.length ? new Set(filter.fileTypes) : null;
    return [...this.records.entries()]
      .filter(([, record]) => !allowed || allowed.has(record.metadata.fileType))
      .map(([id, record]) => ({
        id,
        score: cosineSimilarity(vector, record.vector),
        text: record.text,
        metadata: { ...record.metadata },
      }))
      .sort((a, b) => b.score - a.score)
      .slice(0, topK);
  }

  async delete(ids: string[]) {
    this.deleteCalls.push([...ids]);
    ids.forEach((id) => this.records.delete(id));
  }

  async get(ids: string[]) {
    if (this.getError) throw this.getError;
    return ids.flatMap((id) => {
      const record = this.records.get(id);
      if (!record) return [];
      return [
        {
          id,
          vector: [...record.vector],
          text: record.text,
          metadata: { ...record.metadata },
        },
      ];
    });
  }
}
