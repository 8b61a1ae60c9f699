import { ChromaClient, type Collection } from 'chromadb';
import { baseLogger } from '../logger.js';
import { VectorStoreError } from './errors.js';
import type {
  StoredVector,
  VectorCandidate,
  VectorFilter,
  VectorMetadata,
  VectorStore,
} from './types.js';

export type ChromaCollection = Pick<
  Collection,
  'upsert' | 'query' | 'delete' | 'get'
>;

export type ChromaVectorStoreOptions = {
  url: string;
  collection: string;
  /** Overrides collection lookup; tests hand in an in-process stand-in. */
  getCollection?: () => Promise<ChromaCollection>;
};

export function toChromaClientArgs(connectionString: string): {
  host: string;
  port: number;
  ssl: boolean;
} {
  const normalized = connectionString.includes('://')
    ? connectionString
    : `http://${connectionString}`;
  const url = new URL(normalized);
  const ssl = url.protocol === 'https:';
  const port = url.port ? Number(url.port) : ssl ? 443 : 8000;
  return { host: url.hostname, port, ssl };
}

const asString = (value: unknown) => (typeof value === 'string' ? value : null);
const asNumber = (value: unknown) => (typeof value === 'number' ? value : null);

export function readVectorMetadata(
  raw: Record<string, unknown> | null | undefined,
): VectorMetadata | null {
  if (!raw) return null;
  const documentId = asString(raw.documentId);
  const sourceFile = asString(raw.sourceFile);
  const fileType = asString(raw.fileType);
  const fingerprint = asString(raw.fingerprint);
  const sequenceIndex = asNumber(raw.sequenceIndex);
  const startOffset = asNumber(raw.startOffset);
  const endOffset = asNumber(raw.endOffset);
  if (
    documentId === null ||
    sourceFile === null ||
    fileType === null ||
    fingerprint === null ||
    sequenceIndex === null ||
    startOffset === null ||
    endOffset === null
  ) {
    return null;
  }
  return {
    documentId,
    sourceFile,
    fileType,
    fingerprint,
    sequenceIndex,
    startOffset,
    endOffset,
    indexedAtMs: asNumber(raw.indexedAtMs) ?? 0,
  };
}

/**
 * Chroma-backed store. The collection uses cosine space, so a candidate's
 * score is `1 - distance`.
 */
export class ChromaVectorStore implements VectorStore {
  private client: ChromaClient | null = null;
  private collection: Promise<ChromaCollection> | null = null;

  constructor(private readonly options: ChromaVectorStoreOptions) {}

  private getCollection(): Promise<ChromaCollection> {
    if (this.options.getCollection) return this.options.getCollection();
    if (!this.collection) {
      this.client ??= new ChromaClient(toChromaClientArgs(this.options.url));
      const pending: Promise<ChromaCollection> = this.client.getOrCreateCollection({
        name: this.options.collection,
        metadata: { 'hnsw:space': 'cosine' },
      });
      this.collection = pending.catch((err: unknown) => {
        this.collection = null;
        throw err;
      });
    }
    return this.collection;
  }

  async upsert(
    id: string,
    vector: number[],
    text: string,
    metadata: VectorMetadata,
  ): Promise<void> {
    try {
      const collection = await this.getCollection();
      await collection.upsert({
        ids: [id],
        embeddings: [vector],
        documents: [text],
        metadatas: [{ ...metadata }],
      });
    } catch (err) {
      throw new VectorStoreError('upsert', err);
    }
  }

  async search(
    vector: number[],
    topK: number,
    filter?: VectorFilter,
  ): Promise<VectorCandidate[]> {
    const fileTypes = filter?.fileTypes ?? [];
    let result: Awaited<ReturnType<ChromaCollection['query']>>;
    try {
      const collection = await this.getCollection();
      result = await collection.query({
        queryEmbeddings: [vector],
        nResults: topK,
        where: fileTypes.length ? { fileType: { $in: fileTypes } } : undefined,
      });
    } catch (err) {
      throw new VectorStoreError('search', err);
    }

    const ids = result.ids[0] ?? [];
    const documents = result.documents?.[0] ?? [];
    const metadatas = result.metadatas?.[0] ?? [];
    const distances = result.distances?.[0] ?? [];

    const candidates: VectorCandidate[] = [];
    ids.forEach((id, idx) => {
      const distance = distances[idx];
      const metadata = readVectorMetadata(metadatas[idx]);
      if (typeof distance !== 'number' || !metadata) {
        baseLogger.warn({ id }, 'skipping vector with incomplete payload');
        return;
      }
      candidates.push({
        id,
        score: 1 - distance,
        text: documents[idx] ?? '',
        metadata,
      });
    });
    return candidates;
  }

  async delete(ids: string[]): Promise<void> {
    if (ids.length === 0) return;
    try {
      const collection = await this.getCollection();
      await collection.delete({ ids });
    } catch (err) {
      throw new VectorStoreError('delete', err);
    }
  }

  async get(ids: string[]): Promise<StoredVector[]> {
    if (ids.length === 0) return [];
    let result: Awaited<ReturnType<ChromaCollection['get']>>;
    try {
      const collection = await this.getCollection();
      result = await collection.get({
        ids,
        include: ['documents', 'metadatas', 'embeddings'],
      });
    } catch (err) {
      throw new VectorStoreError('get', err);
    }

    const documents = result.documents ?? [];
    const embeddings = result.embeddings ?? [];
    const metadatas = result.metadatas ?? [];
    const records: StoredVector[] = [];
    result.ids.forEach((id, idx) => {
      const vector = embeddings[idx];
      const metadata = readVectorMetadata(metadatas[idx]);
      if (!vector || !metadata) {
        baseLogger.warn({ id }, 'skipping vector with incomplete payload');
        return;
      }
      records.push({ id, vector: [...vector], text: documents[idx] ?? '', metadata });
    });
    return records;
  }
}
