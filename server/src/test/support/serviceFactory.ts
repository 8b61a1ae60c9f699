import type { IndexConfig } from '../../ingest/types.js';
import { IndexManifest } from '../../ingest/manifest.js';
import { DocumentIndexService } from '../../service.js';
import { FakeEmbeddingProvider, noSleep } from './fakeEmbeddingProvider.js';
import { InMemoryManifestStore } from './inMemoryManifestStore.js';
import { InMemoryVectorStore } from './inMemoryVectorStore.js';

export const testConfig: IndexConfig = {
  maxChunkSize: 200,
  chunkOverlap: 40,
  chunkLookback: 60,
  embeddingBatchSize: 4,
  maxWorkers: 2,
  similarityThreshold: 0.3,
  defaultLimit: 10,
  embeddingTimeoutMs: 200,
  vectorStoreTimeoutMs: 200,
  embeddingModel: 'test-embedding-model',
  lmStudioBaseUrl: 'ws://localhost:1234',
  chromaUrl: 'http://localhost:8000',
  chromaCollection: 'documents',
  includes: ['txt', 'md'],
  excludes: ['node_modules'],
  port: 5010,
};

/** A service wired to in-process stand-ins only. */
export async function createTestService(overrides: Partial<IndexConfig> = {}) {
  const store = new InMemoryManifestStore();
  const manifest = await IndexManifest.open(store);
  const vectorStore = new InMemoryVectorStore();
  const provider = new FakeEmbeddingProvider();
  const config = { ...testConfig, ...overrides };
  const service = new DocumentIndexService({
    config,
    manifest,
    vectorStore,
    provider,
    batcher: { sleep: noSleep, random: () => 0 },
  });
  return { service, store, manifest, vectorStore, provider, config };
}
