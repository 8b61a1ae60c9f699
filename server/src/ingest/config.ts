import { z } from 'zod';
import { ValidationError } from './errors.js';
import type { IndexConfig } from './types.js';

const defaultIncludes = [
  'txt',
  'text',
  'md',
  'markdown',
  'rst',
  'adoc',
  'org',
  'csv',
  'tsv',
];

const defaultExcludes = ['node_modules', '.git', 'dist', 'build', 'logs'];

const int = (min: number, max: number, fallback: number) =>
  z.coerce.number().int().min(min).max(max).default(fallback);

const IndexConfigSchema = z
  .object({
    maxChunkSize: int(100, 8000, 1000),
    chunkOverlap: int(1, 7999, 200),
    chunkLookback: int(0, 8000, 200),
    embeddingBatchSize: int(1, 512, 32),
    maxWorkers: int(1, 64, 4),
    similarityThreshold: z.coerce.number().min(0).max(1).default(0.3),
    defaultLimit: int(1, 100, 10),
    embeddingTimeoutMs: int(100, 600_000, 30_000),
    vectorStoreTimeoutMs: int(100, 600_000, 10_000),
    embeddingModel: z.string().default('text-embedding-nomic-embed-text-v1.5'),
    lmStudioBaseUrl: z.string().default('ws://localhost:1234'),
    chromaUrl: z.string().default('http://localhost:8000'),
    chromaCollection: z.string().default('documents'),
    mongoUri: z.string().optional(),
    includes: z.array(z.string()).min(1),
    excludes: z.array(z.string()),
    port: int(1, 65535, 5010),
  })
  .refine((cfg) => cfg.chunkOverlap < cfg.maxChunkSize, {
    message: 'CHUNK_OVERLAP must be smaller than MAX_CHUNK_SIZE',
    path: ['chunkOverlap'],
  });

function splitList(value: string | undefined): string[] {
  return (
    value
      ?.split(',')
      .map((s) => s.trim())
      .filter(Boolean) ?? []
  );
}

export function resolveConfig(env: NodeJS.ProcessEnv = process.env): IndexConfig {
  const read = (key: string) => {
    const value = env[key]?.trim();
    return value ? value : undefined;
  };

  const envIncludes = splitList(read('INDEX_INCLUDE')).map((ext) =>
    ext.replace(/^\./, '').toLowerCase(),
  );
  const envExcludes = splitList(read('INDEX_EXCLUDE'));

  const parsed = IndexConfigSchema.safeParse({
    maxChunkSize: read('MAX_CHUNK_SIZE'),
    chunkOverlap: read('CHUNK_OVERLAP'),
    chunkLookback: read('CHUNK_LOOKBACK'),
    embeddingBatchSize: read('EMBEDDING_BATCH_SIZE'),
    maxWorkers: read('MAX_WORKERS'),
    similarityThreshold: read('SIMILARITY_THRESHOLD'),
    defaultLimit: read('DEFAULT_LIMIT'),
    embeddingTimeoutMs: read('EMBEDDING_TIMEOUT_MS'),
    vectorStoreTimeoutMs: read('VECTOR_STORE_TIMEOUT_MS'),
    embeddingModel: read('EMBEDDING_MODEL'),
    lmStudioBaseUrl: read('LMSTUDIO_BASE_URL'),
    chromaUrl: read('CHROMA_URL'),
    chromaCollection: read('CHROMA_COLLECTION'),
    mongoUri: read('MONGO_URI'),
    includes: envIncludes.length ? envIncludes : defaultIncludes,
    excludes: Array.from(new Set([...defaultExcludes, ...envExcludes])),
    port: read('PORT'),
  });

  if (!parsed.success) {
    throw new ValidationError(
      parsed.error.issues.map(
        (issue) => `${issue.path.join('.') || 'config'}: ${issue.message}`,
      ),
    );
  }
  return parsed.data;
}
