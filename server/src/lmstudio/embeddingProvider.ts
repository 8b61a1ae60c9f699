import type { LMStudioClient } from '@lmstudio/sdk';
import { isTransientEmbeddingError } from '../ingest/embeddingBatcher.js';
import { EmbeddingFatalError } from '../ingest/errors.js';
import type { EmbeddingProvider } from '../ingest/types.js';
import { getClient } from './clientPool.js';

export type LmStudioEmbeddingOptions = {
  modelKey: string;
  baseUrl: string;
  resolveClient?: (baseUrl: string) => LMStudioClient;
};

export class LmStudioEmbeddingProvider implements EmbeddingProvider {
  readonly id: string;
  private readonly resolveClient: (baseUrl: string) => LMStudioClient;

  constructor(private readonly options: LmStudioEmbeddingOptions) {
    this.id = `lmstudio:${options.modelKey}`;
    this.resolveClient = options.resolveClient ?? getClient;
  }

  async embedBatch(texts: string[]): Promise<number[][]> {
    const { modelKey, baseUrl } = this.options;
    const client = this.resolveClient(baseUrl);
    const model = await client.embedding.model(modelKey).catch((err: unknown) => {
      if (isTransientEmbeddingError(err)) throw err;
      throw new EmbeddingFatalError(
        `Embedding model ${modelKey} unavailable in LM Studio`,
        err,
      );
    });

    const vectors: number[][] = [];
    for (const text of texts) {
      const result = await model.embed(text);
      vectors.push(result.embedding);
    }
    return vectors;
  }
}
