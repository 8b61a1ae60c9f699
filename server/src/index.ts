import fs from 'fs';
import { config as loadEnv } from 'dotenv';
import { z } from 'zod';
import { createApp } from './app.js';
import { ChromaVectorStore } from './ingest/chromaVectorStore.js';
import { resolveConfig } from './ingest/config.js';
import { errorMessage } from './ingest/errors.js';
import { IndexManifest } from './ingest/manifest.js';
import { closeAll } from './lmstudio/clientPool.js';
import { LmStudioEmbeddingProvider } from './lmstudio/embeddingProvider.js';
import { baseLogger } from './logger.js';
import { connectMongo } from './mongo/connection.js';
import { MongoManifestStore } from './mongo/manifestStore.js';
import { DocumentIndexService } from './service.js';

loadEnv();

const pkg = z
  .object({ version: z.string() })
  .parse(
    JSON.parse(
      fs.readFileSync(new URL('../package.json', import.meta.url), 'utf8'),
    ),
  );

let server: ReturnType<ReturnType<typeof createApp>['listen']> | undefined;
let service: DocumentIndexService | undefined;

const start = async () => {
  const config = resolveConfig();
  if (!config.mongoUri) {
    baseLogger.error('MONGO_URI is required but missing');
    process.exit(1);
  }
  try {
    await connectMongo(config.mongoUri);
  } catch (err) {
    baseLogger.error({ err }, 'Failed to connect to Mongo');
    process.exit(1);
  }

  const manifest = await IndexManifest.open(new MongoManifestStore());
  service = new DocumentIndexService({
    config,
    manifest,
    vectorStore: new ChromaVectorStore({
      url: config.chromaUrl,
      collection: config.chromaCollection,
    }),
    provider: new LmStudioEmbeddingProvider({
      modelKey: config.embeddingModel,
      baseUrl: config.lmStudioBaseUrl,
    }),
  });

  const app = createApp({ service, config, version: pkg.version });
  server = app.listen(config.port, () =>
    baseLogger.info({ port: config.port }, 'Server listening'),
  );
};

start().catch((err: unknown) => {
  baseLogger.error({ error: errorMessage(err) }, 'Startup failed');
  process.exit(1);
});

const shutdown = async (signal: NodeJS.Signals) => {
  baseLogger.info({ signal }, 'Shutting down services');
  try {
    await closeAll();
  } catch (err) {
    baseLogger.error({ err }, 'Failed to close LM Studio clients');
  }
  try {
    await service?.close();
  } catch (err) {
    baseLogger.error({ err }, 'Failed to close manifest store');
  } finally {
    if (server) server.close(() => process.exit(0));
    else process.exit(0);
  }
};

const signals: NodeJS.Signals[] = ['SIGINT', 'SIGTERM'];
signals.forEach((sig) => {
  process.on(sig, () => void shutdown(sig));
});
