import { getAppInfo } from '@docsearch/common';
import cors from 'cors';
import express from 'express';
import type { IndexConfig } from './ingest/types.js';
import { createRequestLogger } from './logger.js';
import { createDocumentsRouter } from './routes/documents.js';
import { createIndexCancelRouter } from './routes/indexCancel.js';
import { createIndexStartRouter } from './routes/indexStart.js';
import { createLogsRouter } from './routes/logs.js';
import { createSearchRouter } from './routes/search.js';
import type { DocumentIndexService } from './service.js';

export type AppDeps = {
  service: DocumentIndexService;
  config: Pick<IndexConfig, 'includes' | 'excludes'>;
  version: string;
  requestLogging?: boolean;
};

export function createApp({ service, config, version, requestLogging = true }: AppDeps) {
  const app = express();
  app.use(cors());
  app.use(express.json({ limit: '25mb' }));
  if (requestLogging) app.use(createRequestLogger());
  app.use((req, res, next) => {
    if (typeof req.id === 'string') res.locals.requestId = req.id;
    next();
  });

  app.get('/health', (_req, res) => {
    res.json({ status: 'ok', uptime: process.uptime(), timestamp: Date.now() });
  });

  app.get('/version', (_req, res) => {
    res.json(getAppInfo('docsearch-server', version));
  });

  app.use('/', createDocumentsRouter({ service }));
  app.use('/', createIndexStartRouter({ service, config }));
  app.use('/', createIndexCancelRouter());
  app.use('/', createSearchRouter({ service }));
  app.use('/', createLogsRouter());

  return app;
}
