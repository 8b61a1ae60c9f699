import { Router } from 'express';
import { baseLogger } from '../logger.js';
import type { DocumentIndexService } from '../service.js';
import { sendError } from './errors.js';
import {
  AnalyzeBodySchema,
  SearchBodySchema,
  SimilarQuerySchema,
  parseBody,
} from './validators.js';

export function createSearchRouter({ service }: { service: DocumentIndexService }) {
  const router = Router();

  router.post('/search', async (req, res) => {
    try {
      const body = parseBody(SearchBodySchema, req.body);
      const results = await service.search(body.query, {
        limit: body.limit,
        scoreThreshold: body.scoreThreshold,
        fileTypes: body.fileTypes,
        rerank: body.rerank,
      });
      baseLogger.info(
        {
          requestId: res.locals.requestId,
          limit: body.limit,
          fileTypes: body.fileTypes,
          results: results.length,
        },
        'search',
      );
      return res.json({ query: body.query, results });
    } catch (err) {
      return sendError(res, err, 'search failed');
    }
  });

  router.get('/search/similar/:documentId', async (req, res) => {
    const { documentId } = req.params;
    try {
      const { limit } = parseBody(SimilarQuerySchema, req.query);
      const results = await service.similarDocuments(documentId, limit);
      if (!results) {
        return res.status(404).json({ status: 'error', code: 'NOT_FOUND' });
      }
      return res.json({ documentId, results });
    } catch (err) {
      return sendError(res, err, 'similar documents failed');
    }
  });

  router.post('/search/analyze', (req, res) => {
    try {
      const { query } = parseBody(AnalyzeBodySchema, req.body);
      return res.json(service.analyze(query));
    } catch (err) {
      return sendError(res, err, 'query analysis failed');
    }
  });

  router.get('/stats', (_req, res) => {
    res.json(service.stats());
  });

  router.post('/cache/clear', (_req, res) => {
    service.clearCache();
    res.json({ status: 'ok' });
  });

  return router;
}
