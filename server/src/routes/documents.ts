import path from 'path';
import { randomUUID } from 'crypto';
import { Router } from 'express';
import { BusyError } from '../ingest/errors.js';
import * as indexLock from '../ingest/lock.js';
import type { Document } from '../ingest/types.js';
import { baseLogger } from '../logger.js';
import type { DocumentIndexService } from '../service.js';
import { sendError } from './errors.js';
import {
  BatchDeleteBodySchema,
  ClearIndexBodySchema,
  DocumentDetailsQuerySchema,
  IndexBodySchema,
  ListDocumentsQuerySchema,
  parseBody,
  type IndexBody,
} from './validators.js';

function toDocuments(body: IndexBody): Document[] {
  return body.documents.map((doc) => {
    const sourcePath = doc.sourcePath ?? doc.id;
    const fileType =
      doc.fileType ?? (path.extname(sourcePath).replace('.', '') || 'txt');
    return {
      id: doc.id,
      sourcePath,
      fileType: fileType.toLowerCase(),
      rawText: doc.text,
      lastModified: doc.lastModified ? new Date(doc.lastModified) : new Date(),
    };
  });
}

/** Synchronous indexing of inline documents, document listing and removal. */
export function createDocumentsRouter({ service }: { service: DocumentIndexService }) {
  const router = Router();

  router.post('/index', async (req, res) => {
    const owner = `sync-${randomUUID()}`;
    try {
      const body = parseBody(IndexBodySchema, req.body);
      if (!indexLock.tryAcquire(owner)) {
        throw new BusyError(indexLock.currentOwner());
      }
      try {
        const stats = await service.index(toDocuments(body), {
          forceReindex: body.forceReindex,
          fileTypesFilter: body.fileTypes,
        });
        return res.json(stats);
      } finally {
        indexLock.release(owner);
      }
    } catch (err) {
      return sendError(res, err, 'index failed');
    }
  });

  router.post('/index/clear', async (req, res) => {
    const owner = `clear-${randomUUID()}`;
    try {
      parseBody(ClearIndexBodySchema, req.body);
      if (!indexLock.tryAcquire(owner)) {
        throw new BusyError(indexLock.currentOwner());
      }
      try {
        const cleared = await service.clearIndex();
        return res.json({ status: 'ok', ...cleared });
      } finally {
        indexLock.release(owner);
      }
    } catch (err) {
      return sendError(res, err, 'index clear failed');
    }
  });

  router.get('/documents', (req, res) => {
    try {
      const { page, size, q } = parseBody(ListDocumentsQuerySchema, req.query);
      return res.json(service.listDocuments({ page, size, query: q }));
    } catch (err) {
      return sendError(res, err, 'document listing failed');
    }
  });

  router.get('/documents/:documentId', async (req, res) => {
    try {
      const { includeChunks } = parseBody(DocumentDetailsQuerySchema, req.query);
      const details = await service.documentDetails(req.params.documentId, includeChunks);
      if (!details) {
        return res.status(404).json({ status: 'error', code: 'NOT_FOUND' });
      }
      return res.json(details);
    } catch (err) {
      return sendError(res, err, 'document lookup failed');
    }
  });

  router.post('/documents/batch-delete', async (req, res) => {
    try {
      const { documentIds } = parseBody(BatchDeleteBodySchema, req.body);
      if (indexLock.isHeld()) {
        return res.status(429).json({ status: 'error', code: 'BUSY' });
      }
      const result = await service.removeDocuments(documentIds);
      baseLogger.info(
        { removed: Object.keys(result.removed).length, notFound: result.notFound.length },
        'documents removed',
      );
      return res.json({ status: 'ok', ...result });
    } catch (err) {
      return sendError(res, err, 'batch removal failed');
    }
  });

  router.delete('/documents/:documentId', async (req, res) => {
    const { documentId } = req.params;
    if (indexLock.isHeld()) {
      return res.status(429).json({ status: 'error', code: 'BUSY' });
    }
    try {
      const removed = await service.removeDocument(documentId);
      if (removed === 0) {
        return res.status(404).json({ status: 'error', code: 'NOT_FOUND' });
      }
      baseLogger.info({ documentId, removed }, 'document removed');
      return res.json({ status: 'ok', documentId, removed });
    } catch (err) {
      return sendError(res, err, 'document removal failed');
    }
  });

  return router;
}
