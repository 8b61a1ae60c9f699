import { Router } from 'express';
import { getRunStatus, startIndexRun } from '../ingest/indexJob.js';
import type { IndexConfig } from '../ingest/types.js';
import type { DocumentIndexService } from '../service.js';
import { sendError } from './errors.js';
import { IndexStartBodySchema, parseBody } from './validators.js';

export function createIndexStartRouter({
  service,
  config,
}: {
  service: DocumentIndexService;
  config: Pick<IndexConfig, 'includes' | 'excludes'>;
}) {
  const router = Router();

  router.post('/index/start', (req, res) => {
    try {
      const body = parseBody(IndexStartBodySchema, req.body);
      const runId = startIndexRun(
        {
          path: body.path,
          forceReindex: body.forceReindex,
          fileTypes: body.fileTypes,
        },
        { service, config },
      );
      return res.status(202).json({ runId });
    } catch (err) {
      return sendError(res, err, 'index start failed');
    }
  });

  router.get('/index/status/:runId', (req, res) => {
    const status = getRunStatus(req.params.runId);
    if (!status) {
      return res.status(404).json({ status: 'error', code: 'NOT_FOUND' });
    }
    return res.json(status);
  });

  return router;
}
