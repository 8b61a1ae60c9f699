import { Router } from 'express';
import { cancelRun } from '../ingest/indexJob.js';

export function createIndexCancelRouter() {
  const router = Router();

  router.post('/index/cancel/:runId', (req, res) => {
    const status = cancelRun(req.params.runId);
    if (!status) {
      return res.status(404).json({ status: 'error', code: 'NOT_FOUND' });
    }
    return res.json({ status: 'ok', runId: status.runId, state: status.state });
  });

  return router;
}
