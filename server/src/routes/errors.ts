import type { Response } from 'express';
import {
  BusyError,
  ManifestError,
  ValidationError,
  VectorStoreError,
  VectorStoreTimeoutError,
  errorMessage,
} from '../ingest/errors.js';
import { baseLogger } from '../logger.js';
import { SearchError } from '../search/errors.js';

/** Maps domain errors onto HTTP responses. */
export function sendError(res: Response, err: unknown, context: string) {
  const requestId: string | undefined = res.locals.requestId;
  if (err instanceof ValidationError) {
    return res
      .status(400)
      .json({ status: 'error', code: err.code, details: err.details });
  }
  if (err instanceof BusyError) {
    return res.status(429).json({ status: 'error', code: err.code });
  }
  if (err instanceof SearchError) {
    baseLogger.error({ requestId, kind: err.kind, err: err.cause }, context);
    return res.status(err.kind === 'EMBEDDING' ? 503 : 502).json({
      status: 'error',
      code: err.code,
      kind: err.kind,
      message: err.message,
    });
  }
  if (err instanceof VectorStoreError || err instanceof VectorStoreTimeoutError) {
    baseLogger.error({ requestId, err }, context);
    return res
      .status(502)
      .json({ status: 'error', code: err.code, message: err.message });
  }
  if (err instanceof ManifestError) {
    baseLogger.error({ requestId, err }, context);
    return res
      .status(500)
      .json({ status: 'error', code: err.code, message: err.message });
  }
  baseLogger.error({ requestId, err }, context);
  return res.status(500).json({ status: 'error', message: errorMessage(err) });
}
