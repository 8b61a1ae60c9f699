import {
  isLogLevel,
  isLogSource,
  type LogLevel,
  type LogSource,
} from '@docsearch/common';
import { Router } from 'express';
import { lastSequence, query as queryLogs, type Filters } from '../logStore.js';

const MAX_PAGE = 200;

function parseList(value: unknown): string[] {
  if (typeof value !== 'string' || !value.trim()) return [];
  return value
    .split(',')
    .map((v) => v.trim())
    .filter(Boolean);
}

export function buildFilters(query: Record<string, unknown>): Filters {
  const level: LogLevel[] = parseList(query.level).filter(isLogLevel);
  const source: LogSource[] = parseList(query.source).filter(isLogSource);
  const since = Number(query.since);
  const sinceSequence = Number(query.sinceSequence);

  const filters: Filters = {};
  if (level.length) filters.level = level;
  if (source.length) filters.source = source;
  if (typeof query.text === 'string' && query.text.trim()) {
    filters.text = query.text.trim();
  }
  if (typeof query.runId === 'string' && query.runId) {
    filters.runId = query.runId;
  }
  if (query.since !== undefined && !Number.isNaN(since)) filters.since = since;
  if (query.sinceSequence !== undefined && !Number.isNaN(sinceSequence)) {
    filters.sinceSequence = sinceSequence;
  }
  return filters;
}

export function createLogsRouter() {
  const router = Router();

  router.get('/logs', (req, res) => {
    const filters = buildFilters(req.query);
    const limitParam = Number(req.query.limit);
    const limit = Number.isFinite(limitParam)
      ? Math.min(Math.max(1, Math.floor(limitParam)), MAX_PAGE)
      : MAX_PAGE;
    const items = queryLogs(filters, limit);
    res.json({ items, lastSequence: lastSequence() });
  });

  return router;
}
