import type { LogEntry, LogLevel, LogSource } from '@docsearch/common';
import { resolveLogConfig } from './logger.js';

export type Filters = {
  level?: LogLevel[];
  source?: LogSource[];
  text?: string;
  runId?: string;
  since?: number;
  sinceSequence?: number;
};

const { bufferMax: maxEntries } = resolveLogConfig();
const store: LogEntry[] = [];
let sequence = 0;

function matchesFilters(entry: LogEntry, filters: Filters) {
  if (filters.level && !filters.level.includes(entry.level)) return false;
  if (filters.source && !filters.source.includes(entry.source)) return false;
  if (filters.runId && entry.runId !== filters.runId) return false;
  if (
    filters.text &&
    !`${entry.message} ${JSON.stringify(entry.context ?? {})}`
      .toLowerCase()
      .includes(filters.text.toLowerCase())
  )
    return false;
  if (filters.since && new Date(entry.timestamp).getTime() < filters.since)
    return false;
  if (
    typeof filters.sinceSequence === 'number' &&
    typeof entry.sequence === 'number' &&
    entry.sequence <= filters.sinceSequence
  )
    return false;
  return true;
}

export function append(entry: LogEntry): LogEntry {
  const enriched = { ...entry, sequence: ++sequence };
  store.push(enriched);
  if (store.length > maxEntries) store.shift();
  return enriched;
}

export function query(filters: Filters, limit = 200) {
  return store.filter((entry) => matchesFilters(entry, filters)).slice(-limit);
}

export function lastSequence() {
  return sequence;
}

export function resetStore() {
  store.length = 0;
  sequence = 0;
}
