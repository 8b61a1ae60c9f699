import { randomUUID } from 'crypto';
import type { IndexRunState, IndexRunStatus } from '@docsearch/common';
import type { DocumentIndexService } from '../service.js';
import { BusyError, errorMessage } from './errors.js';
import { loadDocuments, type LoadResult } from './extract.js';
import { logLifecycle } from './lifecycle.js';
import * as indexLock from './lock.js';
import type { IndexConfig } from './types.js';

export type IndexRunInput = {
  path: string;
  forceReindex?: boolean;
  fileTypes?: string[];
};

export type IndexJobDeps = {
  service: DocumentIndexService;
  config: Pick<IndexConfig, 'includes' | 'excludes'>;
  load?: (
    path: string,
    config: Pick<IndexConfig, 'includes' | 'excludes'>,
  ) => Promise<LoadResult>;
};

const jobs = new Map<string, IndexRunStatus>();
const controllers = new Map<string, AbortController>();

const TERMINAL: IndexRunState[] = ['completed', 'cancelled', 'error'];
/** Finished runs kept for status lookups; older ones are dropped first. */
export const MAX_FINISHED_RUNS = 50;

function update(runId: string, patch: Partial<IndexRunStatus>) {
  const current = jobs.get(runId);
  if (!current) return;
  jobs.set(runId, { ...current, ...patch });
}

function pruneFinished() {
  const finished = [...jobs.values()].filter((status) =>
    TERMINAL.includes(status.state),
  );
  const excess = finished.length - MAX_FINISHED_RUNS;
  finished.slice(0, Math.max(0, excess)).forEach((status) => jobs.delete(status.runId));
}

export function isBusy() {
  return indexLock.isHeld();
}

async function processRun(
  runId: string,
  input: IndexRunInput,
  deps: IndexJobDeps,
  controller: AbortController,
) {
  const load = deps.load ?? loadDocuments;
  try {
    logLifecycle('info', 'index job start', {
      runId,
      path: input.path,
      force: Boolean(input.forceReindex),
    });
    update(runId, { state: 'chunking', message: 'Loading documents' });
    const { root, documents, failures } = await load(input.path, deps.config);
    update(runId, {
      root,
      extractionFailures: failures.length,
      message: `Chunking ${documents.length} documents`,
    });

    const stats = await deps.service.index(documents, {
      runId,
      forceReindex: input.forceReindex,
      fileTypesFilter: input.fileTypes,
      signal: controller.signal,
      onStage: (stage) =>
        update(runId, {
          state: stage,
          message:
            stage === 'embedding'
              ? 'Embedding pending chunks'
              : `Chunking ${documents.length} documents`,
        }),
    });

    const state: IndexRunState = stats.cancelled ? 'cancelled' : 'completed';
    update(runId, {
      state,
      stats,
      message: stats.cancelled ? 'Cancelled' : 'Completed',
      lastError: null,
    });
    logLifecycle('info', `index job ${state}`, {
      runId,
      root,
      state,
      chunksIndexed: stats.chunksIndexed,
      chunksFailed: stats.chunksFailed,
    });
  } catch (err) {
    const message = errorMessage(err);
    update(runId, { state: 'error', message: 'Failed', lastError: message });
    logLifecycle('error', 'index job error', {
      runId,
      path: input.path,
      state: 'error',
      lastError: message,
    });
  } finally {
    controllers.delete(runId);
    indexLock.release(runId);
    pruneFinished();
  }
}

/** Queues a background run over a directory and returns its id. */
export function startIndexRun(input: IndexRunInput, deps: IndexJobDeps): string {
  const runId = randomUUID();
  if (!indexLock.tryAcquire(runId)) {
    throw new BusyError(indexLock.currentOwner());
  }
  const controller = new AbortController();
  controllers.set(runId, controller);
  jobs.set(runId, {
    runId,
    state: 'queued',
    message: 'Queued',
    lastError: null,
  });
  setImmediate(() => {
    void processRun(runId, input, deps, controller);
  });
  return runId;
}

export function getRunStatus(runId: string): IndexRunStatus | null {
  return jobs.get(runId) ?? null;
}

/**
 * Signals the run to stop dispatching work. Batches already in flight finish;
 * the run then settles as `cancelled`.
 */
export function cancelRun(runId: string): IndexRunStatus | null {
  const status = jobs.get(runId);
  if (!status) return null;
  if (TERMINAL.includes(status.state)) return status;
  controllers.get(runId)?.abort();
  update(runId, { message: 'Cancelling' });
  logLifecycle('info', 'index job cancel requested', { runId });
  return jobs.get(runId) ?? null;
}

export function resetIndexJobsForTests() {
  for (const controller of controllers.values()) controller.abort();
  controllers.clear();
  jobs.clear();
  indexLock.resetLockForTests();
}
