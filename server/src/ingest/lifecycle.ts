import type { LogEntry, LogSource } from '@docsearch/common';
import { append as appendLog } from '../logStore.js';
import { baseLogger } from '../logger.js';

export function logLifecycle(
  level: LogEntry['level'],
  message: string,
  context: Record<string, unknown>,
  source: LogSource = 'indexer',
) {
  const cleanedContext = Object.fromEntries(
    Object.entries(context).filter(([, value]) => value !== undefined),
  );
  const runId =
    typeof cleanedContext.runId === 'string' ? cleanedContext.runId : undefined;

  appendLog({
    level,
    source,
    message,
    timestamp: new Date().toISOString(),
    runId,
    context: cleanedContext,
  });
  baseLogger[level]({ source, ...cleanedContext }, message);
}
