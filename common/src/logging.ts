export type LogLevel = 'error' | 'warn' | 'info' | 'debug';
export type LogSource = 'server' | 'indexer' | 'search';

export type LogEntry = {
  level: LogLevel;
  message: string;
  timestamp: string; // ISO string
  source: LogSource;
  requestId?: string;
  runId?: string;
  context?: Record<string, unknown>;
  sequence?: number;
};

const LEVELS: readonly string[] = ['error', 'warn', 'info', 'debug'];
const SOURCES: readonly string[] = ['server', 'indexer', 'search'];

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === 'string' && LEVELS.includes(value);
}

export function isLogSource(value: unknown): value is LogSource {
  return typeof value === 'string' && SOURCES.includes(value);
}
