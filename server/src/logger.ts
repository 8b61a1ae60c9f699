import crypto from 'node:crypto';
import fs from 'node:fs';
import path from 'node:path';
import pino from 'pino';
import { pinoHttp } from 'pino-http';
import pinoRoll from 'pino-roll';

export type LogConfig = {
  filePath: string;
  rotate: boolean;
  level: string;
  bufferMax: number;
};

export function resolveLogConfig(
  env: NodeJS.ProcessEnv = process.env,
): LogConfig {
  const bufferMax = Number(env.LOG_BUFFER_MAX ?? 5000);
  return {
    filePath: env.LOG_FILE_PATH || './logs/server.log',
    rotate: env.LOG_FILE_ROTATE !== 'false',
    level: env.LOG_LEVEL || 'info',
    bufferMax:
      Number.isFinite(bufferMax) && bufferMax > 0 ? Math.floor(bufferMax) : 5000,
  };
}

const logConfig = resolveLogConfig();
fs.mkdirSync(path.dirname(logConfig.filePath), { recursive: true });

const destination = logConfig.rotate
  ? await pinoRoll({ file: logConfig.filePath, frequency: 'daily', mkdir: true })
  : pino.destination(logConfig.filePath);

export const baseLogger = pino(
  {
    level: logConfig.level,
    redact: ['req.headers.authorization'],
  },
  destination,
);

export function createRequestLogger() {
  return pinoHttp({
    logger: baseLogger,
    genReqId: () => crypto.randomUUID?.() || Date.now().toString(),
  });
}
