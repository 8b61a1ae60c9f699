import { LMStudioClient } from '@lmstudio/sdk';
import { baseLogger } from '../logger.js';

type ClientFactory = (baseUrl: string) => LMStudioClient;

const clients = new Map<string, LMStudioClient>();
const defaultFactory: ClientFactory = (baseUrl) => new LMStudioClient({ baseUrl });
let createClient: ClientFactory = defaultFactory;

/** LM Studio speaks websockets; http(s) URLs from config are rewritten. */
export const toWebSocketUrl = (value: string) => {
  if (/^http:\/\//i.test(value)) return value.replace(/^http:/i, 'ws:');
  if (/^https:\/\//i.test(value)) return value.replace(/^https:/i, 'wss:');
  return value;
};

function hasAsyncDispose(
  value: object,
): value is { [Symbol.asyncDispose](): Promise<void> } {
  return typeof Reflect.get(value, Symbol.asyncDispose) === 'function';
}

export function getClient(baseUrl: string): LMStudioClient {
  const key = toWebSocketUrl(baseUrl);
  const existing = clients.get(key);
  if (existing) return existing;

  const client = createClient(key);
  clients.set(key, client);
  return client;
}

export async function closeAll(): Promise<void> {
  const entries = [...clients.entries()];
  clients.clear();

  await Promise.all(
    entries.map(async ([baseUrl, client]) => {
      if (!hasAsyncDispose(client)) return;
      try {
        await client[Symbol.asyncDispose]();
      } catch (err) {
        baseLogger.warn({ err, baseUrl }, 'lmstudio client close failed');
      }
    }),
  );
}

export function setClientFactoryForTests(factory: ClientFactory): void {
  clients.clear();
  createClient = factory;
}

export function restoreDefaultClientFactory(): void {
  clients.clear();
  createClient = defaultFactory;
}
