// Single index-run lock shared by the async job runner and synchronous
// /index calls. Stale holders expire so a crashed run cannot wedge the server.
const DEFAULT_TTL_MS = 30 * 60 * 1000;

type Holder = {
  owner: string;
  acquiredAt: number;
  expiresAt: number;
};

let holder: Holder | null = null;

function dropIfExpired(now = Date.now()) {
  if (holder && holder.expiresAt <= now) holder = null;
}

export function isHeld(): boolean {
  dropIfExpired();
  return holder !== null;
}

export function tryAcquire(owner: string, ttlMs: number = DEFAULT_TTL_MS) {
  dropIfExpired();
  if (holder) return false;
  const now = Date.now();
  holder = { owner, acquiredAt: now, expiresAt: now + ttlMs };
  return true;
}

export function release(owner: string) {
  if (holder?.owner === owner) holder = null;
}

export function currentOwner(): string | null {
  dropIfExpired();
  return holder?.owner ?? null;
}

export function resetLockForTests() {
  holder = null;
}
