import type { ManifestStore } from '../../ingest/manifest.js';
import type { ManifestEntry } from '../../ingest/types.js';

export class InMemoryManifestStore implements ManifestStore {
  readonly entries = new Map<string, ManifestEntry>();
  closed = false;
  /** Fingerprints whose next `put` rejects. */
  readonly failPutFor = new Set<string>();
  /** Fingerprints whose `deleteMany` rejects. */
  readonly failDeleteFor = new Set<string>();
  puts = 0;

  constructor(seed: ManifestEntry[] = []) {
    seed.forEach((entry) => this.entries.set(entry.fingerprint, { ...entry }));
  }

  async loadAll() {
    return [...this.entries.values()].map((entry) => ({ ...entry }));
  }

  async put(entry: ManifestEntry) {
    this.puts += 1;
    if (this.failPutFor.has(entry.fingerprint)) {
      throw new Error(`write rejected for ${entry.fingerprint}`);
    }
    this.entries.set(entry.fingerprint, { ...entry });
  }

  async deleteMany(fingerprints: string[]) {
    const rejected = fingerprints.find((fp) => this.failDeleteFor.has(fp));
    if (rejected) throw new Error(`delete rejected for ${rejected}`);
    fingerprints.forEach((fp) => this.entries.delete(fp));
  }

  async close() {
    this.closed = true;
  }
}
