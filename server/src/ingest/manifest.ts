import type { DocumentSummary, ManifestStats } from '@docsearch/common';
import { baseLogger } from '../logger.js';
import { KeyedLock } from '../utils/keyedLock.js';
import { ManifestError } from './errors.js';
import type { ManifestEntry } from './types.js';

/** Durable backing for the manifest; every write resolves once persisted. */
export interface ManifestStore {
  loadAll(): Promise<ManifestEntry[]>;
  put(entry: ManifestEntry): Promise<void>;
  deleteMany(fingerprints: string[]): Promise<void>;
  close(): Promise<void>;
}

export type ManifestWriter = {
  upsert(entry: ManifestEntry): Promise<void>;
};

export class IndexManifest {
  private readonly byFingerprint = new Map<string, ManifestEntry>();
  private readonly byDocument = new Map<string, Set<string>>();
  private readonly locks = new KeyedLock();

  private constructor(private readonly store: ManifestStore) {}

  static async open(store: ManifestStore): Promise<IndexManifest> {
    const manifest = new IndexManifest(store);
    const entries = await store.loadAll();
    for (const entry of entries) {
      manifest.remember(entry);
    }
    baseLogger.info(
      {
        entries: manifest.byFingerprint.size,
        documents: manifest.byDocument.size,
      },
      'index manifest loaded',
    );
    return manifest;
  }

  lookup(fingerprint: string): ManifestEntry | undefined {
    return this.byFingerprint.get(fingerprint);
  }

  allFingerprintsFor(documentId: string): string[] {
    return [...(this.byDocument.get(documentId) ?? [])].sort();
  }

  documentIds(): string[] {
    return [...this.byDocument.keys()].sort();
  }

  documentSummary(documentId: string): DocumentSummary | undefined {
    const fingerprints = this.byDocument.get(documentId);
    if (!fingerprints) return undefined;
    let last: Date | null = null;
    for (const fp of fingerprints) {
      const entry = this.byFingerprint.get(fp);
      if (entry && (!last || entry.indexedAt > last)) last = entry.indexedAt;
    }
    return {
      documentId,
      chunkCount: fingerprints.size,
      lastIndexedAt: last ? last.toISOString() : null,
    };
  }

  /**
   * Runs `fn` as the only writer of `fingerprint`. The writer handed to `fn`
   * persists without re-acquiring the lock.
   */
  withFingerprintLock<T>(
    fingerprint: string,
    fn: (writer: ManifestWriter) => Promise<T>,
  ): Promise<T> {
    return this.locks.run(fingerprint, () =>
      fn({ upsert: (entry) => this.persist(fingerprint, entry) }),
    );
  }

  upsert(entry: ManifestEntry): Promise<void> {
    return this.withFingerprintLock(entry.fingerprint, (writer) =>
      writer.upsert(entry),
    );
  }

  async deleteFingerprints(fingerprints: string[]): Promise<ManifestEntry[]> {
    if (fingerprints.length === 0) return [];
    return this.locks.runMany(fingerprints, async () => {
      const present = fingerprints.filter((fp) => this.byFingerprint.has(fp));
      if (present.length === 0) return [];
      try {
        await this.store.deleteMany(present);
      } catch (err) {
        throw new ManifestError(present, err);
      }
      const removed: ManifestEntry[] = [];
      for (const fp of present) {
        const entry = this.forget(fp);
        if (entry) removed.push(entry);
      }
      return removed;
    });
  }

  deleteByDocument(documentId: string): Promise<ManifestEntry[]> {
    return this.deleteFingerprints(this.allFingerprintsFor(documentId));
  }

  stats(): ManifestStats {
    let last: Date | null = null;
    for (const entry of this.byFingerprint.values()) {
      if (!last || entry.indexedAt > last) last = entry.indexedAt;
    }
    return {
      documentsIndexed: this.byDocument.size,
      chunksIndexed: this.byFingerprint.size,
      lastIndexedAt: last ? last.toISOString() : null,
    };
  }

  async close(): Promise<void> {
    await this.store.close();
    this.byFingerprint.clear();
    this.byDocument.clear();
  }

  private async persist(lockedFingerprint: string, entry: ManifestEntry) {
    if (entry.fingerprint !== lockedFingerprint) {
      throw new ManifestError(
        [entry.fingerprint],
        new Error(`writer holds ${lockedFingerprint}`),
      );
    }
    try {
      await this.store.put(entry);
    } catch (err) {
      throw new ManifestError([entry.fingerprint], err);
    }
    this.remember(entry);
  }

  private remember(entry: ManifestEntry) {
    const previous = this.byFingerprint.get(entry.fingerprint);
    if (previous && previous.documentId !== entry.documentId) {
      this.detach(previous.documentId, entry.fingerprint);
    }
    this.byFingerprint.set(entry.fingerprint, { ...entry });
    const set = this.byDocument.get(entry.documentId) ?? new Set<string>();
    set.add(entry.fingerprint);
    this.byDocument.set(entry.documentId, set);
  }

  private forget(fingerprint: string): ManifestEntry | undefined {
    const entry = this.byFingerprint.get(fingerprint);
    if (!entry) return undefined;
    this.byFingerprint.delete(fingerprint);
    this.detach(entry.documentId, fingerprint);
    return entry;
  }

  private detach(documentId: string, fingerprint: string) {
    const set = this.byDocument.get(documentId);
    if (!set) return;
    set.delete(fingerprint);
    if (set.size === 0) this.byDocument.delete(documentId);
  }
}
