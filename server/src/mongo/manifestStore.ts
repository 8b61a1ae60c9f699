import type { ManifestStore } from '../ingest/manifest.js';
import type { ManifestEntry } from '../ingest/types.js';
import { disconnectMongo } from './connection.js';
import { ManifestEntryModel } from './manifestEntry.js';

export class MongoManifestStore implements ManifestStore {
  async loadAll(): Promise<ManifestEntry[]> {
    const docs = await ManifestEntryModel.find({}).lean().exec();
    return docs.map((doc) => ({
      fingerprint: doc.fingerprint,
      documentId: doc.documentId,
      vectorStoreId: doc.vectorStoreId,
      indexedAt: doc.indexedAt,
    }));
  }

  async put(entry: ManifestEntry): Promise<void> {
    await ManifestEntryModel.updateOne(
      { fingerprint: entry.fingerprint },
      {
        $set: {
          documentId: entry.documentId,
          vectorStoreId: entry.vectorStoreId,
          indexedAt: entry.indexedAt,
        },
      },
      { upsert: true },
    ).exec();
  }

  async deleteMany(fingerprints: string[]): Promise<void> {
    if (fingerprints.length === 0) return;
    await ManifestEntryModel.deleteMany({
      fingerprint: { $in: fingerprints },
    }).exec();
  }

  async close(): Promise<void> {
    await disconnectMongo();
  }
}
