import mongoose, { type Model } from 'mongoose';

const { Schema, model, models } = mongoose;

export interface ManifestEntryRecord {
  fingerprint: string;
  documentId: string;
  vectorStoreId: string;
  indexedAt: Date;
}

const manifestEntrySchema = new Schema<ManifestEntryRecord>(
  {
    fingerprint: { type: String, required: true },
    documentId: { type: String, required: true },
    vectorStoreId: { type: String, required: true },
    indexedAt: { type: Date, required: true },
  },
  {
    collection: 'manifest_entries',
    // A write only resolves once it is journaled on a majority.
    writeConcern: { w: 'majority', j: true },
  },
);

manifestEntrySchema.index({ fingerprint: 1 }, { unique: true });
manifestEntrySchema.index({ documentId: 1 });

export const ManifestEntryModel: Model<ManifestEntryRecord> =
  models.ManifestEntry ||
  model<ManifestEntryRecord>('ManifestEntry', manifestEntrySchema);
