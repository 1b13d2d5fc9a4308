/**
 * OBSERVATION STORAGE: MongoDB
 *
 * One document per timestamp (unique index). Records are checked against the
 * schema first; the valid ones go through an unordered bulkWrite of upserts
 * so a rerun over an overlapping window replaces rows.
 */

import mongoose, { Schema, type Model } from 'mongoose';
import { upsertValidated, withStoreErrors } from '../storage/mongo.errors.js';
import type { TimeSeriesStore, UpsertSummary } from '../storage/timeseries.store.js';
import { EMPTY_UPSERT } from '../storage/timeseries.store.js';
import type { Observation } from './observation.types.js';

export interface ObservationDoc {
  timestamp: Date;
  flux: number;
}

const ObservationSchema = new Schema<ObservationDoc>(
  {
    timestamp: { type: Date, required: true, unique: true },
    flux: { type: Number, required: true },
  },
  {
    timestamps: true,
    versionKey: false,
  },
);

ObservationSchema.index({ timestamp: -1 });

export function getObservationModel(collection: string): Model<ObservationDoc> {
  const name = `Observation:${collection}`;
  if (mongoose.modelNames().includes(name)) {
    return mongoose.model<ObservationDoc>(name);
  }
  return mongoose.model<ObservationDoc>(name, ObservationSchema, collection);
}

function toObservation(doc: ObservationDoc): Observation {
  return { timestamp: new Date(doc.timestamp), flux: doc.flux };
}

export class ObservationMongoStore implements TimeSeriesStore<Observation> {
  private readonly collection: string;

  constructor(private readonly model: Model<ObservationDoc>) {
    this.collection = model.collection.collectionName;
  }

  async latest(): Promise<Observation | null> {
    const doc = await withStoreErrors(this.collection, () =>
      this.model.findOne({}, { timestamp: 1, flux: 1 }).sort({ timestamp: -1 }).lean<ObservationDoc>().exec(),
    );
    return doc ? toObservation(doc) : null;
  }

  async rangeFrom(start: Date): Promise<Observation[]> {
    const docs = await withStoreErrors(this.collection, () =>
      this.model
        .find({ timestamp: { $gte: start } }, { timestamp: 1, flux: 1 })
        .sort({ timestamp: 1 })
        .lean<ObservationDoc[]>()
        .exec(),
    );
    return docs.map(toObservation);
  }

  async upsertMany(observations: Observation[]): Promise<UpsertSummary> {
    if (observations.length === 0) return { ...EMPTY_UPSERT };

    return upsertValidated(
      this.collection,
      observations,
      (o) => new this.model(o).validateSync(),
      (valid) =>
        this.model.bulkWrite(
          valid.map((o) => ({
            updateOne: {
              filter: { timestamp: o.timestamp },
              update: { $set: { flux: o.flux } },
              upsert: true,
            },
          })),
          { ordered: false, throwOnValidationError: true },
        ),
    );
  }

  async ensureIndexes(): Promise<void> {
    await withStoreErrors(this.collection, () => this.model.createIndexes());
    console.log(`[ObservationStore] Indexes ensured on ${this.collection}`);
  }
}
