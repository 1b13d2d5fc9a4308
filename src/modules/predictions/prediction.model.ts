/**
 * PREDICTION STORAGE: MongoDB
 *
 * Upsert keyed on the prediction timestamp: a retry at the same instant
 * overwrites, distinct run times produce distinct rows.
 */

import mongoose, { Schema, type Model } from 'mongoose';
import { StoreUnavailableError } from '../../common/errors.js';
import { upsertValidated, withStoreErrors } from '../storage/mongo.errors.js';
import type { TimeSeriesStore, UpsertSummary } from '../storage/timeseries.store.js';
import { EMPTY_UPSERT } from '../storage/timeseries.store.js';
import {
  PredictionSchema,
  RISK_LEVELS,
  describeIssues,
  type Prediction,
  type RiskLevel,
} from './prediction.types.js';

export interface PredictionDoc {
  timestamp: Date;
  probability: number;
  riskLevel: RiskLevel;
  modelVersion: string;
}

const PredictionDocSchema = new Schema<PredictionDoc>(
  {
    timestamp: { type: Date, required: true, unique: true },
    probability: { type: Number, required: true, min: 0, max: 1 },
    riskLevel: { type: String, required: true, enum: RISK_LEVELS },
    modelVersion: { type: String, required: true },
  },
  {
    timestamps: true,
    versionKey: false,
  },
);

PredictionDocSchema.index({ timestamp: -1 });
PredictionDocSchema.index({ modelVersion: 1, timestamp: -1 });

export function getPredictionModel(collection: string): Model<PredictionDoc> {
  const name = `Prediction:${collection}`;
  if (mongoose.modelNames().includes(name)) {
    return mongoose.model<PredictionDoc>(name);
  }
  return mongoose.model<PredictionDoc>(name, PredictionDocSchema, collection);
}

/** Stored rows are re-checked on read; one that fails throws StoreUnavailableError */
export function toPrediction(doc: unknown, collection: string): Prediction {
  const parsed = PredictionSchema.safeParse(doc);
  if (!parsed.success) {
    throw new StoreUnavailableError(`${collection}: unreadable prediction row (${describeIssues(parsed.error)})`, {
      collection,
    });
  }
  return parsed.data;
}

const PROJECTION = { timestamp: 1, probability: 1, riskLevel: 1, modelVersion: 1 } as const;

export class PredictionMongoStore implements TimeSeriesStore<Prediction> {
  private readonly collection: string;

  constructor(private readonly model: Model<PredictionDoc>) {
    this.collection = model.collection.collectionName;
  }

  async latest(): Promise<Prediction | null> {
    const doc = await withStoreErrors(this.collection, () =>
      this.model.findOne({}, PROJECTION).sort({ timestamp: -1 }).lean<PredictionDoc>().exec(),
    );
    return doc ? toPrediction(doc, this.collection) : null;
  }

  async rangeFrom(start: Date): Promise<Prediction[]> {
    const docs = await withStoreErrors(this.collection, () =>
      this.model
        .find({ timestamp: { $gte: start } }, PROJECTION)
        .sort({ timestamp: 1 })
        .lean<PredictionDoc[]>()
        .exec(),
    );
    return docs.map((doc) => toPrediction(doc, this.collection));
  }

  async upsertMany(predictions: Prediction[]): Promise<UpsertSummary> {
    if (predictions.length === 0) return { ...EMPTY_UPSERT };

    return upsertValidated(
      this.collection,
      predictions,
      (p) => new this.model(p).validateSync(),
      (valid) =>
        this.model.bulkWrite(
          valid.map((p) => ({
            updateOne: {
              filter: { timestamp: p.timestamp },
              update: {
                $set: {
                  probability: p.probability,
                  riskLevel: p.riskLevel,
                  modelVersion: p.modelVersion,
                },
              },
              upsert: true,
            },
          })),
          { ordered: false, throwOnValidationError: true },
        ),
    );
  }

  async ensureIndexes(): Promise<void> {
    await withStoreErrors(this.collection, () => this.model.createIndexes());
    console.log(`[PredictionStore] Indexes ensured on ${this.collection}`);
  }
}
