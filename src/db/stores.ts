/**
 * Store wiring: picks the Mongo or in-memory implementation and ensures
 * the timestamp indexes exist.
 */

import type { AppConfig } from '../config/env.js';
import { getObservationModel, ObservationMongoStore } from '../modules/observations/observation.model.js';
import type { Observation } from '../modules/observations/observation.types.js';
import { getPredictionModel, PredictionMongoStore } from '../modules/predictions/prediction.model.js';
import type { Prediction } from '../modules/predictions/prediction.types.js';
import { InMemoryTimeSeriesStore } from '../modules/storage/memory.store.js';
import type { TimeSeriesStore } from '../modules/storage/timeseries.store.js';
import { connectMongo, disconnectMongo } from './mongoose.js';

export interface Stores {
  observations: TimeSeriesStore<Observation>;
  predictions: TimeSeriesStore<Prediction>;
  close(): Promise<void>;
}

export async function openStores(config: AppConfig): Promise<Stores> {
  if (config.store.driver === 'memory') {
    console.log('[DB] Using in-memory stores (data is lost on restart)');
    return {
      observations: new InMemoryTimeSeriesStore<Observation>(),
      predictions: new InMemoryTimeSeriesStore<Prediction>(),
      close: async () => undefined,
    };
  }

  await connectMongo(config.store.url, config.store.dbName);

  const observations = new ObservationMongoStore(getObservationModel(config.tables.observations));
  const predictions = new PredictionMongoStore(getPredictionModel(config.tables.predictions));

  await observations.ensureIndexes();
  await predictions.ensureIndexes();

  return { observations, predictions, close: disconnectMongo };
}
