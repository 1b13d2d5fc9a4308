/**
 * PREDICTION ROUTES
 *
 *   GET /api/predictions/latest                latest prediction, 404 when empty
 *   GET /api/predictions?timeframe_hours=N     predictions from now - N hours
 */

import type { FastifyInstance } from 'fastify';
import { NotFoundError } from '../../common/errors.js';
import { hoursBefore, type Clock } from '../../common/runtime.js';
import { resolveTimeframeHours, type RequestWindowConfig } from '../../common/timeframe.js';
import type { TimeSeriesStore } from '../storage/timeseries.store.js';
import {
  toPredictionDto,
  type HistoricalPredictionsResponse,
  type Prediction,
  type PredictionDto,
} from './prediction.types.js';

export async function registerPredictionRoutes(
  app: FastifyInstance,
  deps: {
    store: TimeSeriesStore<Prediction>;
    requests: RequestWindowConfig;
    clock: Clock;
  },
): Promise<void> {
  app.get('/api/predictions/latest', async (): Promise<PredictionDto> => {
    const latest = await deps.store.latest();
    if (!latest) {
      throw new NotFoundError('No predictions stored yet');
    }
    return toPredictionDto(latest);
  });

  app.get<{
    Querystring: { timeframe_hours?: string };
  }>('/api/predictions', async (request): Promise<HistoricalPredictionsResponse> => {
    const hours = resolveTimeframeHours(request.query, deps.requests);
    const rows = await deps.store.rangeFrom(hoursBefore(deps.clock.utcNow(), hours));

    return {
      ok: true,
      record_count: rows.length,
      timeframe_hours: hours,
      data: rows.map(toPredictionDto),
    };
  });
}
