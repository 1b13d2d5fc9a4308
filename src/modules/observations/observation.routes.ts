/**
 * OBSERVATION ROUTES
 *
 *   GET /api/data/latest                       latest observation, 404 when empty
 *   GET /api/data?timeframe_hours=N            observations from now - N hours
 */

import type { FastifyInstance } from 'fastify';
import { NotFoundError } from '../../common/errors.js';
import { hoursBefore, type Clock } from '../../common/runtime.js';
import { resolveTimeframeHours, type RequestWindowConfig } from '../../common/timeframe.js';
import type { TimeSeriesStore } from '../storage/timeseries.store.js';
import {
  toObservationDto,
  type HistoricalObservationsResponse,
  type Observation,
  type ObservationDto,
} from './observation.types.js';

export async function registerObservationRoutes(
  app: FastifyInstance,
  deps: {
    store: TimeSeriesStore<Observation>;
    requests: RequestWindowConfig;
    clock: Clock;
  },
): Promise<void> {
  app.get('/api/data/latest', async (): Promise<ObservationDto> => {
    const latest = await deps.store.latest();
    if (!latest) {
      throw new NotFoundError('No observations stored yet');
    }
    return toObservationDto(latest);
  });

  app.get<{
    Querystring: { timeframe_hours?: string };
  }>('/api/data', async (request): Promise<HistoricalObservationsResponse> => {
    const hours = resolveTimeframeHours(request.query, deps.requests);
    const rows = await deps.store.rangeFrom(hoursBefore(deps.clock.utcNow(), hours));

    return {
      ok: true,
      record_count: rows.length,
      timeframe_hours: hours,
      data: rows.map(toObservationDto),
    };
  });
}
