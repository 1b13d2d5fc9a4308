import { hoursBefore } from '../../common/runtime.js';
import type { FetchWindow, PipelineWindowConfig, TimeWindow } from './pipeline.types.js';

/**
 * Fetch window for one run.
 *
 * Anchored on the latest stored observation, never further back than
 * now - maxRetrievalHours (also the cold-start anchor), then widened by
 * bufferHours. The overlap with stored data is absorbed by upserts.
 */
export function computeFetchWindow(
  latestTimestamp: Date | null,
  now: Date,
  cfg: Pick<PipelineWindowConfig, 'maxRetrievalHours' | 'bufferHours'>,
): FetchWindow {
  const bound = hoursBefore(now, cfg.maxRetrievalHours);
  const coldStart = latestTimestamp === null;
  const clamped = latestTimestamp !== null && latestTimestamp.getTime() < bound.getTime();
  const anchor = latestTimestamp === null || clamped ? bound : new Date(latestTimestamp.getTime());

  return {
    anchor,
    start: hoursBefore(anchor, cfg.bufferHours),
    end: new Date(now.getTime()),
    coldStart,
    clamped,
  };
}

export function computeModelWindow(now: Date, cfg: Pick<PipelineWindowConfig, 'modelLookbackHours'>): TimeWindow {
  return { start: hoursBefore(now, cfg.modelLookbackHours), end: new Date(now.getTime()) };
}
