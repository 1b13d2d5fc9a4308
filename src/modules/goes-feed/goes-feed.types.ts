/**
 * NOAA SWPC GOES X-ray feed
 *
 * https://services.swpc.noaa.gov/json/goes/primary/xrays-<span>.json
 * Each record carries both channels (0.05-0.4nm and 0.1-0.8nm) as separate rows.
 */

import { z } from 'zod';
import type { Observation } from '../observations/observation.types.js';

export const FEED_SPANS = [
  { name: '6-hour', hours: 6 },
  { name: '1-day', hours: 24 },
  { name: '3-day', hours: 72 },
  { name: '7-day', hours: 168 },
] as const;

export type FeedSpan = (typeof FEED_SPANS)[number]['name'];

const ZONELESS_TIME = /T\d{2}:\d{2}(:\d{2}(\.\d+)?)?$/;

/** Epoch ms of a feed time_tag; a tag without an offset is UTC */
export function parseTimeTag(tag: string): number {
  return Date.parse(ZONELESS_TIME.test(tag) ? `${tag}Z` : tag);
}

export const GoesXrayRecordSchema = z.object({
  time_tag: z.string().refine((s) => !Number.isNaN(parseTimeTag(s)), 'unparseable time_tag'),
  energy: z.string(),
  flux: z.number().finite().nonnegative(),
  satellite: z.number().int().optional(),
});

export interface FeedClient {
  /**
   * Observations with timestamp >= startTime, ascending, one per timestamp.
   * An empty array means nothing new; transport failures throw FeedUnavailableError.
   */
  fetch(startTime: Date): Promise<Observation[]>;
}
