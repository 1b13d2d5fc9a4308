/**
 * GOES X-ray Feed Client
 * Source: NOAA SWPC (public, no key required)
 *
 * One GET per call, against the shortest published span that covers the
 * requested start time.
 */

import axios, { type AxiosInstance } from 'axios';
import { FeedUnavailableError, errorMessage } from '../../common/errors.js';
import { HOUR_MS, systemClock, type Clock, type Logger } from '../../common/runtime.js';
import type { Observation } from '../observations/observation.types.js';
import {
  FEED_SPANS,
  GoesXrayRecordSchema,
  parseTimeTag,
  type FeedClient,
  type FeedSpan,
} from './goes-feed.types.js';

export interface GoesFeedClientOptions {
  baseUrl: string;
  energyChannel: string;
  timeoutMs: number;
  http?: AxiosInstance;
  logger?: Logger;
  clock?: Clock;
}

export function selectFeedSpan(startTime: Date, now: Date): FeedSpan {
  const coverHours = (now.getTime() - startTime.getTime()) / HOUR_MS;
  const span = FEED_SPANS.find((s) => s.hours >= coverHours);
  return span ? span.name : '7-day';
}

/**
 * Keep the configured channel, drop malformed rows and rows before startTime,
 * collapse duplicate timestamps (last row wins), sort ascending.
 */
export function normalizeXrayRecords(raw: unknown[], energyChannel: string, startTime: Date): Observation[] {
  const byTime = new Map<number, Observation>();
  const from = startTime.getTime();

  for (const item of raw) {
    const parsed = GoesXrayRecordSchema.safeParse(item);
    if (!parsed.success) continue;

    const record = parsed.data;
    if (record.energy !== energyChannel) continue;

    const ts = parseTimeTag(record.time_tag);
    if (ts < from) continue;

    byTime.set(ts, { timestamp: new Date(ts), flux: record.flux });
  }

  return [...byTime.values()].sort((a, b) => a.timestamp.getTime() - b.timestamp.getTime());
}

export class GoesFeedClient implements FeedClient {
  private readonly http: AxiosInstance;
  private readonly clock: Clock;

  constructor(private readonly options: GoesFeedClientOptions) {
    this.http = options.http ?? axios.create();
    this.clock = options.clock ?? systemClock;
  }

  feedUrl(span: FeedSpan): string {
    return `${this.options.baseUrl}/xrays-${span}.json`;
  }

  async fetch(startTime: Date): Promise<Observation[]> {
    const url = this.feedUrl(selectFeedSpan(startTime, this.clock.utcNow()));
    const startMs = Date.now();

    let status: number;
    let body: unknown;
    try {
      const response = await this.http.get<unknown>(url, {
        timeout: this.options.timeoutMs,
        responseType: 'json',
        headers: { Accept: 'application/json' },
        validateStatus: () => true,
      });
      status = response.status;
      body = response.data;
    } catch (err) {
      throw new FeedUnavailableError(`GOES feed request failed: ${errorMessage(err)}`, { url });
    }

    if (status < 200 || status >= 300) {
      throw new FeedUnavailableError(`GOES feed responded ${status}`, { url, status });
    }
    if (!Array.isArray(body)) {
      throw new FeedUnavailableError('GOES feed body is not a JSON array', { url, status });
    }

    const observations = normalizeXrayRecords(body, this.options.energyChannel, startTime);

    this.options.logger?.info(
      { url, raw: body.length, kept: observations.length, latencyMs: Date.now() - startMs },
      'GOES feed fetched',
    );

    return observations;
  }
}
