/**
 * In-process time series store.
 *
 * Backs STORE_DRIVER=memory and the test suites. Same upsert semantics as
 * the Mongo store; records are copied on the way in and out.
 */

import { isDeepStrictEqual } from 'node:util';
import type { TimeSeriesStore, TimestampedRecord, UpsertSummary } from './timeseries.store.js';

export class InMemoryTimeSeriesStore<T extends TimestampedRecord> implements TimeSeriesStore<T> {
  private rows = new Map<number, T>();

  constructor(seed: T[] = []) {
    for (const record of seed) {
      this.rows.set(record.timestamp.getTime(), this.copy(record));
    }
  }

  async latest(): Promise<T | null> {
    let best: T | null = null;
    for (const row of this.rows.values()) {
      if (!best || row.timestamp.getTime() > best.timestamp.getTime()) best = row;
    }
    return best ? this.copy(best) : null;
  }

  async rangeFrom(start: Date): Promise<T[]> {
    const from = start.getTime();
    return [...this.rows.values()]
      .filter((row) => row.timestamp.getTime() >= from)
      .sort((a, b) => a.timestamp.getTime() - b.timestamp.getTime())
      .map((row) => this.copy(row));
  }

  async upsertMany(records: T[]): Promise<UpsertSummary> {
    const summary: UpsertSummary = { inserted: 0, updated: 0, unchanged: 0 };

    for (const record of records) {
      const key = record.timestamp.getTime();
      const existing = this.rows.get(key);

      if (!existing) summary.inserted++;
      else if (isDeepStrictEqual(existing, record)) summary.unchanged++;
      else summary.updated++;

      this.rows.set(key, this.copy(record));
    }

    return summary;
  }

  async ensureIndexes(): Promise<void> {
    // keyed by timestamp already
  }

  size(): number {
    return this.rows.size;
  }

  snapshot(): T[] {
    return [...this.rows.values()]
      .sort((a, b) => a.timestamp.getTime() - b.timestamp.getTime())
      .map((row) => this.copy(row));
  }

  private copy(record: T): T {
    return { ...record, timestamp: new Date(record.timestamp.getTime()) };
  }
}
