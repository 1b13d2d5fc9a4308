/**
 * TIME SERIES STORE CONTRACT
 * ==========================
 *
 * A table keyed by timestamp. Writes are upserts: a record whose timestamp
 * already exists replaces the stored one, so re-running a fetch over an
 * overlapping window never duplicates rows.
 */

export interface TimestampedRecord {
  timestamp: Date;
}

export interface UpsertSummary {
  inserted: number;
  updated: number;
  unchanged: number;
}

export interface TimeSeriesStore<T extends TimestampedRecord> {
  /** Most recent record by timestamp, null when the table is empty */
  latest(): Promise<T | null>;

  /** All records with timestamp >= start, ascending */
  rangeFrom(start: Date): Promise<T[]>;

  /**
   * Upsert every record independently.
   * @throws StoreWriteRejectedError listing the records that failed
   * @throws StoreUnavailableError when the store cannot be reached
   */
  upsertMany(records: T[]): Promise<UpsertSummary>;

  /** Create the unique timestamp index (idempotent) */
  ensureIndexes(): Promise<void>;
}

export const EMPTY_UPSERT: UpsertSummary = { inserted: 0, updated: 0, unchanged: 0 };
