/**
 * Maps driver failures onto the store error taxonomy.
 *
 * An unordered bulkWrite reports every failed operation in writeErrors while
 * the rest are applied; those become StoreWriteRejectedError. Anything else
 * (server selection, network, buffering timeout) is StoreUnavailableError.
 */

import {
  AppError,
  StoreUnavailableError,
  StoreWriteRejectedError,
  errorMessage,
  type RejectedWrite,
} from '../../common/errors.js';
import { EMPTY_UPSERT, type TimestampedRecord, type UpsertSummary } from './timeseries.store.js';

interface DriverWriteError {
  index: number;
  errmsg?: string;
  message?: string;
}

/** Counters every bulkWrite result carries */
export interface BulkUpsertCounts {
  upsertedCount: number;
  modifiedCount: number;
  matchedCount: number;
}

function isDriverWriteError(value: unknown): value is DriverWriteError {
  return typeof value === 'object' && value !== null && 'index' in value && typeof value.index === 'number';
}

function isoOrNull(at: Date | undefined): string | null {
  return at && !Number.isNaN(at.getTime()) ? at.toISOString() : null;
}

function writeErrorsOf(err: unknown): DriverWriteError[] | null {
  if (!(err instanceof Error)) return null;

  // MongoBulkWriteError from the driver
  if ('writeErrors' in err) {
    const raw = err.writeErrors;
    const list: unknown[] = Array.isArray(raw) ? raw : [raw];
    const errors = list.filter(isDriverWriteError);
    return errors.length > 0 ? errors : null;
  }

  // MongooseBulkWriteError (throwOnValidationError): results[i] is the error for op i
  if ('results' in err && Array.isArray(err.results)) {
    const results: unknown[] = err.results;
    const errors = results.flatMap((r, index) => (r instanceof Error ? [{ index, message: r.message }] : []));
    return errors.length > 0 ? errors : null;
  }

  return null;
}

export function toStoreError(
  err: unknown,
  collection: string,
  records: readonly TimestampedRecord[] = [],
): AppError {
  if (err instanceof AppError) return err;

  const writeErrors = writeErrorsOf(err);
  if (writeErrors) {
    const rejected: RejectedWrite[] = writeErrors.map((w) => ({
      index: w.index,
      timestamp: isoOrNull(records[w.index]?.timestamp),
      reason: w.errmsg ?? w.message ?? 'write rejected',
    }));
    return new StoreWriteRejectedError(collection, rejected);
  }

  return new StoreUnavailableError(`${collection}: ${errorMessage(err)}`, { collection });
}

/** Run a store operation, translating any failure */
export async function withStoreErrors<R>(
  collection: string,
  op: () => Promise<R>,
  records?: readonly TimestampedRecord[],
): Promise<R> {
  try {
    return await op();
  } catch (err) {
    throw toStoreError(err, collection, records);
  }
}

/**
 * Validate each record against the schema, bulk-write the valid ones, then
 * throw StoreWriteRejectedError for everything refused by either step.
 * Indexes in the error refer to positions in `records`.
 */
export async function upsertValidated<T extends TimestampedRecord>(
  collection: string,
  records: readonly T[],
  validate: (record: T) => Error | null,
  write: (valid: T[]) => Promise<BulkUpsertCounts>,
): Promise<UpsertSummary> {
  const rejected: RejectedWrite[] = [];
  const valid: T[] = [];
  const positions: number[] = [];

  records.forEach((record, index) => {
    const invalid = validate(record);
    if (invalid) {
      rejected.push({ index, timestamp: isoOrNull(record.timestamp), reason: invalid.message });
    } else {
      valid.push(record);
      positions.push(index);
    }
  });

  let summary: UpsertSummary = { ...EMPTY_UPSERT };

  if (valid.length > 0) {
    try {
      const result = await write(valid);
      summary = {
        inserted: result.upsertedCount,
        updated: result.modifiedCount,
        unchanged: result.matchedCount - result.modifiedCount,
      };
    } catch (err) {
      const mapped = toStoreError(err, collection, valid);
      if (!(mapped instanceof StoreWriteRejectedError)) throw mapped;
      rejected.push(...mapped.rejected.map((r) => ({ ...r, index: positions[r.index] ?? r.index })));
    }
  }

  if (rejected.length > 0) {
    throw new StoreWriteRejectedError(
      collection,
      rejected.sort((a, b) => a.index - b.index),
    );
  }

  return summary;
}
