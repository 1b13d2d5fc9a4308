import { describe, expect, it, vi } from 'vitest';
import {
  NotFoundError,
  StoreUnavailableError,
  StoreWriteRejectedError,
} from '../../../common/errors.js';
import { toStoreError, upsertValidated, withStoreErrors, type BulkUpsertCounts } from '../mongo.errors.js';

const records = [
  { timestamp: new Date('2024-05-10T11:00:00Z') },
  { timestamp: new Date('2024-05-10T11:01:00Z') },
  { timestamp: new Date('2024-05-10T11:02:00Z') },
];

function bulkFailure(writeErrors: unknown): Error {
  return Object.assign(new Error('bulk write failed'), { name: 'MongoBulkWriteError', writeErrors });
}

describe('toStoreError', () => {
  it('should report each rejected write of an unordered bulk write', () => {
    const err = toStoreError(
      bulkFailure([
        { index: 0, errmsg: 'E11000 duplicate key' },
        { index: 2, errmsg: 'document failed validation' },
      ]),
      'observation_data',
      records,
    );

    expect(err).toBeInstanceOf(StoreWriteRejectedError);
    expect(err.statusCode).toBe(500);
    expect(err.message).toBe('2 write(s) rejected by observation_data');
    expect(err instanceof StoreWriteRejectedError && err.rejected).toEqual([
      { index: 0, timestamp: '2024-05-10T11:00:00.000Z', reason: 'E11000 duplicate key' },
      { index: 2, timestamp: '2024-05-10T11:02:00.000Z', reason: 'document failed validation' },
    ]);
  });

  it('should accept a single write error object', () => {
    const err = toStoreError(bulkFailure({ index: 1, errmsg: 'too large' }), 'observation_data', records);

    expect(err instanceof StoreWriteRejectedError && err.rejected).toEqual([
      { index: 1, timestamp: '2024-05-10T11:01:00.000Z', reason: 'too large' },
    ]);
  });

  it('should report per-operation errors raised by mongoose before the write', () => {
    const err = toStoreError(
      Object.assign(new Error('1 of 3 operations failed validation'), {
        name: 'MongooseBulkWriteError',
        results: [null, new Error('Cast to Number failed for value "NaN"'), null],
      }),
      'model_predictions',
      records,
    );

    expect(err instanceof StoreWriteRejectedError && err.rejected).toEqual([
      { index: 1, timestamp: '2024-05-10T11:01:00.000Z', reason: 'Cast to Number failed for value "NaN"' },
    ]);
  });

  it('should treat connectivity failures as store unavailable', () => {
    const err = toStoreError(new Error('connection 3 to 127.0.0.1:27017 closed'), 'observation_data');

    expect(err).toBeInstanceOf(StoreUnavailableError);
    expect(err.code).toBe('STORE_UNAVAILABLE');
    expect(err.message).toBe('observation_data: connection 3 to 127.0.0.1:27017 closed');
  });

  it('should pass application errors through', () => {
    const original = new NotFoundError('gone');
    expect(toStoreError(original, 'observation_data')).toBe(original);
  });
});

describe('withStoreErrors', () => {
  it('should return the operation result', async () => {
    await expect(withStoreErrors('observation_data', async () => 42)).resolves.toBe(42);
  });

  it('should translate a rejected operation', async () => {
    await expect(
      withStoreErrors('observation_data', async () => {
        throw new Error('Operation `observation_data.findOne()` buffering timed out after 10000ms');
      }),
    ).rejects.toBeInstanceOf(StoreUnavailableError);
  });
});

describe('upsertValidated', () => {
  const counts = (upserted: number, modified: number, matched: number): BulkUpsertCounts => ({
    upsertedCount: upserted,
    modifiedCount: modified,
    matchedCount: matched,
  });

  it('should summarise the write when every record is valid', async () => {
    const write = vi.fn(async () => counts(2, 1, 1));

    const summary = await upsertValidated('observation_data', records, () => null, write);

    expect(write).toHaveBeenCalledWith(records);
    expect(summary).toEqual({ inserted: 2, updated: 1, unchanged: 0 });
  });

  it('should write the valid records and then report the invalid ones', async () => {
    const write = vi.fn(async (valid: Array<{ timestamp: Date }>) => counts(valid.length, 0, 0));

    const err = await upsertValidated(
      'model_predictions',
      records,
      (r) => (r === records[1] ? new Error('probability: Cast to Number failed') : null),
      write,
    ).catch((e: unknown) => e);

    expect(write).toHaveBeenCalledWith([records[0], records[2]]);
    expect(err).toBeInstanceOf(StoreWriteRejectedError);
    expect(err instanceof StoreWriteRejectedError && err.rejected).toEqual([
      { index: 1, timestamp: '2024-05-10T11:01:00.000Z', reason: 'probability: Cast to Number failed' },
    ]);
  });

  it('should not call the driver when nothing is valid', async () => {
    const write = vi.fn(async () => counts(0, 0, 0));

    await expect(
      upsertValidated('model_predictions', records.slice(0, 1), () => new Error('bad'), write),
    ).rejects.toBeInstanceOf(StoreWriteRejectedError);
    expect(write).not.toHaveBeenCalled();
  });

  it('should map driver write errors back to the caller positions', async () => {
    const write = vi.fn(async (): Promise<BulkUpsertCounts> => {
      throw bulkFailure([{ index: 1, errmsg: 'E11000 duplicate key' }]);
    });

    const err = await upsertValidated(
      'observation_data',
      records,
      (r) => (r === records[0] ? new Error('flux: required') : null),
      write,
    ).catch((e: unknown) => e);

    expect(err instanceof StoreWriteRejectedError && err.rejected).toEqual([
      { index: 0, timestamp: '2024-05-10T11:00:00.000Z', reason: 'flux: required' },
      { index: 2, timestamp: '2024-05-10T11:02:00.000Z', reason: 'E11000 duplicate key' },
    ]);
  });

  it('should surface connectivity failures as store unavailable', async () => {
    const write = vi.fn(async (): Promise<BulkUpsertCounts> => {
      throw new Error('Server selection timed out after 10000 ms');
    });

    await expect(upsertValidated('observation_data', records, () => null, write)).rejects.toMatchObject({
      code: 'STORE_UNAVAILABLE',
      message: 'observation_data: Server selection timed out after 10000 ms',
    });
  });
});
