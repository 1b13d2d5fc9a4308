import { afterEach, describe, expect, it, vi } from 'vitest';
import { StoreUnavailableError, StoreWriteRejectedError } from '../../../common/errors.js';
import { getPredictionModel, PredictionMongoStore, toPrediction } from '../prediction.model.js';
import type { Prediction } from '../prediction.types.js';

const T1 = new Date('2024-05-10T12:00:00.000Z');
const T2 = new Date('2024-05-10T12:10:00.000Z');

const prediction = (timestamp: Date, probability: number): Prediction => ({
  timestamp,
  probability,
  riskLevel: 'Low',
  modelVersion: 'placeholder-1.0.0',
});

// No connection is opened: bulkWrite is stubbed wherever it could be reached.
const model = getPredictionModel('test_model_predictions');
const store = new PredictionMongoStore(model);

describe('PredictionMongoStore.upsertMany', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should reject a record that fails casting without calling the driver', async () => {
    const bulkWrite = vi.spyOn(model, 'bulkWrite').mockRejectedValue(new Error('not connected'));

    const err = await store.upsertMany([prediction(T1, Number.NaN)]).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(StoreWriteRejectedError);
    expect(err).toMatchObject({
      code: 'STORE_WRITE_REJECTED',
      rejected: [{ index: 0, timestamp: '2024-05-10T12:00:00.000Z', reason: expect.stringContaining('probability') }],
    });
    expect(bulkWrite).not.toHaveBeenCalled();
  });

  it('should reject a probability above 1', async () => {
    const bulkWrite = vi.spyOn(model, 'bulkWrite').mockRejectedValue(new Error('not connected'));

    await expect(store.upsertMany([prediction(T1, 1.5)])).rejects.toBeInstanceOf(StoreWriteRejectedError);
    expect(bulkWrite).not.toHaveBeenCalled();
  });

  it('should still send the valid records and report both failures', async () => {
    const bulkWrite = vi
      .spyOn(model, 'bulkWrite')
      .mockRejectedValue(
        Object.assign(new Error('E11000 duplicate key'), {
          writeErrors: [{ index: 0, errmsg: 'E11000 duplicate key' }],
        }),
      );

    const err = await store.upsertMany([prediction(T1, Number.NaN), prediction(T2, 0.4)]).catch((e: unknown) => e);

    expect(bulkWrite).toHaveBeenCalledWith(
      [
        {
          updateOne: {
            filter: { timestamp: T2 },
            update: { $set: { probability: 0.4, riskLevel: 'Low', modelVersion: 'placeholder-1.0.0' } },
            upsert: true,
          },
        },
      ],
      { ordered: false, throwOnValidationError: true },
    );
    expect(err instanceof StoreWriteRejectedError && err.rejected.map((r) => [r.index, r.timestamp])).toEqual([
      [0, '2024-05-10T12:00:00.000Z'],
      [1, '2024-05-10T12:10:00.000Z'],
    ]);
  });
});

describe('toPrediction', () => {
  it('should read a stored row', () => {
    expect(
      toPrediction(
        { _id: 'row-1', timestamp: T1, probability: 0.3, riskLevel: 'Medium', modelVersion: 'v1' },
        'model_predictions',
      ),
    ).toEqual({ timestamp: T1, probability: 0.3, riskLevel: 'Medium', modelVersion: 'v1' });
  });

  it('should refuse a row with an unknown risk level', () => {
    const read = () =>
      toPrediction(
        { timestamp: T1, probability: 0.3, riskLevel: 'Unknown', modelVersion: 'v1' },
        'model_predictions',
      );

    expect(read).toThrow(StoreUnavailableError);
    expect(read).toThrow(/^model_predictions: unreadable prediction row \(riskLevel: /);
  });
});
