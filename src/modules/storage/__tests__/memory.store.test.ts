import { describe, expect, it } from 'vitest';
import type { Observation } from '../../observations/observation.types.js';
import { InMemoryTimeSeriesStore } from '../memory.store.js';

const obs = (iso: string, flux: number): Observation => ({ timestamp: new Date(iso), flux });

describe('InMemoryTimeSeriesStore', () => {
  it('should return null from latest() when empty', async () => {
    const store = new InMemoryTimeSeriesStore<Observation>();
    await expect(store.latest()).resolves.toBeNull();
  });

  it('should return the most recent record regardless of insertion order', async () => {
    const store = new InMemoryTimeSeriesStore<Observation>([
      obs('2024-05-10T11:05:00Z', 2e-6),
      obs('2024-05-10T11:09:00Z', 3e-6),
      obs('2024-05-10T11:01:00Z', 1e-6),
    ]);
    await expect(store.latest()).resolves.toEqual(obs('2024-05-10T11:09:00Z', 3e-6));
  });

  it('should replace a record with the same timestamp without growing', async () => {
    const store = new InMemoryTimeSeriesStore<Observation>([obs('2024-05-10T11:00:00Z', 1e-6)]);

    const summary = await store.upsertMany([obs('2024-05-10T11:00:00Z', 7e-6)]);

    expect(summary).toEqual({ inserted: 0, updated: 1, unchanged: 0 });
    expect(store.size()).toBe(1);
    expect(store.snapshot()).toEqual([obs('2024-05-10T11:00:00Z', 7e-6)]);
  });

  it('should count inserts, updates and unchanged rows separately', async () => {
    const store = new InMemoryTimeSeriesStore<Observation>([
      obs('2024-05-10T11:00:00Z', 1e-6),
      obs('2024-05-10T11:01:00Z', 2e-6),
    ]);

    const summary = await store.upsertMany([
      obs('2024-05-10T11:00:00Z', 1e-6),
      obs('2024-05-10T11:01:00Z', 9e-6),
      obs('2024-05-10T11:02:00Z', 3e-6),
    ]);

    expect(summary).toEqual({ inserted: 1, updated: 1, unchanged: 1 });
    expect(store.size()).toBe(3);
  });

  it('should return records at or after start, ascending', async () => {
    const store = new InMemoryTimeSeriesStore<Observation>([
      obs('2024-05-10T11:02:00Z', 3e-6),
      obs('2024-05-10T10:59:00Z', 1e-6),
      obs('2024-05-10T11:00:00Z', 2e-6),
    ]);

    const rows = await store.rangeFrom(new Date('2024-05-10T11:00:00Z'));
    expect(rows.map((r) => r.timestamp.toISOString())).toEqual([
      '2024-05-10T11:00:00.000Z',
      '2024-05-10T11:02:00.000Z',
    ]);
  });

  it('should do not expose stored dates to mutation', async () => {
    const store = new InMemoryTimeSeriesStore<Observation>([obs('2024-05-10T11:00:00Z', 1e-6)]);

    const latest = await store.latest();
    latest?.timestamp.setTime(0);

    const again = await store.latest();
    expect(again?.timestamp.toISOString()).toBe('2024-05-10T11:00:00.000Z');
  });
});
