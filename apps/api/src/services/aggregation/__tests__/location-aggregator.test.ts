import { describe, it, expect } from '@jest/globals';
import { LocationAggregator } from '../location-aggregator.js';
import { parseVehicleBatch } from '../vehicle-batch-parser.js';

const nextTurn = () => new Promise<void>((resolve) => setImmediate(resolve));

describe('LocationAggregator', () => {
  it('starts at zero for every vehicle type', async () => {
    const aggregator = new LocationAggregator('harbor-bridge');
    expect(aggregator.location).toBe('harbor-bridge');
    expect(await aggregator.snapshot()).toEqual({ car: 0, motorcycle: 0, bus: 0 });
    expect(aggregator.batchesApplied).toBe(0);
  });

  it('adds batches into running totals', async () => {
    const aggregator = new LocationAggregator('harbor-bridge');
    aggregator.applyBatch({ car: 3, motorcycle: 1, bus: 1 });
    aggregator.applyBatch({ car: 1, motorcycle: 0, bus: 2 });
    expect(await aggregator.snapshot()).toEqual({ car: 4, motorcycle: 1, bus: 3 });
    expect(aggregator.batchesApplied).toBe(2);
  });

  it('hands out a frozen copy that later batches do not change', async () => {
    const aggregator = new LocationAggregator('harbor-bridge');
    aggregator.applyBatch({ car: 2, motorcycle: 0, bus: 0 });
    const before = await aggregator.snapshot();
    aggregator.applyBatch({ car: 5, motorcycle: 0, bus: 0 });

    expect(Object.isFrozen(before)).toBe(true);
    expect(before.car).toBe(2);
    expect((await aggregator.snapshot()).car).toBe(7);
  });

  it('reuses one frozen map between batches', async () => {
    const aggregator = new LocationAggregator('harbor-bridge');
    aggregator.applyBatch({ car: 1, motorcycle: 2, bus: 3 });
    const first = await aggregator.snapshot();

    expect(await aggregator.snapshot()).toBe(first);
    aggregator.applyBatch({ car: 0, motorcycle: 0, bus: 1 });
    expect(await aggregator.snapshot()).not.toBe(first);
    expect(first).toEqual({ car: 1, motorcycle: 2, bus: 3 });
  });

  it('loses no update when many callers apply batches concurrently', async () => {
    const aggregator = new LocationAggregator('harbor-bridge');
    const batches = [
      ['car', 'car', 'bus'],
      ['motorcycle'],
      ['bus', 'bus', 'car', 'unicycle'],
      [],
      ['car', 'motorcycle', 'motorcycle'],
    ];

    // 20 callers, each yielding to the event loop between its batches
    const callers = Array.from({ length: 20 }, async (_, caller) => {
      for (let i = 0; i < batches.length; i++) {
        await nextTurn();
        aggregator.applyBatch(parseVehicleBatch(batches[(caller + i) % batches.length] ?? []));
      }
    });
    await Promise.all(callers);

    // Each caller applies every batch once: car 4, motorcycle 3, bus 3 per caller
    expect(await aggregator.snapshot()).toEqual({ car: 80, motorcycle: 60, bus: 60 });
    expect(aggregator.batchesApplied).toBe(100);
  });

  it('every snapshot taken mid-ingestion is a whole-batch prefix', async () => {
    const aggregator = new LocationAggregator('harbor-bridge');
    const seen: number[] = [];

    const writer = (async () => {
      for (let i = 0; i < 10; i++) {
        await nextTurn();
        aggregator.applyBatch({ car: 1, motorcycle: 1, bus: 1 });
      }
    })();
    const reader = (async () => {
      for (let i = 0; i < 10; i++) {
        await nextTurn();
        const snap = await aggregator.snapshot();
        expect(snap.car).toBe(snap.motorcycle);
        expect(snap.motorcycle).toBe(snap.bus);
        seen.push(snap.car);
      }
    })();
    await Promise.all([writer, reader]);

    expect([...seen].sort((a, b) => a - b)).toEqual(seen);
    expect(await aggregator.snapshot()).toEqual({ car: 10, motorcycle: 10, bus: 10 });
  });
});
