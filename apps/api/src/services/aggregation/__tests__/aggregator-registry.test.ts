import { describe, it, expect, jest, beforeEach, afterEach } from '@jest/globals';
import type { LocationAggregatorPort } from '@traffic-counter/domain';
import { AggregatorRegistry } from '../aggregator-registry.js';
import { LocationAggregator } from '../location-aggregator.js';

describe('AggregatorRegistry', () => {
  beforeEach(() => {
    jest.spyOn(console, 'log').mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('creates a zeroed aggregator on first lookup', async () => {
    const registry = new AggregatorRegistry();
    const aggregator = registry.getOrCreate('ferry-terminal');

    expect(aggregator).toBeInstanceOf(LocationAggregator);
    expect(aggregator.location).toBe('ferry-terminal');
    expect(await aggregator.snapshot()).toEqual({ car: 0, motorcycle: 0, bus: 0 });
    expect(registry.size).toBe(1);
  });

  it('returns the same aggregator for repeated lookups', () => {
    const registry = new AggregatorRegistry();
    expect(registry.getOrCreate('ferry-terminal')).toBe(registry.getOrCreate('ferry-terminal'));
    expect(registry.size).toBe(1);
  });

  it('creates exactly one aggregator for concurrent first batches', async () => {
    const created: string[] = [];
    const registry = new AggregatorRegistry((location) => {
      created.push(location);
      return new LocationAggregator(location);
    });

    const handles = await Promise.all(
      Array.from({ length: 25 }, async () => {
        await new Promise<void>((resolve) => setImmediate(resolve));
        const handle = registry.getOrCreate('tunnel-north');
        handle.applyBatch({ car: 1, motorcycle: 0, bus: 2 });
        return handle;
      }),
    );

    expect(created).toEqual(['tunnel-north']);
    expect(new Set(handles).size).toBe(1);
    expect(await registry.getOrCreate('tunnel-north').snapshot()).toEqual({
      car: 25,
      motorcycle: 0,
      bus: 50,
    });
  });

  it('lists locations in name order', () => {
    const registry = new AggregatorRegistry();
    registry.getOrCreate('tunnel-north');
    registry.getOrCreate('airport-road');
    registry.getOrCreate('market-street');

    expect(registry.listLocations()).toEqual(['airport-road', 'market-street', 'tunnel-north']);
  });

  it('allAggregators is a snapshot of membership at call time', () => {
    const registry = new AggregatorRegistry();
    registry.getOrCreate('airport-road');
    const handles: LocationAggregatorPort[] = registry.allAggregators();
    registry.getOrCreate('market-street');

    expect(handles.map((h) => h.location)).toEqual(['airport-road']);
    expect(registry.allAggregators()).toHaveLength(2);
  });

  it('uses the injected factory', () => {
    const stub: LocationAggregatorPort = {
      location: 'stub',
      applyBatch: () => undefined,
      snapshot: async () => ({ car: 0, motorcycle: 0, bus: 0 }),
    };
    const registry = new AggregatorRegistry(() => stub);
    expect(registry.getOrCreate('anything')).toBe(stub);
  });
});
