import type { LocationAggregatorFactory, LocationAggregatorPort } from '@traffic-counter/domain';
import { LocationAggregator } from './location-aggregator.js';

const defaultFactory: LocationAggregatorFactory = (location) => new LocationAggregator(location);

/**
 * Process-wide map from location name to its aggregator.
 * Insert-only: aggregators are created on first use and never removed.
 */
export class AggregatorRegistry {
  private readonly aggregators = new Map<string, LocationAggregatorPort>();

  constructor(private readonly createAggregator: LocationAggregatorFactory = defaultFactory) {}

  get size(): number {
    return this.aggregators.size;
  }

  getOrCreate(location: string): LocationAggregatorPort {
    const existing = this.aggregators.get(location);
    if (existing) return existing;

    // Lookup and insert happen in the same synchronous turn, so two first
    // batches for one location can never both get here with an empty slot.
    const created = this.createAggregator(location);
    this.aggregators.set(location, created);
    console.log(`[registry] new location ${location} (${this.aggregators.size} total)`);
    return created;
  }

  listLocations(): string[] {
    return [...this.aggregators.keys()].sort();
  }

  /** Handles registered at the instant of the call. */
  allAggregators(): LocationAggregatorPort[] {
    return [...this.aggregators.values()];
  }
}
