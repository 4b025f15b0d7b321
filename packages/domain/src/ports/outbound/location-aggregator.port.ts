import type { CountMap } from '../../entities/location-counts.js';

/** Handle to the single owner of one location's counters. */
export interface LocationAggregatorPort {
  readonly location: string;
  applyBatch(batch: CountMap): void;
  /** Resolves with the totals as they stood at one instant. */
  snapshot(): Promise<CountMap>;
}

export type LocationAggregatorFactory = (location: string) => LocationAggregatorPort;
