import { addCounts, emptyCountMap } from '@traffic-counter/domain';
import type { CountMap, LocationAggregatorPort } from '@traffic-counter/domain';

/**
 * Sole owner of one location's cumulative counts.
 *
 * Both operations run to completion on the event loop, so a snapshot never
 * sees a batch half-applied and concurrent batches never overwrite each
 * other. Aggregators share no state, so locations never wait on one another.
 */
export class LocationAggregator implements LocationAggregatorPort {
  private counts: CountMap = emptyCountMap();
  private applied = 0;

  constructor(readonly location: string) {}

  /** Number of batches applied since creation. */
  get batchesApplied(): number {
    return this.applied;
  }

  applyBatch(batch: CountMap): void {
    this.counts = addCounts(this.counts, batch);
    this.applied += 1;
  }

  /** Totals are replaced, never mutated, so the current map is already a frozen copy. */
  snapshot(): Promise<CountMap> {
    return Promise.resolve(this.counts);
  }
}
