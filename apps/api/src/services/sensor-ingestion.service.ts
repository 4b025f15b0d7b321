import type {
  SensorBatch,
  SensorIngestionPort,
  SensorIngestResult,
  StreamPublisherPort,
} from '@traffic-counter/domain';
import type { AggregatorRegistry } from './aggregation/aggregator-registry.js';
import { tallyVehicleBatch } from './aggregation/vehicle-batch-parser.js';

export class SensorIngestionService implements SensorIngestionPort {
  private publisher: StreamPublisherPort | null = null;
  private ignoredLabels = 0;

  constructor(private readonly registry: AggregatorRegistry) {}

  /** Unrecognized labels dropped since startup. */
  get ignoredLabelCount(): number {
    return this.ignoredLabels;
  }

  setPublisher(publisher: StreamPublisherPort | null): void {
    this.publisher = publisher;
  }

  ingestBatch(batch: SensorBatch): SensorIngestResult {
    const { counts, unrecognized } = tallyVehicleBatch(batch.vehicles);

    if (unrecognized.length > 0) {
      this.ignoredLabels += unrecognized.length;
      console.warn(
        `[sensor-ingest] ${batch.location}: ignored ${unrecognized.length} unknown vehicle label(s): ${[...new Set(unrecognized)].join(', ')}`,
      );
    }

    const aggregator = this.registry.getOrCreate(batch.location);
    aggregator.applyBatch(counts);

    // Push updated totals to stream subscribers without holding up the acknowledgement
    const publisher = this.publisher;
    if (publisher) {
      aggregator
        .snapshot()
        .then((totals) => publisher.publishLocationCounts(batch.location, totals))
        .catch((err: unknown) => console.error('[sensor-ingest] publish failed', err));
    }

    return {
      location: batch.location,
      counted: batch.vehicles.length - unrecognized.length,
      ignored: unrecognized.length,
    };
  }
}
