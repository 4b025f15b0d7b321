import type { CountMap } from '../../entities/location-counts.js';

export interface StreamPublisherPort {
  publishLocationCounts(location: string, counts: CountMap): Promise<void>;
}
