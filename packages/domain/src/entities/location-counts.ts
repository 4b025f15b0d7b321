import { VEHICLE_TYPES } from './vehicle.js';
import type { VehicleType } from './vehicle.js';

/**
 * Cumulative vehicle counts, one entry per vehicle type.
 * Every emitted snapshot carries all three types, zero when never seen.
 */
export type CountMap = Readonly<Record<VehicleType, number>>;

/** One entry of a query report. `data` is partial once a vehicle filter narrows it. */
export interface LocationCounts {
  readonly location: string;
  readonly data: Readonly<Partial<Record<VehicleType, number>>>;
}

/** Cross-location query result, ordered by location name. */
export type AggregatedReport = readonly LocationCounts[];

export function emptyCountMap(): CountMap {
  return Object.freeze({ car: 0, motorcycle: 0, bus: 0 });
}

/** Element-wise sum of two count maps. */
export function addCounts(a: CountMap, b: CountMap): CountMap {
  const sum = { car: 0, motorcycle: 0, bus: 0 };
  for (const type of VEHICLE_TYPES) {
    sum[type] = a[type] + b[type];
  }
  return Object.freeze(sum);
}
