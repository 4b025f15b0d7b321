import { emptyCountMap, isVehicleType } from '@traffic-counter/domain';
import type { CountMap, VehicleType } from '@traffic-counter/domain';

export interface BatchTally {
  counts: CountMap;
  /** Labels that matched no vehicle type, in batch order */
  unrecognized: string[];
}

/** Counts each recognized label; anything else lands in `unrecognized`. */
export function tallyVehicleBatch(labels: readonly string[]): BatchTally {
  const counts: Record<VehicleType, number> = { ...emptyCountMap() };
  const unrecognized: string[] = [];

  for (const label of labels) {
    if (isVehicleType(label)) {
      counts[label] += 1;
    } else {
      unrecognized.push(label);
    }
  }

  return { counts: Object.freeze(counts), unrecognized };
}

export function parseVehicleBatch(labels: readonly string[]): CountMap {
  return tallyVehicleBatch(labels).counts;
}
