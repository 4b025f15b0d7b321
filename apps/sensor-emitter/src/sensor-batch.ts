import type { VehicleType } from '@traffic-counter/domain';
import type { RandomSource } from './seeded-rng.js';

export type VehicleWeights = Record<VehicleType, number>;

/**
 * Expands weights into a pick list, e.g. car:3 bus:1 → [car, car, car, bus].
 * Sampling uniformly from it reproduces the weighting.
 */
export function buildVehicleDistribution(weights: VehicleWeights): VehicleType[] {
  const distribution: VehicleType[] = [
    ...Array.from({ length: weights.car }, (): VehicleType => 'car'),
    ...Array.from({ length: weights.motorcycle }, (): VehicleType => 'motorcycle'),
    ...Array.from({ length: weights.bus }, (): VehicleType => 'bus'),
  ];
  if (distribution.length === 0) {
    throw new Error('at least one vehicle weight must be positive');
  }
  return distribution;
}

export function sampleBatch(
  distribution: readonly VehicleType[],
  size: number,
  rng: RandomSource,
): VehicleType[] {
  const batch: VehicleType[] = [];
  for (let i = 0; i < size; i++) {
    const pick = distribution[Math.floor(rng.next() * distribution.length)];
    if (pick === undefined) throw new Error('cannot sample from an empty distribution');
    batch.push(pick);
  }
  return batch;
}
